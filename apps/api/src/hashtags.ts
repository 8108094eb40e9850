import type { AssemblyRules, NicheProfile } from "@viralscript/schemas";

/** Lower-cased whitespace tokens with everything but letters and digits removed. */
export function topicTokens(topic: string, minLength = 1): string[] {
  return topic
    .toLowerCase()
    .split(/\s+/)
    .map((t) => t.replace(/[^\p{L}\p{N}]/gu, ""))
    .filter((t) => t.length >= minLength);
}

export function buildHashtags(
  niche: NicheProfile,
  topic: string,
  rules: AssemblyRules["hashtags"],
): string[] {
  const denied = new Set(rules.denylist.map((t) => t.toLowerCase()));
  const tags: string[] = [];
  const add = (tag: string): boolean => {
    const key = tag.toLowerCase();
    if (tags.length >= rules.max || denied.has(key) || tags.includes(key)) return false;
    tags.push(key);
    return true;
  };

  niche.hashtags.forEach(add);
  let fromTopic = 0;
  for (const token of topicTokens(topic, rules.min_token_length)) {
    if (fromTopic >= rules.max_topic_tags) break;
    if (add(`#${token}`)) fromTopic += 1;
  }
  rules.trending.forEach(add);
  return tags;
}
