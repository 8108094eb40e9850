import type { AssemblyRules, HookStyle, NicheProfile } from "@viralscript/schemas";
import { topicTokens } from "./hashtags";

/** True when the topic has words and every one of them is a generic or filler word. */
export function isGenericTopic(topic: string, genericWords: readonly string[]): boolean {
  const tokens = topicTokens(topic);
  return tokens.length > 0 && tokens.every((t) => genericWords.includes(t));
}

/**
 * Hook efficacy on a 0-10 scale, plus the niche-fit bonus for the niche's
 * preferred styles, minus the short and generic topic penalties.
 * Clamped to [0, 10] and rounded to one decimal.
 */
export function scoreHook(
  hook: HookStyle,
  niche: NicheProfile,
  topic: string,
  rules: AssemblyRules["scoring"],
): number {
  let score = hook.efficacy / 10;
  const rank = niche.preferred_hooks.indexOf(hook.id);
  if (rank >= 0 && rank < rules.preferred_hook_bonus.length) {
    score += rules.preferred_hook_bonus[rank];
  }
  const trimmed = topic.trim();
  if (trimmed.length < rules.short_topic_length) score -= rules.short_topic_penalty;
  if (isGenericTopic(trimmed, rules.generic_words)) score -= rules.generic_topic_penalty;
  return Math.round(Math.min(10, Math.max(0, score)) * 10) / 10;
}

export function viralPotential(
  score: number,
  thresholds: AssemblyRules["viral_potential"],
): string {
  const tier = thresholds.find((t) => score >= t.min);
  return tier ? tier.label : thresholds[thresholds.length - 1].label;
}
