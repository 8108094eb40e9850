import { assertValid, compileSchema } from "@viralscript/shared";
import { analyzeRequestSchema } from "@viralscript/schemas";
import type { AnalyzeRequestBody, LengthId } from "@viralscript/schemas";
import { type TrendItem, normalizeTerm } from "@viralscript/trends-client";
import { normalizeTopic } from "./assembler";
import type { Catalog } from "./catalog";
import { buildHashtags, topicTokens } from "./hashtags";

const MAX_ANTI_PATTERNS = 5;

export type TopicAnalysis = {
  topic: string;
  niche: string;
  optimal_length: { id: LengthId; total_seconds: number };
  recommended_tone: string;
  preferred_hooks: string[];
  best_hook: string;
  suggested_hashtags: string[];
  matching_trends: TrendItem[];
  posting_times: string[];
  avoid: string[];
};

const validateAnalyzeRequest = compileSchema<AnalyzeRequestBody>(analyzeRequestSchema);

export function parseAnalyzeRequest(body: unknown): AnalyzeRequestBody {
  const parsed = assertValid(validateAnalyzeRequest, structuredClone(body));
  return { topic: normalizeTopic(parsed.topic), niche: parsed.niche };
}

/** Trend items whose normalized term contains one of the topic's tokens. */
export function matchTrends(
  topic: string,
  trends: readonly TrendItem[],
  minTokenLength: number,
): TrendItem[] {
  const tokens = topicTokens(topic, minTokenLength);
  if (!tokens.length) return [];
  return trends.filter((item) => {
    const term = normalizeTerm(item.term);
    return tokens.some((t) => term.includes(t));
  });
}

export function analyzeTopic(
  catalog: Catalog,
  request: AnalyzeRequestBody,
  trends: readonly TrendItem[],
): TopicAnalysis {
  const niche = catalog.niche(request.niche);
  const length = catalog.length(niche.optimal_length);
  const rules = catalog.assembly;
  return {
    topic: request.topic,
    niche: niche.id,
    optimal_length: { id: length.id, total_seconds: length.total_seconds },
    recommended_tone: niche.tone,
    preferred_hooks: [...niche.preferred_hooks],
    best_hook: catalog.bestHookFor(niche.id).id,
    suggested_hashtags: buildHashtags(niche, request.topic, rules.hashtags),
    matching_trends: matchTrends(request.topic, trends, rules.hashtags.min_token_length),
    posting_times: [...rules.posting_times],
    avoid: rules.anti_patterns.slice(0, MAX_ANTI_PATTERNS),
  };
}
