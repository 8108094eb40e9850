import { ValidationError, assertValid, compileSchema, deepFreeze } from "@viralscript/shared";
import { scriptRequestSchema } from "@viralscript/schemas";
import type {
  AssemblyRules,
  GeneratedScript,
  HookStyle,
  LengthProfile,
  NicheProfile,
  ScriptRequestBody,
  ScriptSection,
  SectionName,
  TipRule,
} from "@viralscript/schemas";
import type { Catalog } from "./catalog";
import { buildHashtags } from "./hashtags";
import { scoreHook, viralPotential } from "./scoring";
import { pickIndex, selectPoints } from "./selection";
import { renderTemplate } from "./template";
import { type SectionSpan, formatTimecode, sectionSpans } from "./timeline";

export const MIN_TOPIC_LENGTH = 3;
const HOOK_DURATION_PHRASE = "30 jours";

export type ScriptRequest = ScriptRequestBody;

/** What callers may pass; omitted fields take the schema defaults. */
export type ScriptRequestInput = Partial<ScriptRequestBody> & { topic: string };

const validateScriptRequest = compileSchema<ScriptRequestBody>(scriptRequestSchema);

function optionalText(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/** Trimmed topic; surrounding whitespace does not count towards the minimum length. */
export function normalizeTopic(raw: string): string {
  const topic = raw.trim();
  // Counted in code points, as the request schema's minLength is
  if ([...topic].length < MIN_TOPIC_LENGTH) {
    throw new ValidationError(
      "topic",
      `topic must NOT have fewer than ${MIN_TOPIC_LENGTH} characters`,
      { limit: MIN_TOPIC_LENGTH },
    );
  }
  return topic;
}

/**
 * Validates a request body and applies defaults. Throws ValidationError
 * naming the first offending field; the input is never mutated.
 */
export function parseScriptRequest(body: unknown): ScriptRequest {
  const parsed = assertValid(validateScriptRequest, structuredClone(body));
  const topic = normalizeTopic(parsed.topic);
  const request: ScriptRequest = {
    topic,
    niche: parsed.niche,
    hook_style: parsed.hook_style,
    length: parsed.length,
    include_cta: parsed.include_cta,
  };
  const audience = optionalText(parsed.target_audience);
  const tone = optionalText(parsed.tone);
  if (audience) request.target_audience = audience;
  if (tone) request.tone = tone;
  if (parsed.series_episode !== undefined) request.series_episode = parsed.series_episode;
  return request;
}

type Resolved = {
  request: ScriptRequest;
  niche: NicheProfile;
  hook: HookStyle;
  length: LengthProfile;
};

export class ScriptAssembler {
  constructor(private readonly catalog: Catalog) {}

  /**
   * Builds a complete script or throws; nothing partial is ever returned.
   * Pure in its inputs: the same request always yields the same script.
   */
  generate(input: ScriptRequestInput): GeneratedScript {
    const request = parseScriptRequest(input);
    const niche = this.catalog.niche(request.niche);
    const resolved: Resolved = {
      request,
      niche,
      hook: this.catalog.resolveHookStyle(request.hook_style, niche.id),
      length: this.catalog.length(request.length),
    };
    return deepFreeze(this.assemble(resolved));
  }

  private assemble({ request, niche, hook, length }: Resolved): GeneratedScript {
    const rules = this.catalog.assembly;
    const { topic } = request;
    const tone = request.tone ?? niche.tone;
    const points = selectPoints(niche.point_bank, topic, rules.content_points).map((p) =>
      renderTemplate(p, { topic }),
    );

    const texts: Record<SectionName, string> = {
      hook: this.hookText(request, niche, hook, points.length),
      setup: sectionText(niche.section_overrides?.setup, rules, "setup", request),
      content: [
        renderTemplate(rules.templates.content_intro, { topic }),
        ...points.map((p, i) => `${i + 1}. ${p}`),
      ].join("\n"),
      payoff: sectionText(niche.section_overrides?.payoff, rules, "payoff", request),
      cta: renderTemplate(rules.cta_pool[pickIndex(topic, "cta", rules.cta_pool.length)], {
        topic,
      }),
    };

    const sections = new Map<SectionName, ScriptSection>();
    for (const span of sectionSpans(length, request.include_cta)) {
      sections.set(span.name, {
        ...toSection(span, texts[span.name]),
        visual_notes: renderTemplate(rules.visual_notes[span.name], { topic, tone }),
        ...(span.name === "content" ? { points } : {}),
      });
    }
    const section = (name: SectionName): ScriptSection => {
      const found = sections.get(name);
      if (!found) throw new Error(`section ${name} was not assembled`);
      return found;
    };

    const hookScore = scoreHook(hook, niche, topic, rules.scoring);
    return {
      topic,
      niche: niche.id,
      hook_style: hook.id,
      length: length.id,
      hook: section("hook"),
      setup: section("setup"),
      content: section("content"),
      payoff: section("payoff"),
      cta: sections.get("cta") ?? null,
      total_duration: length.total_seconds,
      hook_score: hookScore,
      viral_potential: viralPotential(hookScore, rules.viral_potential),
      hashtags: buildHashtags(niche, topic, rules.hashtags),
      tips: selectTips(rules.tips, request, niche, hook, length),
    };
  }

  private hookText(
    request: ScriptRequest,
    niche: NicheProfile,
    hook: HookStyle,
    pointCount: number,
  ): string {
    const { topic } = request;
    const template = hook.templates[pickIndex(topic, "hook", hook.templates.length)];
    let text = renderTemplate(template, {
      topic,
      niche: niche.label.toLowerCase(),
      number: String(pointCount),
      duration: HOOK_DURATION_PHRASE,
    });
    const override = niche.section_overrides?.hook;
    if (override) text = renderTemplate(override, { hook: text, topic });
    if (request.series_episode !== undefined) {
      text = renderTemplate(this.catalog.assembly.templates.series_prefix, {
        episode: String(request.series_episode),
        hook: text,
      });
    }
    return text;
  }
}

function sectionText(
  override: string | undefined,
  rules: AssemblyRules,
  name: "setup" | "payoff",
  request: ScriptRequest,
): string {
  const { topic, target_audience: audience } = request;
  if (override) return renderTemplate(override, { topic });
  if (audience) {
    const template =
      name === "setup" ? rules.templates.setup_audience : rules.templates.payoff_audience;
    return renderTemplate(template, { topic, audience });
  }
  return renderTemplate(rules.templates[name], { topic });
}

function toSection(span: SectionSpan, text: string): ScriptSection {
  return {
    name: span.name,
    text,
    timecode: formatTimecode(span),
    start_s: span.start,
    end_s: span.end,
  };
}

function ruleMatches(
  when: TipRule["when"],
  request: ScriptRequest,
  niche: NicheProfile,
  hook: HookStyle,
  length: LengthProfile,
): boolean {
  if (when.length && !when.length.includes(length.id)) return false;
  if (when.niche && !when.niche.includes(niche.id)) return false;
  if (when.hook_style && !when.hook_style.includes(hook.id)) return false;
  if (when.include_cta !== undefined && when.include_cta !== request.include_cta) return false;
  if (when.series !== undefined && when.series !== (request.series_episode !== undefined)) {
    return false;
  }
  return true;
}

export function selectTips(
  tips: AssemblyRules["tips"],
  request: ScriptRequest,
  niche: NicheProfile,
  hook: HookStyle,
  length: LengthProfile,
): string[] {
  return tips.rules
    .filter((rule) => ruleMatches(rule.when, request, niche, hook, length))
    .map((rule) => rule.tip)
    .slice(0, tips.max);
}
