// Hand-kept mirrors of the JSON Schemas in ../schemas.

export type HookStyle = {
  readonly id: string;
  readonly label: string;
  readonly templates: readonly string[];
  /** 0-100 */
  readonly efficacy: number;
};

export type SectionOverrides = {
  readonly hook?: string;
  readonly setup?: string;
  readonly payoff?: string;
};

export type NicheProfile = {
  readonly id: string;
  readonly label: string;
  readonly tone: string;
  readonly hashtags: readonly string[];
  readonly preferred_hooks: readonly string[];
  readonly optimal_length: string;
  readonly point_bank: readonly string[];
  readonly section_overrides?: SectionOverrides;
};

export type LengthId = "short" | "medium" | "long";

export type LengthProfile = {
  readonly id: LengthId;
  readonly label: string;
  readonly total_seconds: number;
  /** Cumulative end fractions; the CTA section ends at 1. */
  readonly boundaries: {
    readonly hook: number;
    readonly setup: number;
    readonly content: number;
    readonly payoff: number;
  };
};

export type TipRule = {
  readonly tip: string;
  readonly when: {
    readonly length?: readonly string[];
    readonly niche?: readonly string[];
    readonly hook_style?: readonly string[];
    readonly include_cta?: boolean;
    readonly series?: boolean;
  };
};

export type AssemblyRules = {
  readonly templates: {
    readonly setup: string;
    readonly setup_audience: string;
    readonly content_intro: string;
    readonly payoff: string;
    readonly payoff_audience: string;
    readonly series_prefix: string;
  };
  readonly visual_notes: Readonly<Record<SectionName, string>>;
  readonly cta_pool: readonly string[];
  readonly content_points: { readonly min: number; readonly max: number };
  readonly hashtags: {
    readonly max: number;
    readonly max_topic_tags: number;
    readonly min_token_length: number;
    readonly denylist: readonly string[];
    readonly trending: readonly string[];
  };
  readonly scoring: {
    readonly preferred_hook_bonus: readonly number[];
    readonly short_topic_length: number;
    readonly short_topic_penalty: number;
    readonly generic_topic_penalty: number;
    readonly generic_words: readonly string[];
  };
  readonly viral_potential: ReadonlyArray<{ readonly min: number; readonly label: string }>;
  readonly tips: { readonly max: number; readonly rules: readonly TipRule[] };
  readonly posting_times: readonly string[];
  readonly anti_patterns: readonly string[];
};

export type TrendSourceLabel = "tiktok" | "x" | "google";

export type TrendSeed = {
  readonly term: string;
  readonly category?: string;
  readonly volume?: number;
};

export type SampleCountryFeed = {
  readonly country: string;
} & Readonly<Record<TrendSourceLabel, readonly TrendSeed[]>>;

export type TrendsConfig = {
  readonly categories: Readonly<Record<string, readonly string[]>>;
  readonly sample_feed: Readonly<Record<string, SampleCountryFeed>>;
};

export type TrendFeedPage = {
  source?: string;
  country?: string;
  generated_at?: string;
  items: Array<{ term: string; category?: string; volume?: number }>;
};

export type ScriptRequestBody = {
  topic: string;
  niche: string;
  hook_style: string;
  length: string;
  target_audience?: string;
  tone?: string;
  include_cta: boolean;
  series_episode?: number;
};

export type AnalyzeRequestBody = {
  topic: string;
  niche: string;
};

export type SectionName = "hook" | "setup" | "content" | "payoff" | "cta";

export type ScriptSection = {
  readonly name: SectionName;
  readonly text: string;
  /** e.g. "0-3s" */
  readonly timecode: string;
  readonly start_s: number;
  readonly end_s: number;
  readonly visual_notes?: string;
  readonly points?: readonly string[];
};

export type GeneratedScript = {
  readonly topic: string;
  readonly niche: string;
  readonly hook_style: string;
  readonly length: LengthId;
  readonly hook: ScriptSection;
  readonly setup: ScriptSection;
  readonly content: ScriptSection;
  readonly payoff: ScriptSection;
  readonly cta: ScriptSection | null;
  readonly total_duration: number;
  readonly hook_score: number;
  readonly viral_potential: string;
  readonly hashtags: readonly string[];
  readonly tips: readonly string[];
};
