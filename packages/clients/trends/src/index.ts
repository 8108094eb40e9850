import { randomUUID } from "crypto";
import { assertValid, compileSchema } from "@viralscript/shared";
import { trendFeedSchema } from "@viralscript/schemas";
import type {
  TrendFeedPage,
  TrendSeed,
  TrendSourceLabel,
  TrendsConfig,
} from "@viralscript/schemas";
import { TREND_SOURCES } from "./merge";

export * from "./merge";

export const PER_SOURCE_CAP = 10;

export type TrendItem = {
  readonly term: string;
  readonly source: TrendSourceLabel;
  readonly category: string;
  readonly volume?: number;
  /** 1-based position within its source list */
  readonly rank: number;
};

export type TrendLists = Record<TrendSourceLabel, TrendItem[]>;

export type TrendLocation = {
  country: string;
  country_code: string;
};

export type TrendsClientOptions = {
  /** Empty or "dev" serves the built-in sample feed. */
  apiKey?: string;
  baseUrl?: string;
  userAgent?: string;
  country?: string;
  timeoutMs?: number;
  perSourceLimit?: number;
  config: TrendsConfig;
};

export type TrendsFetchResult = {
  lists: TrendLists;
  errors: Array<{
    source: TrendSourceLabel;
    category: string;
    message: string;
  }>;
  location: TrendLocation;
  latency_ms: number;
  request_id: string;
};

const validateFeed = compileSchema<TrendFeedPage>(trendFeedSchema);

export class TrendsClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly countryCode: string;
  private readonly timeoutMs: number;
  private readonly perSourceLimit: number;
  private readonly config: TrendsConfig;

  constructor(opts: TrendsClientOptions) {
    this.apiKey = opts.apiKey || "";
    this.baseUrl = opts.baseUrl || "https://api.trends.example";
    this.userAgent = opts.userAgent || "viralscript/0.1 (+trends)";
    this.countryCode = (opts.country || "FR").toUpperCase();
    this.timeoutMs = typeof opts.timeoutMs === "number" ? opts.timeoutMs : 15000;
    this.perSourceLimit = Math.max(
      1,
      Math.min(PER_SOURCE_CAP, opts.perSourceLimit ?? PER_SOURCE_CAP),
    );
    this.config = opts.config;
  }

  get usesSampleFeed(): boolean {
    return !this.apiKey || this.apiKey === "dev";
  }

  get location(): TrendLocation {
    const feed = this.config.sample_feed[this.countryCode];
    return {
      country: feed ? feed.country : this.countryCode,
      country_code: this.countryCode,
    };
  }

  // Fetches every source in parallel; rejects only when all of them fail
  async fetchAll(): Promise<TrendsFetchResult> {
    const start = Date.now();
    const settled = await Promise.allSettled(
      TREND_SOURCES.map((source) => this.fetchSource(source)),
    );
    const lists: TrendLists = { tiktok: [], x: [], google: [] };
    const errors: TrendsFetchResult["errors"] = [];
    settled.forEach((outcome, i) => {
      const source = TREND_SOURCES[i];
      if (outcome.status === "fulfilled") {
        lists[source] = outcome.value;
      } else {
        errors.push({
          source,
          category: categorizeError(outcome.reason),
          message: errorMessage(outcome.reason),
        });
      }
    });
    if (errors.length === TREND_SOURCES.length) {
      throw new Error(
        `trends_fetch_failed ${errors.map((e) => `${e.source}:${e.category}`).join(",")}`,
      );
    }
    return {
      lists,
      errors,
      location: this.location,
      latency_ms: Date.now() - start,
      request_id: `tr_${randomUUID().slice(0, 8)}`,
    };
  }

  async fetchSource(source: TrendSourceLabel): Promise<TrendItem[]> {
    if (this.usesSampleFeed) {
      const feed =
        this.config.sample_feed[this.countryCode] ?? this.config.sample_feed["FR"];
      return this.toItems(source, feed ? feed[source] : []);
    }

    const url = buildUrl(this.baseUrl, "/v1/trends", {
      source,
      country: this.countryCode,
      limit: this.perSourceLimit,
    });
    const body = await fetchJson(
      url,
      {
        method: "GET",
        headers: {
          "x-api-key": this.apiKey,
          Accept: "application/json",
          "User-Agent": this.userAgent,
        },
      },
      this.timeoutMs,
    );
    const page = assertValid(validateFeed, body, "trend_feed");
    return this.toItems(source, page.items);
  }

  categorize(term: string): string {
    return categorizeTrend(term, this.config.categories);
  }

  private toItems(source: TrendSourceLabel, seeds: readonly TrendSeed[]): TrendItem[] {
    return seeds.slice(0, this.perSourceLimit).map((seed, i) => {
      const term = seed.term.trim();
      return {
        term,
        source,
        category: seed.category || this.categorize(term),
        ...(typeof seed.volume === "number" ? { volume: seed.volume } : {}),
        rank: i + 1,
      };
    });
  }
}

export function categorizeTrend(
  term: string,
  categories: TrendsConfig["categories"],
): string {
  const t = term.toLowerCase();
  for (const [category, keywords] of Object.entries(categories)) {
    if (keywords.some((kw) => t.includes(kw))) return category;
  }
  return "general";
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function categorizeError(err: unknown): string {
  const msg = errorMessage(err);
  if (/rate limit|429/i.test(msg)) return "rate_limit";
  if (/timeout|abort/i.test(msg)) return "timeout";
  if (/network|ENOTFOUND|ECONN|fetch failed/i.test(msg)) return "network";
  return "api_error";
}

async function fetchJson(
  url: string,
  init: RequestInit,
  timeoutMs = 15000,
): Promise<unknown> {
  const ac = new AbortController();
  const timer = setTimeout(() => ac.abort(), timeoutMs);
  try {
    const res = await fetch(url, { ...init, signal: ac.signal });
    if (!res.ok) {
      const body = await res.text().catch(() => "");
      throw new Error(`HTTP ${res.status} ${res.statusText}: ${body}`);
    }
    return await res.json();
  } finally {
    clearTimeout(timer);
  }
}

export function buildUrl(
  base: string,
  path: string,
  params: Record<string, string | number | boolean | undefined>,
): string {
  const url = new URL(
    path.replace(/^\//, ""),
    base.endsWith("/") ? base : base + "/",
  );
  for (const [k, v] of Object.entries(params)) {
    if (v === undefined || v === "") continue;
    url.searchParams.set(k, String(v));
  }
  return url.toString();
}
