import type { Logger } from "pino";
import { TrendUnavailableError, deepFreeze } from "@viralscript/shared";
import {
  type TrendItem,
  type TrendLists,
  type TrendLocation,
  type TrendsFetchResult,
  mergeTrends,
} from "@viralscript/trends-client";

export const DEFAULT_TREND_TTL_MS = 30 * 60 * 1000;

/** Anything that can produce per-source trend lists; TrendsClient in production. */
export interface TrendProvider {
  fetchAll(): Promise<TrendsFetchResult>;
}

export type TrendSnapshot = {
  readonly perSource: Readonly<TrendLists>;
  readonly merged: readonly TrendItem[];
  readonly fetchedAt: string;
  readonly location: TrendLocation;
  /** Served from the previous fetch because the latest refresh failed. */
  readonly stale: boolean;
};

export type TrendCacheOptions = {
  ttlMs?: number;
  logger?: Logger;
  now?: () => number;
};

type Entry = { snapshot: TrendSnapshot; fetchedAtMs: number };

/**
 * Time-bounded cache in front of a TrendProvider. Concurrent callers that
 * find it empty or expired share a single in-flight refresh.
 */
export class TrendCache {
  private entry?: Entry;
  private inflight?: Promise<TrendSnapshot>;
  private readonly ttlMs: number;
  private readonly logger?: Logger;
  private readonly now: () => number;

  constructor(
    private readonly provider: TrendProvider,
    opts: TrendCacheOptions = {},
  ) {
    this.ttlMs = opts.ttlMs ?? DEFAULT_TREND_TTL_MS;
    this.logger = opts.logger;
    this.now = opts.now ?? Date.now;
  }

  get state(): "empty" | "fresh" | "expired" {
    if (!this.entry) return "empty";
    return this.isFresh(this.entry) ? "fresh" : "expired";
  }

  async fetch(forceRefresh = false): Promise<TrendSnapshot> {
    if (!forceRefresh && this.entry && this.isFresh(this.entry)) {
      return this.entry.snapshot;
    }
    return this.refresh();
  }

  private isFresh(entry: Entry): boolean {
    return this.now() - entry.fetchedAtMs < this.ttlMs;
  }

  private refresh(): Promise<TrendSnapshot> {
    if (!this.inflight) {
      this.inflight = this.load().finally(() => {
        this.inflight = undefined;
      });
    }
    return this.inflight;
  }

  private async load(): Promise<TrendSnapshot> {
    try {
      const result = await this.provider.fetchAll();
      const fetchedAtMs = this.now();
      const snapshot = deepFreeze<TrendSnapshot>({
        perSource: result.lists,
        merged: mergeTrends(result.lists),
        fetchedAt: new Date(fetchedAtMs).toISOString(),
        location: result.location,
        stale: false,
      });
      this.entry = { snapshot, fetchedAtMs };
      if (result.errors.length) {
        this.logger?.warn({ errors: result.errors }, "trends.refresh.partial");
      }
      this.logger?.info(
        { merged: snapshot.merged.length, latency_ms: result.latency_ms },
        "trends.refreshed",
      );
      return snapshot;
    } catch (err) {
      this.logger?.warn({ err }, "trends.refresh.failed");
      if (this.entry) return deepFreeze({ ...this.entry.snapshot, stale: true });
      throw new TrendUnavailableError(err instanceof Error ? err.message : String(err));
    }
  }
}
