import { DEFAULT_CATALOG_DIR } from "./catalog";
import { DEFAULT_TREND_TTL_MS } from "./trendCache";

export type AppConfig = {
  port: number;
  logLevel: string;
  catalogDir: string;
  corsOrigin: string;
  trends: {
    apiKey: string;
    baseUrl?: string;
    country: string;
    cacheTtlMs: number;
    timeoutMs: number;
  };
};

function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return value && Number.isFinite(parsed) && parsed >= 0 ? Math.floor(parsed) : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: intFromEnv(env.PORT, 4000),
    logLevel: env.LOG_LEVEL || "info",
    catalogDir: env.CATALOG_DIR || DEFAULT_CATALOG_DIR,
    corsOrigin: env.CORS_ORIGIN || "*",
    trends: {
      apiKey: env.TRENDS_API_KEY || "",
      baseUrl: env.TRENDS_BASE_URL || undefined,
      country: (env.TRENDS_COUNTRY || "FR").toUpperCase(),
      cacheTtlMs: intFromEnv(env.TRENDS_CACHE_TTL_MS, DEFAULT_TREND_TTL_MS),
      timeoutMs: intFromEnv(env.TRENDS_TIMEOUT_MS, 15000),
    },
  };
}
