import test from "node:test";
import assert from "node:assert/strict";
import { DEFAULT_CATALOG_DIR } from "../../apps/api/src/catalog";
import { loadConfig } from "../../apps/api/src/config";

test("loadConfig falls back to defaults", () => {
  assert.deepEqual(loadConfig({}), {
    port: 4000,
    logLevel: "info",
    catalogDir: DEFAULT_CATALOG_DIR,
    corsOrigin: "*",
    trends: {
      apiKey: "",
      baseUrl: undefined,
      country: "FR",
      cacheTtlMs: 1_800_000,
      timeoutMs: 15000,
    },
  });
});

test("loadConfig reads the environment", () => {
  const config = loadConfig({
    PORT: "8080",
    LOG_LEVEL: "debug",
    CORS_ORIGIN: "http://localhost:3000",
    TRENDS_API_KEY: "test-key",
    TRENDS_BASE_URL: "http://trends.test",
    TRENDS_COUNTRY: "us",
    TRENDS_CACHE_TTL_MS: "60000",
    TRENDS_TIMEOUT_MS: "2500",
  });
  assert.equal(config.port, 8080);
  assert.equal(config.logLevel, "debug");
  assert.equal(config.corsOrigin, "http://localhost:3000");
  assert.deepEqual(config.trends, {
    apiKey: "test-key",
    baseUrl: "http://trends.test",
    country: "US",
    cacheTtlMs: 60000,
    timeoutMs: 2500,
  });
});

test("loadConfig ignores malformed numbers", () => {
  const config = loadConfig({ PORT: "abc", TRENDS_CACHE_TTL_MS: "-5", TRENDS_TIMEOUT_MS: "" });
  assert.equal(config.port, 4000);
  assert.equal(config.trends.cacheTtlMs, 1_800_000);
  assert.equal(config.trends.timeoutMs, 15000);
});
