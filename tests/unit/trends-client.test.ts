import test from "node:test";
import assert from "node:assert/strict";
import {
  TrendsClient,
  buildUrl,
  categorizeError,
  categorizeTrend,
} from "@viralscript/trends-client";
import { loadCatalog } from "../../apps/api/src/catalog";

const config = loadCatalog().trends;

test("without an API key the sample feed is served", async () => {
  const client = new TrendsClient({ config });
  assert.equal(client.usesSampleFeed, true);
  const result = await client.fetchAll();
  assert.equal(result.lists.tiktok.length, 8);
  assert.equal(result.lists.x.length, 6);
  assert.equal(result.lists.google.length, 5);
  assert.deepEqual(result.lists.tiktok[0], {
    term: "#sidehustle2026",
    source: "tiktok",
    category: "business",
    volume: 184000,
    rank: 1,
  });
  assert.deepEqual(result.lists.x[3], { term: "Ligue 1", source: "x", category: "sport", rank: 4 });
  assert.deepEqual(result.errors, []);
  assert.deepEqual(result.location, { country: "France", country_code: "FR" });
  assert.match(result.request_id, /^tr_[0-9a-f]{8}$/);
});

test("the dev key and per-source limit apply to the sample feed", async () => {
  const client = new TrendsClient({ apiKey: "dev", country: "us", perSourceLimit: 2, config });
  assert.equal(client.usesSampleFeed, true);
  const result = await client.fetchAll();
  assert.deepEqual(
    result.lists.tiktok.map((t) => t.term),
    ["#newyeargoals", "#sidehustleideas"],
  );
  assert.deepEqual(result.location, { country: "United States", country_code: "US" });
});

test("an unknown country falls back to the French sample feed", async () => {
  const client = new TrendsClient({ country: "de", config });
  const result = await client.fetchAll();
  assert.equal(result.lists.google[0].term, "Side hustle 2026");
  assert.deepEqual(result.location, { country: "DE", country_code: "DE" });
});

test("live mode queries every source and keeps partial results", async (t) => {
  const requested: string[] = [];
  t.mock.method(globalThis, "fetch", async (input: string | URL | Request) => {
    const url = new URL(String(input));
    requested.push(url.toString());
    const source = url.searchParams.get("source");
    if (source === "x") {
      return new Response("slow down", { status: 429, statusText: "Too Many Requests" });
    }
    if (source === "google") {
      return new Response(JSON.stringify({ generated_at: "yesterday" }), { status: 200 });
    }
    return new Response(
      JSON.stringify({
        items: [
          { term: " #NewYearGoals ", volume: 10 },
          { term: "budget tips" },
          { term: "third" },
        ],
      }),
      { status: 200 },
    );
  });

  const client = new TrendsClient({
    apiKey: "test-key",
    baseUrl: "http://trends.test",
    country: "US",
    perSourceLimit: 2,
    config,
  });
  const result = await client.fetchAll();

  assert.deepEqual(requested.sort(), [
    "http://trends.test/v1/trends?source=google&country=US&limit=2",
    "http://trends.test/v1/trends?source=tiktok&country=US&limit=2",
    "http://trends.test/v1/trends?source=x&country=US&limit=2",
  ]);
  assert.deepEqual(result.lists.tiktok, [
    { term: "#NewYearGoals", source: "tiktok", category: "general", volume: 10, rank: 1 },
    { term: "budget tips", source: "tiktok", category: "business", rank: 2 },
  ]);
  assert.deepEqual(result.lists.x, []);
  assert.deepEqual(result.lists.google, []);
  assert.deepEqual(
    result.errors.map((e) => [e.source, e.category]),
    [
      ["x", "rate_limit"],
      ["google", "api_error"],
    ],
  );
  assert.equal(result.errors[0].message, "HTTP 429 Too Many Requests: slow down");
});

test("live mode fails when every source fails", async (t) => {
  t.mock.method(globalThis, "fetch", async () => new Response("down", { status: 500 }));
  const client = new TrendsClient({ apiKey: "test-key", baseUrl: "http://trends.test", config });
  await assert.rejects(client.fetchAll(), {
    message: "trends_fetch_failed tiktok:api_error,x:api_error,google:api_error",
  });
});

test("categorizeTrend matches keywords case-insensitively", () => {
  assert.equal(categorizeTrend("NBA Finals", config.categories), "sport");
  assert.equal(categorizeTrend("Meteo neige", config.categories), "general");
});

test("categorizeError buckets fetch failures", () => {
  assert.equal(categorizeError(new Error("HTTP 429 Too Many Requests")), "rate_limit");
  assert.equal(categorizeError(new Error("This operation was aborted")), "timeout");
  assert.equal(categorizeError(new Error("fetch failed")), "network");
  assert.equal(categorizeError("weird"), "api_error");
});

test("buildUrl joins paths and skips empty parameters", () => {
  assert.equal(
    buildUrl("https://api.example.com/base", "/v1/trends", { source: "x", country: "", limit: 5 }),
    "https://api.example.com/base/v1/trends?source=x&limit=5",
  );
});
