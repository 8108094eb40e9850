import test from "node:test";
import assert from "node:assert/strict";
import fs from "fs";
import os from "os";
import path from "path";
import { CatalogLoadError, NotFoundError } from "@viralscript/shared";
import {
  CATALOG_FILES,
  DEFAULT_CATALOG_DIR,
  type CatalogData,
  createCatalog,
  loadCatalog,
  readCatalogData,
} from "../../apps/api/src/catalog";

const catalog = loadCatalog();

function freshData(): CatalogData {
  return structuredClone(readCatalogData());
}

function expectLoadError(data: CatalogData, pattern: RegExp) {
  assert.throws(
    () => createCatalog(data),
    (err: unknown) => err instanceof CatalogLoadError && pattern.test(err.message),
  );
}

test("loads every hook style, niche and length", () => {
  assert.deepEqual(
    catalog.hookStyles().map((h) => h.id),
    [
      "controversy",
      "curiosity_gap",
      "confession",
      "education",
      "fear_of_missing",
      "story_loop",
      "transformation",
    ],
  );
  assert.deepEqual(
    catalog.niches().map((n) => n.id),
    ["finance", "fitness", "lifestyle", "business", "comedy", "education", "custom"],
  );
  assert.deepEqual(
    catalog.lengths().map((l) => [l.id, l.total_seconds]),
    [
      ["short", 25],
      ["medium", 45],
      ["long", 75],
    ],
  );
});

test("lookups throw NotFoundError naming the field", () => {
  assert.throws(
    () => catalog.hookStyle("nonexistent"),
    (err: unknown) => err instanceof NotFoundError && err.field === "hook_style",
  );
  assert.throws(
    () => catalog.niche("gaming"),
    (err: unknown) => err instanceof NotFoundError && err.field === "niche" && err.id === "gaming",
  );
  assert.throws(() => catalog.length("epic"), NotFoundError);
});

test("auto resolves to the niche's first preferred hook", () => {
  assert.equal(catalog.bestHookFor("business").id, "education");
  assert.equal(catalog.resolveHookStyle("auto", "fitness").id, "transformation");
  assert.equal(catalog.resolveHookStyle("story_loop", "fitness").id, "story_loop");
});

test("catalog entries are frozen", () => {
  const niche = catalog.niche("business");
  assert.ok(Object.isFrozen(niche));
  assert.ok(Object.isFrozen(niche.hashtags));
});

test("duplicate niche hashtags are collapsed", () => {
  const data = freshData();
  const withDupes = data.niches.map((n) =>
    n.id === "business" ? { ...n, hashtags: ["#business", "#argent", "#business"] } : n,
  );
  const loaded = createCatalog({ ...data, niches: withDupes });
  assert.deepEqual(loaded.niche("business").hashtags, ["#business", "#argent"]);
});

test("rejects a hook template with an unknown placeholder", () => {
  const data = freshData();
  const hooks = data.hooks.map((h, i) =>
    i === 0 ? { ...h, templates: ["Le secret de {topic} pour {audience}"] } : h,
  );
  expectLoadError({ ...data, hooks }, /controversy\.templates\[0\]: unknown placeholder\(s\) \{audience\}/);
});

test("rejects duplicate hook ids", () => {
  const data = freshData();
  expectLoadError({ ...data, hooks: [...data.hooks, data.hooks[0]] }, /duplicate id "controversy"/);
});

test("rejects a catalog without the custom niche", () => {
  const data = freshData();
  expectLoadError(
    { ...data, niches: data.niches.filter((n) => n.id !== "custom") },
    /missing "custom" niche/,
  );
});

test("rejects a preferred hook that does not exist", () => {
  const data = freshData();
  const niches = data.niches.map((n) =>
    n.id === "comedy" ? { ...n, preferred_hooks: ["parody"] } : n,
  );
  expectLoadError({ ...data, niches }, /comedy: unknown preferred hook "parody"/);
});

test("rejects boundaries that collapse two sections", () => {
  const data = freshData();
  const lengths = data.lengths.map((l) =>
    l.id === "short" ? { ...l, boundaries: { hook: 0.1, setup: 0.11, content: 0.6, payoff: 0.8 } } : l,
  );
  expectLoadError({ ...data, lengths }, /short: boundaries must produce strictly increasing seconds, got 0,3,3,15,20,25/);
});

test("readCatalogData reports the file that fails to parse", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "catalog-"));
  try {
    for (const file of Object.values(CATALOG_FILES)) {
      fs.copyFileSync(path.join(DEFAULT_CATALOG_DIR, file), path.join(dir, file));
    }
    fs.writeFileSync(path.join(dir, CATALOG_FILES.niches), "[{");
    assert.throws(
      () => readCatalogData(dir),
      (err: unknown) =>
        err instanceof CatalogLoadError &&
        err.file === "niches.json" &&
        err.message.startsWith("niches.json: invalid JSON"),
    );
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

test("the shipped config directory loads", () => {
  const data = readCatalogData(DEFAULT_CATALOG_DIR);
  assert.deepEqual(Object.keys(data.trends.sample_feed), ["FR", "US"]);
  assert.equal(loadCatalog(DEFAULT_CATALOG_DIR).trends.sample_feed.FR.country, "France");
});

test("readCatalogData requires the French sample feed", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "catalog-"));
  try {
    for (const file of Object.values(CATALOG_FILES)) {
      fs.copyFileSync(path.join(DEFAULT_CATALOG_DIR, file), path.join(dir, file));
    }
    const trends = readCatalogData(dir).trends;
    const { FR: _fr, ...rest } = trends.sample_feed;
    fs.writeFileSync(
      path.join(dir, CATALOG_FILES.trends),
      JSON.stringify({ ...trends, sample_feed: rest }),
    );
    assert.throws(
      () => readCatalogData(dir),
      (err: unknown) => err instanceof CatalogLoadError && err.file === "trends.json",
    );
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

test("readCatalogData rejects a file that breaks its schema", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "catalog-"));
  try {
    for (const file of Object.values(CATALOG_FILES)) {
      fs.copyFileSync(path.join(DEFAULT_CATALOG_DIR, file), path.join(dir, file));
    }
    fs.writeFileSync(path.join(dir, CATALOG_FILES.hooks), JSON.stringify([{ id: "solo" }]));
    assert.throws(
      () => readCatalogData(dir),
      (err: unknown) => err instanceof CatalogLoadError && err.file === "hooks.json",
    );
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});
