import fs from "fs";
import path from "path";
import type { ValidateFunction } from "ajv";
import {
  CatalogLoadError,
  NotFoundError,
  ajv,
  compileSchema,
  deepFreeze,
} from "@viralscript/shared";
import {
  assemblySchema,
  hooksSchema,
  lengthsSchema,
  nichesSchema,
  trendsConfigSchema,
} from "@viralscript/schemas";
import type {
  AssemblyRules,
  HookStyle,
  LengthProfile,
  NicheProfile,
  TrendsConfig,
} from "@viralscript/schemas";
import { type TemplateKind, unknownPlaceholders } from "./template";
import { scaledBoundaries } from "./timeline";

export const DEFAULT_CATALOG_DIR = path.resolve(__dirname, "../../../config");
export const AUTO_HOOK_STYLE = "auto";
export const DEFAULT_NICHE = "custom";
export const DEFAULT_LENGTH = "medium";

export const CATALOG_FILES = {
  hooks: "hooks.json",
  niches: "niches.json",
  lengths: "lengths.json",
  assembly: "assembly.json",
  trends: "trends.json",
} as const;

export type CatalogData = {
  hooks: readonly HookStyle[];
  niches: readonly NicheProfile[];
  lengths: readonly LengthProfile[];
  assembly: AssemblyRules;
  trends: TrendsConfig;
};

const validators = {
  hooks: compileSchema<HookStyle[]>(hooksSchema),
  niches: compileSchema<NicheProfile[]>(nichesSchema),
  lengths: compileSchema<LengthProfile[]>(lengthsSchema),
  assembly: compileSchema<AssemblyRules>(assemblySchema),
  trends: compileSchema<TrendsConfig>(trendsConfigSchema),
};

export class Catalog {
  private readonly hooksById: ReadonlyMap<string, HookStyle>;
  private readonly nichesById: ReadonlyMap<string, NicheProfile>;
  private readonly lengthsById: ReadonlyMap<string, LengthProfile>;
  readonly assembly: AssemblyRules;
  readonly trends: TrendsConfig;

  constructor(private readonly data: CatalogData) {
    this.hooksById = new Map(data.hooks.map((h) => [h.id, h]));
    this.nichesById = new Map(data.niches.map((n) => [n.id, n]));
    this.lengthsById = new Map(data.lengths.map((l) => [l.id, l]));
    this.assembly = data.assembly;
    this.trends = data.trends;
  }

  hookStyle(id: string): HookStyle {
    const hook = this.hooksById.get(id);
    if (!hook) throw new NotFoundError("hook_style", id);
    return hook;
  }

  niche(id: string): NicheProfile {
    const niche = this.nichesById.get(id);
    if (!niche) throw new NotFoundError("niche", id);
    return niche;
  }

  length(id: string): LengthProfile {
    const length = this.lengthsById.get(id);
    if (!length) throw new NotFoundError("length", id);
    return length;
  }

  hookStyles(): readonly HookStyle[] {
    return this.data.hooks;
  }

  niches(): readonly NicheProfile[] {
    return this.data.niches;
  }

  lengths(): readonly LengthProfile[] {
    return this.data.lengths;
  }

  /** The niche's first preferred hook style. */
  bestHookFor(nicheId: string): HookStyle {
    const [first] = this.niche(nicheId).preferred_hooks;
    return first ? this.hookStyle(first) : this.data.hooks[0];
  }

  /** Resolves "auto" against the niche before looking the style up. */
  resolveHookStyle(id: string, nicheId: string): HookStyle {
    return id === AUTO_HOOK_STYLE ? this.bestHookFor(nicheId) : this.hookStyle(id);
  }
}

function readJsonFile(dir: string, file: string): unknown {
  const fullPath = path.join(dir, file);
  let raw: string;
  try {
    raw = fs.readFileSync(fullPath, "utf8");
  } catch (err) {
    throw new CatalogLoadError(file, `cannot read ${fullPath}: ${String(err)}`);
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new CatalogLoadError(file, `invalid JSON: ${String(err)}`);
  }
}

function validateFile<T>(validator: ValidateFunction<T>, data: unknown, file: string): T {
  if (validator(data)) return data;
  throw new CatalogLoadError(
    file,
    ajv.errorsText(validator.errors, { dataVar: file.replace(/\.json$/, "") }),
  );
}

/** Reads and schema-validates every catalog file without cross-checking them. */
export function readCatalogData(dir = DEFAULT_CATALOG_DIR): CatalogData {
  const read = <T>(validator: ValidateFunction<T>, file: string): T =>
    validateFile(validator, readJsonFile(dir, file), file);
  return {
    hooks: read(validators.hooks, CATALOG_FILES.hooks),
    niches: read(validators.niches, CATALOG_FILES.niches),
    lengths: read(validators.lengths, CATALOG_FILES.lengths),
    assembly: read(validators.assembly, CATALOG_FILES.assembly),
    trends: read(validators.trends, CATALOG_FILES.trends),
  };
}

/** Loads the catalog once at startup. Any problem is a CatalogLoadError. */
export function loadCatalog(dir = DEFAULT_CATALOG_DIR): Catalog {
  return createCatalog(readCatalogData(dir));
}

export function createCatalog(data: CatalogData): Catalog {
  const niches = data.niches.map((n) => ({ ...n, hashtags: dedupe(n.hashtags) }));
  const checked: CatalogData = { ...data, niches };
  checkCatalog(checked);
  return new Catalog(deepFreeze(structuredClone(checked)));
}

function dedupe(tags: readonly string[]): string[] {
  return Array.from(new Set(tags));
}

function checkCatalog(data: CatalogData): void {
  const { hooks, niches, lengths, assembly } = data;
  const hookIds = uniqueIds(hooks, CATALOG_FILES.hooks);
  const nicheIds = uniqueIds(niches, CATALOG_FILES.niches);
  const lengthIds = uniqueIds(lengths, CATALOG_FILES.lengths);

  const expect = (ok: boolean, file: string, message: string) => {
    if (!ok) throw new CatalogLoadError(file, message);
  };
  const checkTemplate = (template: string, kind: TemplateKind, file: string, where: string) => {
    const unknown = unknownPlaceholders(template, kind);
    expect(
      unknown.length === 0,
      file,
      `${where}: unknown placeholder(s) ${unknown.map((u) => `{${u}}`).join(", ")}`,
    );
  };

  for (const hook of hooks) {
    hook.templates.forEach((t, i) =>
      checkTemplate(t, "hook", CATALOG_FILES.hooks, `${hook.id}.templates[${i}]`),
    );
  }

  expect(nicheIds.has(DEFAULT_NICHE), CATALOG_FILES.niches, `missing "${DEFAULT_NICHE}" niche`);
  expect(lengthIds.has(DEFAULT_LENGTH), CATALOG_FILES.lengths, `missing "${DEFAULT_LENGTH}" length`);
  for (const niche of niches) {
    const file = CATALOG_FILES.niches;
    for (const hookId of niche.preferred_hooks) {
      expect(hookIds.has(hookId), file, `${niche.id}: unknown preferred hook "${hookId}"`);
    }
    expect(
      lengthIds.has(niche.optimal_length),
      file,
      `${niche.id}: unknown optimal_length "${niche.optimal_length}"`,
    );
    expect(
      niche.point_bank.length >= assembly.content_points.max,
      file,
      `${niche.id}: point_bank needs at least ${assembly.content_points.max} entries`,
    );
    niche.point_bank.forEach((p, i) =>
      checkTemplate(p, "point", file, `${niche.id}.point_bank[${i}]`),
    );
    const overrides = niche.section_overrides;
    if (overrides?.hook) checkTemplate(overrides.hook, "hookOverride", file, `${niche.id}.hook`);
    if (overrides?.setup) checkTemplate(overrides.setup, "section", file, `${niche.id}.setup`);
    if (overrides?.payoff) checkTemplate(overrides.payoff, "section", file, `${niche.id}.payoff`);
  }

  for (const length of lengths) {
    const marks = [0, ...scaledBoundaries(length), length.total_seconds];
    const increasing = marks.every((m, i) => i === 0 || m > marks[i - 1]);
    expect(
      increasing,
      CATALOG_FILES.lengths,
      `${length.id}: boundaries must produce strictly increasing seconds, got ${marks.join(",")}`,
    );
  }

  const file = CATALOG_FILES.assembly;
  const t = assembly.templates;
  checkTemplate(t.setup, "section", file, "templates.setup");
  checkTemplate(t.setup_audience, "sectionAudience", file, "templates.setup_audience");
  checkTemplate(t.content_intro, "section", file, "templates.content_intro");
  checkTemplate(t.payoff, "section", file, "templates.payoff");
  checkTemplate(t.payoff_audience, "sectionAudience", file, "templates.payoff_audience");
  checkTemplate(t.series_prefix, "series", file, "templates.series_prefix");
  for (const [name, note] of Object.entries(assembly.visual_notes)) {
    checkTemplate(note, "visual", file, `visual_notes.${name}`);
  }
  assembly.cta_pool.forEach((c, i) => checkTemplate(c, "cta", file, `cta_pool[${i}]`));

  expect(
    assembly.content_points.min <= assembly.content_points.max,
    file,
    "content_points.min must not exceed content_points.max",
  );

  const thresholds = assembly.viral_potential;
  expect(
    thresholds.every((th, i) => i === 0 || th.min < thresholds[i - 1].min),
    file,
    "viral_potential thresholds must be in strictly descending order",
  );
  expect(
    thresholds[thresholds.length - 1].min === 0,
    file,
    "the last viral_potential threshold must start at 0",
  );

  assembly.tips.rules.forEach((rule, i) => {
    const refs: Array<[readonly string[] | undefined, Set<string>, string]> = [
      [rule.when.length, lengthIds, "length"],
      [rule.when.niche, nicheIds, "niche"],
      [rule.when.hook_style, hookIds, "hook_style"],
    ];
    for (const [ids, known, kind] of refs) {
      for (const id of ids ?? []) {
        expect(known.has(id), file, `tips.rules[${i}]: unknown ${kind} "${id}"`);
      }
    }
  });
}

function uniqueIds(items: ReadonlyArray<{ id: string }>, file: string): Set<string> {
  const ids = new Set<string>();
  for (const item of items) {
    if (ids.has(item.id)) throw new CatalogLoadError(file, `duplicate id "${item.id}"`);
    ids.add(item.id);
  }
  return ids;
}
