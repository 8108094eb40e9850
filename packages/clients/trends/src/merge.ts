import type { TrendSourceLabel } from "@viralscript/schemas";
import type { TrendItem, TrendLists } from "./index";

/** Source labels in merge priority order (platform-native first). */
export const TREND_SOURCES: readonly TrendSourceLabel[] = ["tiktok", "x", "google"];
export const MERGED_CAP = 15;

export function normalizeTerm(term: string): string {
  return term.toLowerCase().replace(/#/g, "").trim();
}

/**
 * Combines the per-source lists into one ranking: descending volume (items
 * without a volume rank last), then source priority, then original order.
 * Later duplicates of a term are dropped, whatever their casing or `#`.
 */
export function mergeTrends(lists: TrendLists, cap = MERGED_CAP): TrendItem[] {
  const seen = new Set<string>();
  const combined: Array<{ item: TrendItem; order: number }> = [];
  for (const source of TREND_SOURCES) {
    for (const item of lists[source]) {
      const key = normalizeTerm(item.term);
      if (!key || seen.has(key)) continue;
      seen.add(key);
      combined.push({ item, order: combined.length });
    }
  }
  combined.sort((a, b) => {
    const va = a.item.volume ?? -1;
    const vb = b.item.volume ?? -1;
    if (va !== vb) return vb - va;
    const pa = TREND_SOURCES.indexOf(a.item.source);
    const pb = TREND_SOURCES.indexOf(b.item.source);
    if (pa !== pb) return pa - pb;
    return a.order - b.order;
  });
  return combined.slice(0, Math.max(0, cap)).map((c) => c.item);
}
