import { createHash } from "crypto";

/**
 * Deterministic stand-in for randomness: the first 32 bits of
 * sha256("<salt>:<topic>"). Identical topics always select the same
 * templates and points; distinct topics spread across the pools.
 */
export function topicHash(topic: string, salt: string): number {
  return createHash("sha256").update(`${salt}:${topic}`).digest().readUInt32BE(0);
}

export function pickIndex(topic: string, salt: string, size: number): number {
  return size > 0 ? topicHash(topic, salt) % size : 0;
}

/** `count` consecutive entries starting at `start`, wrapping around. */
export function takeWrapped<T>(pool: readonly T[], start: number, count: number): T[] {
  const n = Math.min(count, pool.length);
  return Array.from({ length: n }, (_, i) => pool[(start + i) % pool.length]);
}

export function selectPoints(
  bank: readonly string[],
  topic: string,
  range: { readonly min: number; readonly max: number },
): string[] {
  const span = range.max - range.min + 1;
  const count = range.min + (topicHash(topic, "points-count") % span);
  return takeWrapped(bank, pickIndex(topic, "points", bank.length), count);
}
