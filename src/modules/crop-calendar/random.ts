import type { RandomSource } from "./types.js";

/**
 * Deterministic mulberry32 generator for reproducible selections.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4_294_967_296;
  };
}

export function pickOne<T>(items: readonly T[], random: RandomSource): T | undefined {
  if (items.length === 0) {
    return undefined;
  }
  const raw = random();
  const unit = Number.isFinite(raw) ? Math.min(Math.max(raw, 0), 1 - Number.EPSILON) : 0;
  return items[Math.floor(unit * items.length)];
}
