/**
 * Explicit random source threaded through every sampling call.
 * A single seeded stream keeps a whole run reproducible.
 */
export interface RandomSource {
  /** Returns a float in [0, 1). */
  next(): number;
}

/**
 * mulberry32 generator
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }
}

export function seedFromClock(): number {
  return (Date.now() ^ Math.floor(Math.random() * 0xffffffff)) >>> 0;
}

/** Integer in [min, max]. */
export function randomInt(rng: RandomSource, min: number, max: number): number {
  return Math.floor(rng.next() * (max - min + 1)) + min;
}

/** Float in [min, max). */
export function randomFloat(rng: RandomSource, min: number, max: number): number {
  return rng.next() * (max - min) + min;
}

export function chance(rng: RandomSource, p: number): boolean {
  return rng.next() < p;
}

export function pick<T>(rng: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error('Cannot pick from an empty list');
  }
  return items[Math.min(items.length - 1, Math.floor(rng.next() * items.length))];
}

/**
 * Index drawn proportionally to `weights`. Weights need not sum to 1;
 * an all-zero list degrades to a uniform pick.
 */
export function weightedIndex(rng: RandomSource, weights: readonly number[]): number {
  const total = weights.reduce((sum, w) => sum + Math.max(0, w), 0);
  if (total <= 0) {
    return Math.min(weights.length - 1, Math.floor(rng.next() * weights.length));
  }
  let r = rng.next() * total;
  for (let i = 0; i < weights.length; i++) {
    r -= Math.max(0, weights[i]);
    if (r < 0) return i;
  }
  return weights.length - 1;
}

/**
 * Normal draw via Box-Muller. `1 - next()` keeps the log argument in (0, 1].
 */
export function normal(rng: RandomSource, mean: number, stdDev: number): number {
  const u1 = 1 - rng.next();
  const u2 = rng.next();
  const z0 = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  return z0 * stdDev + mean;
}
