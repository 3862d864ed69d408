/**
 * Seeded random source
 *
 * mulberry32 generator wrapped in a small class so sampling stages receive an
 * explicit instance instead of reaching for Math.random().
 */

import type { RandomSource } from './types.js';

export class SeededRandom implements RandomSource {
  readonly seed: number;
  private state: number;

  constructor(seed: number) {
    this.seed = seed >>> 0;
    this.state = this.seed;
  }

  /** Uniform in [0, 1) */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let r = Math.imul(this.state ^ (this.state >>> 15), this.state | 1);
    r ^= r + Math.imul(r ^ (r >>> 7), r | 61);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  }
}

/**
 * Integer in [0, maxExclusive)
 */
export function nextInt(random: RandomSource, maxExclusive: number): number {
  const m = Math.trunc(maxExclusive);
  if (!Number.isFinite(m) || m <= 0) {
    throw new Error('nextInt(maxExclusive) requires maxExclusive > 0');
  }
  return Math.min(m - 1, Math.floor(random.next() * m));
}

/**
 * Fisher-Yates shuffle. Returns a new array.
 */
export function shuffle<T>(items: readonly T[], random: RandomSource): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i -= 1) {
    const j = nextInt(random, i + 1);
    const tmp = result[i];
    result[i] = result[j];
    result[j] = tmp;
  }
  return result;
}

/**
 * Seeded source for the given seed, or a fresh seed when none is configured.
 * The seed is kept on the instance so runs can be reproduced.
 */
export function createRandom(seed?: number): SeededRandom {
  return new SeededRandom(seed ?? Math.floor(Math.random() * 0x1_0000_0000));
}
