/**
 * Random helpers for synthetic data.
 *
 * Everything takes an explicit RandomSource so runs can be reproduced from a
 * seed and tests can pin the sequence.
 *
 * @module random
 */

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/**
 * mulberry32 PRNG. Same seed, same sequence.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Integer in [min, maxExclusive). */
export function randomInt(random: RandomSource, min: number, maxExclusive: number): number {
  if (maxExclusive <= min) {
    throw new RangeError(`Empty integer range [${min}, ${maxExclusive})`);
  }
  return min + Math.floor(random() * (maxExclusive - min));
}

export function pick<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new RangeError("Cannot pick from an empty list");
  }
  return items[randomInt(random, 0, items.length)];
}

/**
 * Pick one item with probability proportional to its weight.
 * Weights need not sum to 1.
 */
export function weightedPick<T>(
  random: RandomSource,
  items: readonly T[],
  weightOf: (item: T) => number,
): T {
  const total = items.reduce((sum, item) => sum + weightOf(item), 0);
  if (items.length === 0 || total <= 0) {
    throw new RangeError("Cannot pick from an empty or zero-weight list");
  }

  let threshold = random() * total;
  for (const item of items) {
    threshold -= weightOf(item);
    if (threshold < 0) return item;
  }
  // Float rounding can leave a sliver past the last bucket
  return items[items.length - 1];
}
