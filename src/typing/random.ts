/**
 * Random sources for word sampling
 *
 * Sessions never call Math.random directly; they take a RandomSource so a
 * seeded generator can make the sample reproducible.
 */

export interface RandomSource {
  /** Float in [0, 1) */
  float(): number;
  /** Integer in [min, max] inclusive */
  int(min: number, max: number): number;
}

function fromFloat(next: () => number): RandomSource {
  return {
    float: next,
    int: (min, max) => min + Math.floor(next() * (max - min + 1)),
  };
}

export const defaultRandom: RandomSource = fromFloat(Math.random);

/**
 * Seeded generator (mulberry32). Same seed, same sequence.
 */
export function createRng(seed: number): RandomSource {
  let state = seed >>> 0;
  return fromFloat(() => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  });
}

/**
 * Pick `count` items without replacement (partial Fisher-Yates).
 * Returns every item, shuffled, when the pool is smaller than `count`.
 */
export function sampleWithoutReplacement<T>(
  pool: readonly T[],
  count: number,
  random: RandomSource
): T[] {
  const items = [...pool];
  const take = Math.min(count, items.length);
  for (let i = 0; i < take; i++) {
    const j = random.int(i, items.length - 1);
    const picked = items[j];
    items[j] = items[i];
    items[i] = picked;
  }
  return items.slice(0, take);
}
