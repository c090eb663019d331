/** Returns a float in [0, 1). */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/** mulberry32: small, fast and good enough for shuffling quiz content. */
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

export function randomInt(random: RandomSource, maxExclusive: number): number {
  return Math.min(maxExclusive - 1, Math.floor(random() * maxExclusive));
}

export function shuffle<T>(items: readonly T[], random: RandomSource = defaultRandom): T[] {
  return sampleWithoutReplacement(items, items.length, random);
}

/**
 * Partial Fisher-Yates: the first `count` slots of the working copy end up as a
 * uniformly random ordered sample.
 */
export function sampleWithoutReplacement<T>(
  items: readonly T[],
  count: number,
  random: RandomSource = defaultRandom
): T[] {
  const working = [...items];
  const take = Math.max(0, Math.min(Math.floor(count), working.length));

  for (let index = 0; index < take; index += 1) {
    const swapIndex = index + randomInt(random, working.length - index);
    const current = working[index];
    working[index] = working[swapIndex];
    working[swapIndex] = current;
  }

  return working.slice(0, take);
}
