/**
 * Seeded pseudo-random source (mulberry32). Returns floats in [0, 1).
 */
export type RandomSource = () => number;

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
  return Math.floor(random() * maxExclusive);
}

/**
 * Two distinct indices from [0, size)
 */
export function pickTwoDistinct(random: RandomSource, size: number): [number, number] {
  const first = randomInt(random, size);
  let second = randomInt(random, size - 1);
  if (second >= first) second++;
  return [first, second];
}
