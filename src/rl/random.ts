/**
 * Random Sources
 *
 * Every stochastic draw in the simulator and learners goes through a
 * RandomSource so runs can be replayed from a seed.
 */

/**
 * A source of uniform floats in [0, 1).
 */
export interface RandomSource {
  next(): number;
}

/**
 * Unseeded source backed by Math.random.
 */
export const defaultRandom: RandomSource = {
  next: () => Math.random(),
};

/**
 * Seeded Mulberry32 generator.
 */
export function createSeededRandom(seed: number): RandomSource {
  let s = seed >>> 0;
  return {
    next(): number {
      s += 0x6d2b79f5;
      let t = Math.imul(s ^ (s >>> 15), 1 | s);
      t ^= t + Math.imul(t ^ (t >>> 7), 61 | t);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/**
 * Uniform float in [min, max).
 */
export function uniform(random: RandomSource, min: number, max: number): number {
  return min + random.next() * (max - min);
}

/**
 * Uniform integer in [0, n).
 */
export function randomInt(random: RandomSource, n: number): number {
  return Math.min(n - 1, Math.floor(random.next() * n));
}

/**
 * Pick one element uniformly.
 */
export function pick<T>(random: RandomSource, values: readonly T[]): T {
  if (values.length === 0) {
    throw new Error("Cannot pick from empty array");
  }
  return values[randomInt(random, values.length)];
}
