/**
 * Random sources
 *
 * Pipeline composition, pacing and cooldowns draw from an injected
 * RandomSource. createSeededRandom gives reproducible runs; sequenceRandom
 * replays fixed values in tests.
 */

export interface RandomSource {
  /** Uniform float in [0, 1) */
  next(): number;
}

export const mathRandom: RandomSource = {
  next: () => Math.random(),
};

/**
 * mulberry32 PRNG
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return {
    next(): number {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/**
 * Cycles through the given values forever
 */
export function sequenceRandom(values: number[]): RandomSource {
  if (values.length === 0) {
    throw new Error('sequenceRandom needs at least one value');
  }
  for (const value of values) {
    if (value < 0 || value >= 1) {
      throw new Error(`sequenceRandom value out of range [0, 1): ${value}`);
    }
  }
  let index = 0;
  return {
    next(): number {
      const value = values[index % values.length];
      index++;
      return value;
    },
  };
}

/**
 * Integer in [min, max], both inclusive
 */
export function randomInt(random: RandomSource, min: number, max: number): number {
  const low = Math.ceil(Math.min(min, max));
  const high = Math.floor(Math.max(min, max));
  return low + Math.floor(random.next() * (high - low + 1));
}

export function pick<T>(random: RandomSource, items: readonly T[]): T | undefined {
  if (items.length === 0) return undefined;
  return items[Math.floor(random.next() * items.length)];
}

/**
 * Fisher-Yates shuffle into a new array
 */
export function shuffle<T>(random: RandomSource, items: readonly T[]): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random.next() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}
