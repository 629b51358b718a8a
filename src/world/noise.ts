import { makeNoise2D } from 'fast-simplex-noise';

/**
 * Deterministic 2D noise sampled at an explicit frequency.
 * Implementations must be pure: the same (x, y, frequency) always yields the
 * same value in [0, 1], whatever else has been sampled before.
 */
export interface NoiseSource {
  sample(x: number, y: number, frequency: number): number;
}

// Simple mulberry32 PRNG
export function mulberry32(seed: number): () => number {
  let a = seed;
  return function() {
    a |= 0; a = a + 0x6D2B79F5 | 0;
    let t = Math.imul(a ^ a >>> 15, 1 | a);
    t = t + Math.imul(t ^ t >>> 7, 61 | t) ^ t;
    return ((t ^ t >>> 14) >>> 0) / 4294967296;
  };
}

/**
 * Simplex noise remapped from [-1, 1] to [0, 1]. The permutation table is
 * built once here from the seeded PRNG; after that the sampler holds no
 * mutable state, so rows can be sampled in any order.
 */
export function createNoiseSource(seed: number): NoiseSource {
  const noise2D = makeNoise2D(mulberry32(seed));
  return {
    sample(x: number, y: number, frequency: number): number {
      const value = (noise2D(x * frequency, y * frequency) + 1) * 0.5;
      return Math.min(1, Math.max(0, value));
    },
  };
}
