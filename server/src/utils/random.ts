/**
 * Random sources for asset selection
 */

/** Returns a float in [0, 1) */
export type Rng = () => number;

export const defaultRng: Rng = Math.random;

const MODULUS = 2147483647; // 2^31 - 1
const MULTIPLIER = 48271;

/**
 * Lehmer (MINSTD) generator; the same seed always yields the same sequence.
 */
export function createSeededRng(seed: number): Rng {
  let state = Math.abs(Math.floor(seed)) % MODULUS;
  if (state === 0) state = 1;
  return () => {
    state = (state * MULTIPLIER) % MODULUS;
    return (state - 1) / (MODULUS - 1);
  };
}

export function pickIndex(length: number, rng: Rng): number {
  return Math.min(length - 1, Math.floor(rng() * length));
}
