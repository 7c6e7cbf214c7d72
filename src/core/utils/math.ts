/**
 * Math Utilities
 *
 * Focused on palette math:
 * - Clamping and interpolation
 * - Evenly spaced sample positions
 * - Seeded, reproducible shuffling
 */

// ============================================================================
// Interpolation
// ============================================================================

/**
 * Clamp a value between min and max
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Linear interpolation between two values
 */
export function lerp(start: number, end: number, t: number): number {
  return start + (end - start) * t;
}

/**
 * n evenly spaced positions across [0, 1], both ends included
 * A single position sits at 0.
 *
 * @example
 * linspace(5) // [0, 0.25, 0.5, 0.75, 1]
 */
export function linspace(count: number): number[] {
  if (count <= 0) return [];
  if (count === 1) return [0];
  return Array.from({ length: count }, (_, i) => i / (count - 1));
}

// ============================================================================
// Seeded Randomness
// ============================================================================

export type RandomSource = () => number;

/**
 * mulberry32 PRNG: uniform floats in [0, 1), fully determined by the seed
 */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let z = state;
    z = Math.imul(z ^ (z >>> 15), z | 1);
    z ^= z + Math.imul(z ^ (z >>> 7), z | 61);
    return ((z ^ (z >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Generate random integer in range (inclusive) from a random source
 */
export function randomInt(min: number, max: number, random: RandomSource = Math.random): number {
  return Math.floor(random() * (max - min + 1)) + min;
}

/**
 * Fisher-Yates shuffle into a new array; the input is left untouched
 */
export function shuffle<T>(values: readonly T[], random: RandomSource = Math.random): T[] {
  const result = [...values];
  for (let i = result.length - 1; i > 0; i--) {
    const j = randomInt(0, i, random);
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}
