/**
 * Sampler
 * Continuous color function + n -> ordered discrete colors
 */

import { linspace, seededRandom, shuffle as shuffleWith } from "../../../core/utils/math";
import type { ContinuousColorFunction, HexColor } from "./types";

export const SHUFFLE_SEED = 333;

/**
 * Evaluate fn at i/(n-1) (t=0 when n=1), then apply the order transforms
 * Shuffle permutes the forward sequence and takes precedence over reverse.
 *
 * @example
 * sample(createRamp(["#000000", "#FFFFFF"]), 3, true, false) // ["#FFFFFF", "#808080", "#000000"]
 */
export function sample(
  fn: ContinuousColorFunction,
  n: number,
  reverse = false,
  shuffle = false
): HexColor[] {
  const base = linspace(n).map((t) => fn(t));

  if (shuffle) {
    return shuffleWith(base, seededRandom(SHUFFLE_SEED));
  }
  return reverse ? base.reverse() : base;
}
