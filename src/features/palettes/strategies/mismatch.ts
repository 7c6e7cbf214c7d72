import { err, failure, type PaletteFailure } from "../core/errors";
import type { ColorDescriptor, StrategyName } from "../core/types";

/**
 * Failure for a descriptor handed to a strategy that does not match it
 */
export function mismatch(strategy: StrategyName, descriptor: ColorDescriptor): { success: false; error: PaletteFailure } {
  return err(failure("ClassificationMismatch", `${strategy} cannot resolve a ${descriptor.kind} descriptor`));
}
