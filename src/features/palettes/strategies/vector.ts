/**
 * VectorStrategy
 * Interpolates across an explicit list of colors, in order
 */

import { createRamp } from "../../../core/utils/color";
import { attempt } from "../core/errors";
import type { ColorDescriptor, PaletteStrategy, StrategyContext, StrategyResult } from "../core/types";
import { mismatch } from "./mismatch";

export class VectorStrategy implements PaletteStrategy {
  readonly name = "vector";

  matches(descriptor: ColorDescriptor): boolean {
    return descriptor.kind === "color-list" && descriptor.colors.length >= 2;
  }

  async tryResolve(descriptor: ColorDescriptor, context: StrategyContext): Promise<StrategyResult> {
    if (descriptor.kind !== "color-list") {
      return mismatch(this.name, descriptor);
    }
    const { colors } = descriptor;
    return attempt(
      () => createRamp(colors, { mode: context.config.interpolation }),
      "MalformedSource",
      "Invalid color list"
    );
  }
}
