/**
 * PerceptualRampStrategy
 * viridis family, available when d3-scale-chromatic is installed
 */

import { describeError, err, failure, ok } from "../core/errors";
import type { ColorDescriptor, PaletteStrategy, StrategyResult } from "../core/types";
import { loadPerceptualModule, perceptualRamp, type PerceptualLoader } from "../ramps/perceptual";
import { mismatch } from "./mismatch";

export class PerceptualRampStrategy implements PaletteStrategy {
  readonly name = "perceptual-ramp";

  constructor(private readonly load: PerceptualLoader = loadPerceptualModule) {}

  matches(descriptor: ColorDescriptor): boolean {
    return descriptor.kind === "named-function" && descriptor.family === "perceptual";
  }

  async tryResolve(descriptor: ColorDescriptor): Promise<StrategyResult> {
    if (descriptor.kind !== "named-function" || descriptor.family !== "perceptual") {
      return mismatch(this.name, descriptor);
    }

    try {
      const module = await this.load();
      return ok(perceptualRamp(module, descriptor.name));
    } catch (error) {
      return err(
        failure("SourceUnavailable", `Perceptual ramps unavailable: ${describeError(error)}`, error)
      );
    }
  }
}
