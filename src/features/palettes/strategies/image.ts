/**
 * ImageStrategy
 * Interpolates across the representative colors of an image, darkest first
 */

import { createRamp } from "../../../core/utils/color";
import { attempt, err, failure } from "../core/errors";
import type { ColorDescriptor, PaletteStrategy, StrategyContext, StrategyResult } from "../core/types";
import { extractImageColors, SharpImageDecoder, type ImageDecoder } from "../image/decoder";
import { mismatch } from "./mismatch";

export class ImageStrategy implements PaletteStrategy {
  readonly name = "image";

  constructor(private readonly decoder: ImageDecoder = new SharpImageDecoder()) {}

  matches(descriptor: ColorDescriptor): boolean {
    return descriptor.kind === "image";
  }

  async tryResolve(descriptor: ColorDescriptor, context: StrategyContext): Promise<StrategyResult> {
    if (descriptor.kind !== "image") {
      return mismatch(this.name, descriptor);
    }

    const { config } = context;
    const image = await this.decoder.decode(descriptor.source, {
      maxSize: config.imageSampleSize,
      timeoutMs: config.imageTimeoutMs,
    });
    if (!image.success) return image;

    const colors = extractImageColors(image.data, config.imageColorCount);
    if (colors.length === 0) {
      return err(failure("MalformedSource", `No opaque pixels in ${descriptor.source}`));
    }

    context.logger.debug("Extracted image colors", { source: descriptor.source, colors });

    return attempt(
      () => createRamp(colors, { mode: config.interpolation }),
      "MalformedSource",
      `Invalid colors extracted from ${descriptor.source}`
    );
  }
}
