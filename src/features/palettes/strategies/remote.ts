/**
 * RemoteIDStrategy
 * Palette fetched from the remote service by numeric id
 */

import { createRamp } from "../../../core/utils/color";
import { attempt } from "../core/errors";
import type { ColorDescriptor, PaletteStrategy, StrategyContext, StrategyResult } from "../core/types";
import { fetchRemotePalette } from "../remote/client";
import { mismatch } from "./mismatch";

export class RemoteIDStrategy implements PaletteStrategy {
  readonly name = "remote-id";

  matches(descriptor: ColorDescriptor): boolean {
    return descriptor.kind === "remote-id";
  }

  async tryResolve(descriptor: ColorDescriptor, context: StrategyContext): Promise<StrategyResult> {
    if (descriptor.kind !== "remote-id") {
      return mismatch(this.name, descriptor);
    }

    const { config, logger } = context;
    const colors = await fetchRemotePalette({
      id: descriptor.id,
      serviceHost: config.serviceHost,
      timeoutMs: config.remoteTimeoutMs,
      logger,
    });
    if (!colors.success) return colors;

    return attempt(
      () => createRamp(colors.data, { mode: config.interpolation }),
      "MalformedSource",
      `Invalid colors in palette ${descriptor.id}`
    );
  }
}
