/**
 * Palette Resolver
 * Classifies a descriptor, runs the first matching strategy and samples the result.
 * Any strategy failure resolves to the default ramp; nothing but option and
 * configuration errors reaches the caller.
 */

import { logger as rootLogger, type Logger } from "../../../core/monitoring/core/logger";
import { getBrewerTable, type BrewerTable } from "../brewer/table";
import type { ImageDecoder } from "../image/decoder";
import { renderSwatch } from "../preview/swatch";
import type { PerceptualLoader } from "../ramps/perceptual";
import { validateDescriptor, validateOptions } from "../schemas/options";
import { createStrategies } from "../strategies";
import { DefaultStrategy } from "../strategies/default";
import { classifyDescriptor } from "./classify";
import { getPaletteConfig, paletteConfigSchema, type PaletteConfig } from "./config";
import { failure, mapResult, orElse, PaletteOptionsError } from "./errors";
import { sample } from "./sampler";
import type {
  ColorDescriptor,
  ContinuousColorFunction,
  Palette,
  PaletteFallback,
  PaletteInput,
  PaletteOptions,
  PaletteStrategy,
  StrategyContext,
  StrategyName,
} from "./types";

// ============================================================================
// Types
// ============================================================================

export interface PaletteResolverOptions {
  /** Replaces the bundled ColorBrewer table */
  table?: BrewerTable;
  /** Replaces the whole strategy list (the default strategy stays terminal) */
  strategies?: PaletteStrategy[];
  decoder?: ImageDecoder;
  perceptualLoader?: PerceptualLoader;
  /** Base configuration; defaults to defaults + environment */
  config?: PaletteConfig;
  logger?: Logger;
}

interface Resolution {
  fn: ContinuousColorFunction;
  strategy: StrategyName;
  fallback?: PaletteFallback;
}

// ============================================================================
// Resolver
// ============================================================================

export class PaletteResolver {
  private readonly table: BrewerTable;
  private readonly strategies: readonly PaletteStrategy[];
  private readonly terminal = new DefaultStrategy();
  private readonly config: PaletteConfig;
  private readonly logger: Logger;

  constructor(options: PaletteResolverOptions = {}) {
    this.table = options.table ?? getBrewerTable();
    this.strategies =
      options.strategies ??
      createStrategies({
        table: this.table,
        decoder: options.decoder,
        perceptualLoader: options.perceptualLoader,
      });
    this.config = options.config ?? getPaletteConfig();
    this.logger = (options.logger ?? rootLogger).child({ component: "PaletteResolver" });
  }

  /**
   * Resolve a descriptor into exactly n colors
   */
  async resolve(input?: PaletteInput, options?: PaletteOptions): Promise<Palette> {
    const raw = validateDescriptor(input);
    const opts = validateOptions(options);
    const config = this.configFor(opts);

    const descriptor = classifyDescriptor(raw, this.table);
    const context: StrategyContext = {
      useDefault: opts.default,
      config,
      logger: this.logger.child({ descriptor: descriptor.kind }),
    };

    const started = performance.now();
    const { fn, strategy, fallback } = await this.resolveFunction(descriptor, context);
    const colors = sample(fn, opts.n, opts.reverse, opts.shuffle);

    context.logger.performance("palette resolution", performance.now() - started, {
      strategy,
      n: opts.n,
    });

    return Object.freeze({
      colors: Object.freeze(colors),
      n: opts.n,
      reverse: opts.reverse,
      shuffle: opts.shuffle,
      default: opts.default,
      descriptor: Object.freeze(descriptor),
      strategy,
      ...(fallback ? { fallback } : {}),
      ...(opts.preview ? { preview: renderSwatch(colors) } : {}),
    });
  }

  private async resolveFunction(
    descriptor: ColorDescriptor,
    context: StrategyContext
  ): Promise<Resolution> {
    const strategy = this.strategies.find((candidate) => candidate.matches(descriptor));

    if (strategy === undefined) {
      return descriptor.kind === "unknown"
        ? this.fallBack(context, {
            from: "classifier",
            failure: failure("UnknownName", `No palette, ramp or image matches "${descriptor.input}"`),
          })
        : { fn: this.terminal.resolve(context), strategy: this.terminal.name };
    }

    const result = await strategy.tryResolve(descriptor, context);
    return orElse(
      mapResult(result, (fn): Resolution => ({ fn, strategy: strategy.name })),
      (error) => this.fallBack(context, { from: strategy.name, failure: error })
    );
  }

  private fallBack(context: StrategyContext, fallback: PaletteFallback): Resolution {
    context.logger.warn("Falling back to default palette", {
      strategy: fallback.from,
      failure: fallback.failure.kind,
      reason: fallback.failure.message,
    });
    return { fn: this.terminal.resolve(context), strategy: this.terminal.name, fallback };
  }

  private configFor(opts: PaletteOptions): PaletteConfig {
    const parsed = paletteConfigSchema.safeParse({
      ...this.config,
      interpolation: opts.interpolation ?? this.config.interpolation,
      serviceHost: opts.serviceHost ?? this.config.serviceHost,
      remoteTimeoutMs: opts.remoteTimeoutMs ?? this.config.remoteTimeoutMs,
      imageTimeoutMs: opts.imageTimeoutMs ?? this.config.imageTimeoutMs,
    });
    if (!parsed.success) {
      throw new PaletteOptionsError(`Invalid palette options: ${parsed.error.message}`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}

// ============================================================================
// Public API
// ============================================================================

let sharedResolver: PaletteResolver | undefined;

/**
 * Resolve a descriptor with the bundled table and environment configuration
 *
 * @example
 * const palette = await resolvePalette("Spectral", { n: 5 });
 * palette.colors // 5 colors from the ColorBrewer Spectral anchors
 */
export async function resolvePalette(input?: PaletteInput, options?: PaletteOptions): Promise<Palette> {
  sharedResolver ??= new PaletteResolver();
  return sharedResolver.resolve(input, options);
}
