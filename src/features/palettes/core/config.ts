/**
 * Palette Resolution Configuration
 *
 * Defaults, overridden by environment variables, overridden per call.
 */

import { z } from "zod";
import { PaletteConfigError } from "./errors";

// ============================================================================
// Configuration Types
// ============================================================================

export interface PaletteConfig {
  /** Host of the remote palette service */
  serviceHost: string;

  /** Upper bound for a remote palette lookup in ms */
  remoteTimeoutMs: number;

  /** Upper bound for fetching a remote image in ms */
  imageTimeoutMs: number;

  /** Longest side, in px, images are reduced to before quantizing */
  imageSampleSize: number;

  /** Maximum representative colors taken from an image */
  imageColorCount: number;

  /** Channel interpolation used between anchors */
  interpolation: "rgb" | "lab";
}

// ============================================================================
// Defaults
// ============================================================================

const DEFAULT_CONFIG: PaletteConfig = {
  serviceHost: "www.colourlovers.com",
  remoteTimeoutMs: 10_000,
  imageTimeoutMs: 10_000,
  imageSampleSize: 64,
  imageColorCount: 5,
  interpolation: "rgb",
};

// ============================================================================
// Environment Schema
// ============================================================================

const positiveInt = z.coerce.number().int().positive();

export const hostSchema = z
  .string()
  .trim()
  .min(1)
  .regex(/^[A-Za-z0-9.-]+(:\d+)?$/, "Expected host[:port]");

const envSchema = z.object({
  PALETTE_SERVICE_HOST: hostSchema.optional(),
  PALETTE_REMOTE_TIMEOUT_MS: positiveInt.optional(),
  PALETTE_IMAGE_TIMEOUT_MS: positiveInt.optional(),
  PALETTE_IMAGE_SAMPLE_SIZE: positiveInt.optional(),
  PALETTE_IMAGE_COLORS: z.coerce.number().int().min(2).max(256).optional(),
  PALETTE_INTERPOLATION: z.enum(["rgb", "lab"]).optional(),
});

export const paletteConfigSchema = z.object({
  serviceHost: hostSchema,
  remoteTimeoutMs: z.number().int().positive(),
  imageTimeoutMs: z.number().int().positive(),
  imageSampleSize: z.number().int().positive(),
  imageColorCount: z.number().int().min(2).max(256),
  interpolation: z.enum(["rgb", "lab"]),
});

// ============================================================================
// Configuration Builder
// ============================================================================

export class PaletteConfigBuilder {
  private config: PaletteConfig;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.config = { ...DEFAULT_CONFIG };
    this.applyEnvironmentVariables(env);
  }

  private applyEnvironmentVariables(env: NodeJS.ProcessEnv): void {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
      throw new PaletteConfigError(
        `Invalid palette environment: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join(", ")}`,
        { cause: parsed.error }
      );
    }

    const vars = parsed.data;
    this.merge({
      serviceHost: vars.PALETTE_SERVICE_HOST,
      remoteTimeoutMs: vars.PALETTE_REMOTE_TIMEOUT_MS,
      imageTimeoutMs: vars.PALETTE_IMAGE_TIMEOUT_MS,
      imageSampleSize: vars.PALETTE_IMAGE_SAMPLE_SIZE,
      imageColorCount: vars.PALETTE_IMAGE_COLORS,
      interpolation: vars.PALETTE_INTERPOLATION,
    });
  }

  /**
   * Apply overrides; undefined values keep the current setting
   */
  merge(overrides: Partial<PaletteConfig>): PaletteConfigBuilder {
    const current = this.config;
    this.config = {
      serviceHost: overrides.serviceHost ?? current.serviceHost,
      remoteTimeoutMs: overrides.remoteTimeoutMs ?? current.remoteTimeoutMs,
      imageTimeoutMs: overrides.imageTimeoutMs ?? current.imageTimeoutMs,
      imageSampleSize: overrides.imageSampleSize ?? current.imageSampleSize,
      imageColorCount: overrides.imageColorCount ?? current.imageColorCount,
      interpolation: overrides.interpolation ?? current.interpolation,
    };
    return this;
  }

  /**
   * Build final configuration
   */
  build(): PaletteConfig {
    const parsed = paletteConfigSchema.safeParse(this.config);
    if (!parsed.success) {
      throw new PaletteConfigError(`Invalid palette configuration: ${parsed.error.message}`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Resolve configuration from defaults and the environment
 */
export function getPaletteConfig(env?: NodeJS.ProcessEnv): PaletteConfig {
  return new PaletteConfigBuilder(env).build();
}

export function getDefaultPaletteConfig(): PaletteConfig {
  return { ...DEFAULT_CONFIG };
}
