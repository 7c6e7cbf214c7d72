/**
 * Option Schemas
 * Zod validation for resolvePalette arguments
 */

import { z } from "zod";
import { hostSchema } from "../core/config";
import { PaletteOptionsError } from "../core/errors";
import type { PaletteInput } from "../core/types";

// ============================================================================
// Descriptor Schema
// ============================================================================

export const descriptorSchema = z.union([
  z.string(),
  z.number().finite(),
  z.array(z.string()),
  z.null(),
  z.undefined(),
]);

// ============================================================================
// Options Schema
// ============================================================================

export const paletteOptionsSchema = z.object({
  n: z.number().int("n must be an integer").positive("n must be at least 1").default(7),
  reverse: z.boolean().default(false),
  shuffle: z.boolean().default(false),
  default: z.boolean().default(true),
  preview: z.boolean().default(false),
  interpolation: z.enum(["rgb", "lab"]).optional(),
  serviceHost: hostSchema.optional(),
  remoteTimeoutMs: z.number().int().positive().optional(),
  imageTimeoutMs: z.number().int().positive().optional(),
});

export type ValidatedPaletteOptions = z.infer<typeof paletteOptionsSchema>;

// ============================================================================
// Validation
// ============================================================================

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join(", ");
}

/**
 * Parse caller input, throwing PaletteOptionsError on a contract violation
 */
export function validateDescriptor(input: unknown): PaletteInput {
  const parsed = descriptorSchema.safeParse(input);
  if (!parsed.success) {
    throw new PaletteOptionsError(`Unsupported descriptor: ${formatIssues(parsed.error)}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

export function validateOptions(options: unknown): ValidatedPaletteOptions {
  const parsed = paletteOptionsSchema.safeParse(options ?? {});
  if (!parsed.success) {
    throw new PaletteOptionsError(`Invalid palette options: ${formatIssues(parsed.error)}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}
