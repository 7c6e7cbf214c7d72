/**
 * Palette Errors
 * Thrown errors for contract violations, Result values for strategy failures
 */

// ============================================================================
// Thrown Errors
// ============================================================================

export enum ErrorCode {
  INVALID_CONFIG = "INVALID_CONFIG",
  INVALID_OPTIONS = "INVALID_OPTIONS",
}

/**
 * Base class for errors that reach callers
 */
export class PaletteError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "PaletteError";
  }
}

/**
 * Bundled dataset or environment configuration is invalid (fatal)
 */
export class PaletteConfigError extends PaletteError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCode.INVALID_CONFIG, options);
    this.name = "PaletteConfigError";
  }
}

/**
 * Caller options violate the contract (n, descriptor shape)
 */
export class PaletteOptionsError extends PaletteError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCode.INVALID_OPTIONS, options);
    this.name = "PaletteOptionsError";
  }
}

// ============================================================================
// Strategy Failures
// ============================================================================

export type PaletteFailureKind =
  | "ClassificationMismatch"
  | "SourceUnavailable"
  | "MalformedSource"
  | "UnknownName";

export interface PaletteFailure {
  kind: PaletteFailureKind;
  message: string;
  cause?: unknown;
}

export function failure(kind: PaletteFailureKind, message: string, cause?: unknown): PaletteFailure {
  return cause === undefined ? { kind, message } : { kind, message, cause };
}

// ============================================================================
// Result
// ============================================================================

export type Result<T, E> = { success: true; data: T } | { success: false; error: E };

export function ok<T>(data: T): { success: true; data: T } {
  return { success: true, data };
}

export function err<E>(error: E): { success: false; error: E } {
  return { success: false, error };
}

/**
 * Unwrap a result, substituting the fallback value on failure
 */
export function orElse<T, E>(result: Result<T, E>, fallback: (error: E) => T): T {
  return result.success ? result.data : fallback(result.error);
}

/**
 * Run a throwing builder and capture its error as a failure
 */
export function attempt<T>(build: () => T, kind: PaletteFailureKind, message: string): Result<T, PaletteFailure> {
  try {
    return ok(build());
  } catch (error) {
    return err(failure(kind, `${message}: ${describeError(error)}`, error));
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Transform the success value, passing failures through
 */
export function mapResult<T, U, E>(result: Result<T, E>, transform: (data: T) => U): Result<U, E> {
  return result.success ? ok(transform(result.data)) : result;
}
