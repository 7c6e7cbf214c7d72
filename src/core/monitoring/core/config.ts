/**
 * Environment-based Logging Configuration
 *
 * Provides defaults based on environment with the ability to override
 * via environment variables or runtime configuration.
 */

import { LogLevel } from "./types";
import type { LogBufferConfig } from "./buffer";

// ============================================================================
// Configuration Types
// ============================================================================

export interface LoggingConfig {
  /** Minimum log level to output */
  level: LogLevel;

  /** Whether to enable console output */
  enableConsole: boolean;

  /** Log buffer configuration */
  buffer: LogBufferConfig;
}

export type Environment = "development" | "production" | "test";

const LEVEL_ORDER: readonly LogLevel[] = [
  LogLevel.ERROR,
  LogLevel.WARN,
  LogLevel.INFO,
  LogLevel.DEBUG,
  LogLevel.VERBOSE,
];

// ============================================================================
// Default Configurations
// ============================================================================

const DEVELOPMENT_CONFIG: LoggingConfig = {
  level: LogLevel.DEBUG,
  enableConsole: true,

  buffer: {
    maxBufferSize: 500,
    maxFlushInterval: 50,     // Faster flushing for immediate feedback
    minBatchSize: 1,
    flushOnError: true,
    useAsyncProcessing: false,
    memoryLimitMB: 5,
  },
};

const PRODUCTION_CONFIG: LoggingConfig = {
  level: LogLevel.WARN,
  enableConsole: true,

  buffer: {
    maxBufferSize: 2000,
    maxFlushInterval: 200,
    minBatchSize: 20,
    flushOnError: true,
    useAsyncProcessing: true,
    memoryLimitMB: 20,
  },
};

const TEST_CONFIG: LoggingConfig = {
  level: LogLevel.WARN,       // Only warnings and errors in tests
  enableConsole: false,       // Silent tests

  buffer: {
    maxBufferSize: 100,
    maxFlushInterval: 10,
    minBatchSize: 1,
    flushOnError: true,
    useAsyncProcessing: false, // Sync processing for deterministic tests
    memoryLimitMB: 1,
  },
};

// ============================================================================
// Environment Detection
// ============================================================================

function detectEnvironment(env: NodeJS.ProcessEnv = process.env): Environment {
  if (env.VITEST) return "test";

  const nodeEnv = env.NODE_ENV?.toLowerCase();
  if (nodeEnv) {
    if (nodeEnv.includes("test")) return "test";
    if (nodeEnv.includes("prod")) return "production";
    if (nodeEnv.includes("dev")) return "development";
  }

  // Embedded in a host that sets no environment: warnings and errors only
  return "production";
}

function isLogLevel(value: string): value is LogLevel {
  return LEVEL_ORDER.some((level) => level === value);
}

// ============================================================================
// Configuration Builder
// ============================================================================

class LogConfigBuilder {
  private config: LoggingConfig;
  private environment: Environment;

  constructor(environment?: Environment, env: NodeJS.ProcessEnv = process.env) {
    this.environment = environment || detectEnvironment(env);
    this.config = this.getBaseConfig();
    this.applyEnvironmentVariables(env);
  }

  private getBaseConfig(): LoggingConfig {
    switch (this.environment) {
      case "production":
        return { ...PRODUCTION_CONFIG, buffer: { ...PRODUCTION_CONFIG.buffer } };
      case "test":
        return { ...TEST_CONFIG, buffer: { ...TEST_CONFIG.buffer } };
      case "development":
      default:
        return { ...DEVELOPMENT_CONFIG, buffer: { ...DEVELOPMENT_CONFIG.buffer } };
    }
  }

  private applyEnvironmentVariables(env: NodeJS.ProcessEnv): void {
    // Log level override
    if (env.LOG_LEVEL) {
      const level = env.LOG_LEVEL.toLowerCase();
      if (isLogLevel(level)) {
        this.config.level = level;
      }
    }

    // Console output override
    if (env.LOG_CONSOLE !== undefined) {
      this.config.enableConsole = env.LOG_CONSOLE === "true";
    }

    // Buffer size override
    if (env.LOG_BUFFER_SIZE) {
      const size = parseInt(env.LOG_BUFFER_SIZE, 10);
      if (!isNaN(size) && size > 0) {
        this.config.buffer.maxBufferSize = size;
      }
    }
  }

  /**
   * Override log level
   */
  setLevel(level: LogLevel): LogConfigBuilder {
    this.config.level = level;
    return this;
  }

  /**
   * Build final configuration
   */
  build(): LoggingConfig {
    return { ...this.config, buffer: { ...this.config.buffer } };
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get logging configuration for current environment
 */
export function getLoggingConfig(environment?: Environment, env?: NodeJS.ProcessEnv): LoggingConfig {
  return new LogConfigBuilder(environment, env).build();
}

/**
 * Create custom logging configuration
 */
export function createLoggingConfig(environment?: Environment, env?: NodeJS.ProcessEnv): LogConfigBuilder {
  return new LogConfigBuilder(environment, env);
}

/**
 * Check if logging is enabled for a specific level
 */
export function isLogLevelEnabled(level: LogLevel, config: LoggingConfig = loggingConfig): boolean {
  return LEVEL_ORDER.indexOf(level) <= LEVEL_ORDER.indexOf(config.level);
}

// ============================================================================
// Default Export
// ============================================================================

export const loggingConfig = getLoggingConfig();
