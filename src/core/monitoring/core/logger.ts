/**
 * Logging utility
 * Structured, leveled logging with persistent and per-call context
 */

import { LogLevel, type LogContext } from "./types";
import { isLogLevelEnabled, loggingConfig, type LoggingConfig } from "./config";
import { logBuffer, type LogBuffer } from "./buffer";

export { LogLevel, type LogContext };

export class Logger {
  private context: LogContext = {};

  constructor(
    private readonly sink: LogBuffer = logBuffer,
    private readonly config: LoggingConfig = loggingConfig
  ) {}

  /**
   * Set persistent context for all log messages
   */
  setContext(context: LogContext): void {
    this.context = { ...this.context, ...context };
  }

  /**
   * Clear the persistent context
   */
  clearContext(): void {
    this.context = {};
  }

  /**
   * Log an error message
   */
  error(message: string, error?: unknown, context?: LogContext): void {
    this.log(LogLevel.ERROR, message, { ...context, error: this.serializeError(error) });
  }

  /**
   * Log a warning message
   */
  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  /**
   * Log an info message
   */
  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  /**
   * Log a debug message
   */
  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  /**
   * Log a verbose message
   */
  verbose(message: string, context?: LogContext): void {
    this.log(LogLevel.VERBOSE, message, context);
  }

  /**
   * Core logging method; entries below the configured level are dropped
   */
  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!isLogLevelEnabled(level, this.config)) {
      return;
    }

    this.sink.add(level, message, { ...this.context, ...context });
  }

  /**
   * Serialize error objects for logging
   */
  private serializeError(error: unknown): unknown {
    if (!error) return undefined;

    if (error instanceof Error) {
      return {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    return { error: String(error) };
  }

  /**
   * Create a child logger with specific context
   */
  child(context: LogContext): Logger {
    const childLogger = new Logger(this.sink, this.config);
    childLogger.setContext({ ...this.context, ...context });
    return childLogger;
  }

  /**
   * Log performance metrics
   */
  performance(metric: string, duration: number, context?: LogContext): void {
    this.debug(`Performance: ${metric}`, {
      ...context,
      metric,
      duration,
      unit: "ms",
    });
  }

  /**
   * Log outbound HTTP calls
   */
  api(method: string, endpoint: string, status?: number, context?: LogContext): void {
    this.debug("API call", {
      ...context,
      method,
      endpoint,
      status,
      type: "api",
    });
  }

  /**
   * Manually flush the log buffer
   */
  flush(): void {
    this.sink.flush();
  }
}

// Export singleton instance
export const logger = new Logger();

// Export default
export default logger;
