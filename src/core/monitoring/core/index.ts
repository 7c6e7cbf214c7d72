/**
 * Core Monitoring Infrastructure
 * Logging, log buffering and logging configuration
 */

export { logger, Logger, LogLevel, type LogContext } from "./logger";
export {
  logBuffer,
  LogBuffer,
  ConsoleProcessor,
  MemoryProcessor,
  type LogEntry,
  type LogBufferConfig,
  type LogProcessor,
} from "./buffer";
export {
  loggingConfig,
  getLoggingConfig,
  createLoggingConfig,
  isLogLevelEnabled,
  type LoggingConfig,
  type Environment,
} from "./config";
