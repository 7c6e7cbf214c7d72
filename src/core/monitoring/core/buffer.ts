/**
 * Log Buffer System
 *
 * Batches log entries and hands them to processors in priority order.
 *
 * Features:
 * - Automatic batching with configurable flush intervals
 * - Priority lanes for different log levels (errors flush immediately)
 * - Memory-bounded buffer
 * - Optional async processing
 */

import { LogLevel, type LogContext } from "./types";
import { loggingConfig } from "./config";
import { formatISO, formatLogTime } from "../../utils/dates";

// ============================================================================
// Types
// ============================================================================

export interface LogEntry {
  id: string;
  level: LogLevel;
  message: string;
  context: LogContext;
  timestamp: string;
  priority: number; // 0 = highest (errors), 4 = lowest (verbose)
}

export interface LogBufferConfig {
  /** Maximum number of entries in buffer before forced flush (default: 1000) */
  maxBufferSize: number;

  /** Maximum time to wait before flushing buffer in ms (default: 100) */
  maxFlushInterval: number;

  /** Minimum batch size before a timed flush runs (default: 10) */
  minBatchSize: number;

  /** Whether to flush immediately on errors (default: true) */
  flushOnError: boolean;

  /** Whether processors run asynchronously (default: true) */
  useAsyncProcessing: boolean;

  /** Memory limit in MB before dropping old logs (default: 10) */
  memoryLimitMB: number;
}

export interface LogProcessor {
  process(entries: LogEntry[]): void | Promise<void>;
}

// ============================================================================
// Priority Mapping
// ============================================================================

const LOG_PRIORITIES: Record<LogLevel, number> = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.INFO]: 2,
  [LogLevel.DEBUG]: 3,
  [LogLevel.VERBOSE]: 4,
};

// ============================================================================
// Log Buffer Implementation
// ============================================================================

export class LogBuffer {
  private buffer: LogEntry[] = [];
  private config: LogBufferConfig;
  private processors: LogProcessor[] = [];
  private flushTimer: ReturnType<typeof setTimeout> | null = null;
  private pending: Promise<void> = Promise.resolve();
  private memoryUsage = 0;
  private droppedLogs = 0;
  private totalLogs = 0;
  private sequence = 0;

  constructor(config: Partial<LogBufferConfig> = {}) {
    this.config = {
      maxBufferSize: 1000,
      maxFlushInterval: 100,
      minBatchSize: 10,
      flushOnError: true,
      useAsyncProcessing: true,
      memoryLimitMB: 10,
      ...config,
    };
  }

  /**
   * Add a log entry to the buffer
   */
  add(level: LogLevel, message: string, context: LogContext = {}): void {
    const entry: LogEntry = {
      id: this.generateId(),
      level,
      message,
      context,
      timestamp: formatISO(),
      priority: LOG_PRIORITIES[level],
    };

    if (this.isMemoryLimitExceeded()) {
      this.dropOldLogs();
    }

    this.buffer.push(entry);
    this.updateMemoryUsage(entry);
    this.totalLogs++;

    // Immediate flush for errors if configured
    if (this.config.flushOnError && level === LogLevel.ERROR) {
      this.flush();
      return;
    }

    if (this.buffer.length >= this.config.maxBufferSize) {
      this.flush();
      return;
    }

    this.scheduleFlush();
  }

  /**
   * Register a log processor
   */
  addProcessor(processor: LogProcessor): void {
    this.processors.push(processor);
  }

  /**
   * Remove a log processor
   */
  removeProcessor(processor: LogProcessor): void {
    const index = this.processors.indexOf(processor);
    if (index > -1) {
      this.processors.splice(index, 1);
    }
  }

  /**
   * Manually flush the buffer
   */
  flush(): void {
    this.clearFlushTimer();

    if (this.buffer.length === 0) {
      return;
    }

    // Take a snapshot and clear buffer before processing
    const entries = this.buffer.slice();
    this.buffer = [];
    this.memoryUsage = 0;

    if (this.config.useAsyncProcessing) {
      this.pending = this.pending.then(() => this.processAsync(entries));
    } else {
      this.processSync(entries);
    }
  }

  /**
   * Resolves once every async batch handed out so far has been processed
   */
  drain(): Promise<void> {
    this.flush();
    return this.pending;
  }

  /**
   * Get buffer statistics
   */
  getStats(): {
    bufferSize: number;
    memoryUsageMB: number;
    droppedLogs: number;
    totalLogs: number;
  } {
    return {
      bufferSize: this.buffer.length,
      memoryUsageMB: this.memoryUsage / (1024 * 1024),
      droppedLogs: this.droppedLogs,
      totalLogs: this.totalLogs,
    };
  }

  /**
   * Cleanup and stop buffer
   */
  destroy(): void {
    this.flush();
    this.processors = [];
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private scheduleFlush(): void {
    if (this.flushTimer) return;

    this.flushTimer = setTimeout(() => {
      this.flushTimer = null;
      if (this.buffer.length >= this.config.minBatchSize) {
        this.flush();
      } else if (this.buffer.length > 0) {
        this.scheduleFlush();
      }
    }, this.config.maxFlushInterval);

    // Never hold the process open for pending log output
    this.flushTimer.unref();
  }

  private clearFlushTimer(): void {
    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
  }

  private async processAsync(entries: LogEntry[]): Promise<void> {
    entries.sort((a, b) => a.priority - b.priority);

    await Promise.all(
      this.processors.map(async (processor) => {
        try {
          await processor.process(entries);
        } catch (error) {
          // eslint-disable-next-line no-console
          console.error("Log processor error:", error);
        }
      })
    );
  }

  private processSync(entries: LogEntry[]): void {
    entries.sort((a, b) => a.priority - b.priority);

    this.processors.forEach((processor) => {
      try {
        const result = processor.process(entries);
        if (result instanceof Promise) {
          this.pending = this.pending.then(() => result).catch((error: unknown) => {
            // eslint-disable-next-line no-console
            console.error("Log processor error:", error);
          });
        }
      } catch (error) {
        // eslint-disable-next-line no-console
        console.error("Log processor error:", error);
      }
    });
  }

  private generateId(): string {
    this.sequence++;
    return `log_${Date.now()}_${this.sequence}`;
  }

  private updateMemoryUsage(entry: LogEntry): void {
    // Rough estimation of memory usage
    const size = JSON.stringify(entry).length * 2; // 2 bytes per char (UTF-16)
    this.memoryUsage += size;
  }

  private isMemoryLimitExceeded(): boolean {
    const limitBytes = this.config.memoryLimitMB * 1024 * 1024;
    return this.memoryUsage > limitBytes;
  }

  private dropOldLogs(): void {
    // Drop 20% of oldest logs to make room
    const dropCount = Math.max(1, Math.floor(this.buffer.length * 0.2));
    const dropped = this.buffer.splice(0, dropCount);

    this.droppedLogs += dropped.length;

    this.memoryUsage = this.buffer.reduce((total, entry) => {
      return total + JSON.stringify(entry).length * 2;
    }, 0);
  }
}

// ============================================================================
// Built-in Processors
// ============================================================================

/**
 * Console processor - writes to stdout/stderr through the console
 */
export class ConsoleProcessor implements LogProcessor {
  process(entries: LogEntry[]): void {
    entries.forEach((entry) => {
      const time = formatLogTime(new Date(entry.timestamp));
      const message = `[${time}] ${entry.level.toUpperCase()}: ${entry.message}`;
      const context = Object.keys(entry.context).length > 0 ? entry.context : "";

      switch (entry.level) {
        case LogLevel.ERROR:
          // eslint-disable-next-line no-console
          console.error(message, context);
          break;
        case LogLevel.WARN:
          // eslint-disable-next-line no-console
          console.warn(message, context);
          break;
        case LogLevel.INFO:
          // eslint-disable-next-line no-console
          console.info(message, context);
          break;
        case LogLevel.DEBUG:
          // eslint-disable-next-line no-console
          console.debug(message, context);
          break;
        case LogLevel.VERBOSE:
          // eslint-disable-next-line no-console
          console.log(message, context);
          break;
      }
    });
  }
}

/**
 * Memory processor - keeps entries for inspection (tests, diagnostics)
 */
export class MemoryProcessor implements LogProcessor {
  readonly entries: LogEntry[] = [];

  process(entries: LogEntry[]): void {
    this.entries.push(...entries);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

// ============================================================================
// Singleton Instance with Environment Configuration
// ============================================================================

function initializeLogBuffer(): LogBuffer {
  const buffer = new LogBuffer(loggingConfig.buffer);

  if (loggingConfig.enableConsole) {
    buffer.addProcessor(new ConsoleProcessor());
  }

  return buffer;
}

export const logBuffer = initializeLogBuffer();

// Flush whatever is left when the event loop empties
process.once("beforeExit", () => {
  logBuffer.flush();
});
