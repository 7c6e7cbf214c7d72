/**
 * chartpal
 * Chart-ready color palettes from names, ids, color lists and images
 */

export * from "./features/palettes";
export { createRamp, sortByBrightness, toHex } from "./core/utils/color";
export type { ColorRamp, RampOptions } from "./core/utils/color";
export { logger, Logger, LogLevel, MemoryProcessor, ConsoleProcessor, LogBuffer } from "./core/monitoring/core";
export type { LogContext, LogProcessor, LoggingConfig } from "./core/monitoring/core";
