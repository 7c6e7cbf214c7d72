/**
 * Date Formatting Utilities
 * Powered by date-fns
 */

export * from "./format/format";
