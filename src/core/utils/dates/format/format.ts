/**
 * Basic Date Formatting Utilities
 */

import { format as dateFnsFormat } from "date-fns";

/**
 * Format a log timestamp with millisecond precision
 */
export function formatLogTime(date: Date = new Date()): string {
  return dateFnsFormat(date, "HH:mm:ss.SSS");
}

/**
 * Format date as ISO 8601 string
 * Useful for logging, API calls, and standardized timestamps
 */
export function formatISO(date: Date = new Date()): string {
  return date.toISOString();
}
