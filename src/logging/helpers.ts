/**
 * Logging helper functions
 */

import type { LogLevel, LogLevels } from './types';

/**
 * Two-digit zero padding
 */
function pad2(n: number): string {
  return n < 10 ? "0" + n : String(n);
}

/**
 * Format a timestamp as local wall-clock time (HH:MM:SS)
 * @param ms - Milliseconds since epoch
 */
export function formatClock(ms: number): string {
  const d = new Date(ms);
  return pad2(d.getHours()) + ":" + pad2(d.getMinutes()) + ":" + pad2(d.getSeconds());
}

/**
 * Get the bracketed tag for a level, padded so messages line up
 */
export function levelTag(level: LogLevel, logLevels: LogLevels): string {
  if (level === logLevels.INFO) return "[INFO]    ";
  if (level === logLevels.WARNING) return "[WARNING] ";
  if (level === logLevels.CRITICAL) return "[CRITICAL]";
  return "[DEBUG]   ";
}

/**
 * Format log message with time and level tag
 *
 * Produces lines such as `09:05:03 [INFO]     Ad detected`.
 *
 * @param level - Log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL)
 * @param msg - Message to format
 * @param timeMs - Timestamp in milliseconds since epoch
 * @param logLevels - Log level constants object
 * @returns Formatted log line
 */
export function formatLogMessage(level: LogLevel, msg: string, timeMs: number, logLevels: LogLevels): string {
  return formatClock(timeMs) + " " + levelTag(level, logLevels) + " " + msg;
}

/**
 * Check if message should be logged based on the current level
 */
export function shouldLog(level: LogLevel, currentLevel: LogLevel): boolean {
  return level >= currentLevel;
}

/**
 * Narrow a configured number to a LogLevel
 * @returns The level, or null when the number is not a valid level
 */
export function toLogLevel(value: number): LogLevel | null {
  if (value === 0 || value === 1 || value === 2 || value === 3) {
    return value;
  }
  return null;
}

/**
 * Format a screen position for log output
 */
export function fmtPoint(point: { x: number; y: number } | null): string {
  if (point === null) return "n/a";
  return "(" + point.x + ", " + point.y + ")";
}
