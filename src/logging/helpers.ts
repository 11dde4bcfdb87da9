/**
 * Logging helper functions
 */

import type { OptionalReading } from '$types/common';
import { formatOneDecimal } from '@utils/number';

import type { LogLevel, LogLevels } from './types';

/**
 * Format a Celsius reading for log and message text
 * @param value - Reading, null when unknown
 * @returns "31.4 °C" or "NA"
 */
export function fmtCelsius(value: OptionalReading): string {
  if (value === null) return 'NA';
  return formatOneDecimal(value) + ' °C';
}

/**
 * Format log message with level tag
 *
 * - DEBUG: "[DEBUG]    "
 * - INFO: "ℹ️ [INFO]     "
 * - WARNING: "⚠️ [WARNING]  "
 * - CRITICAL: "🚨 [CRITICAL] "
 *
 * @param level - Log level
 * @param msg - Message to format
 * @param logLevels - Log level constants object
 * @returns Formatted log line with level tag prefix
 */
export function formatLogMessage(level: LogLevel, msg: string, logLevels: LogLevels): string {
  let tag = '[DEBUG]    ';
  if (level === logLevels.INFO) tag = 'ℹ️ [INFO]     ';
  if (level === logLevels.WARNING) tag = '⚠️ [WARNING]  ';
  if (level === logLevels.CRITICAL) tag = '🚨 [CRITICAL] ';

  return tag + msg;
}

/**
 * Check if message meets the current level
 * @param level - Message level
 * @param currentLevel - Logger threshold
 * @returns True if message should be logged
 */
export function shouldLog(level: LogLevel, currentLevel: LogLevel): boolean {
  return level >= currentLevel;
}

/**
 * Parse a level name from configuration or the command line
 *
 * Case-insensitive; "warn" and "error" are accepted as aliases of
 * WARNING and CRITICAL.
 *
 * @param text - Level name
 * @param logLevels - Log level constants object
 * @returns Level, or null for an unknown name
 */
export function parseLogLevel(text: string, logLevels: LogLevels): LogLevel | null {
  switch (text.trim().toLowerCase()) {
    case 'debug':
      return logLevels.DEBUG;
    case 'info':
      return logLevels.INFO;
    case 'warn':
    case 'warning':
      return logLevels.WARNING;
    case 'error':
    case 'critical':
      return logLevels.CRITICAL;
    default:
      return null;
  }
}
