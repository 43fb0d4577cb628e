/**
 * Logging helper functions
 */

import type { LogLevel, LogLevels, FilterContext } from './types';

/**
 * Format a battery percentage for log lines
 * @param pct - Battery level, or null when never reported
 * @returns "87%" or "n/a"
 */
export function fmtBattery(pct: number | null): string {
  if (pct === null) return 'n/a';
  return pct + '%';
}

/**
 * Format log message with level tag
 *
 * Adds a prefix tag to the message based on log level:
 * - DEBUG: "[DEBUG]    "
 * - INFO: "ℹ️ [INFO]     "
 * - WARNING: "⚠️ [WARNING]  "
 * - CRITICAL: "🚨 [CRITICAL] "
 *
 * @param level - Log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL)
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
 * Check if message should be logged based on level and auto-demotion
 *
 * Filtering rules:
 * 1. Basic level filtering: message level must be >= current level
 * 2. Auto-demotion: INFO logs are suppressed after demoteHours uptime
 *    (only when not in DEBUG mode, and demoteHours > 0)
 *
 * @param level - Log level to check
 * @param context - Filtering context with currentLevel, uptime, demoteHours
 * @param logLevels - Log level constants object
 * @returns True if message should be logged, false to suppress
 */
export function shouldLog(level: LogLevel, context: FilterContext, logLevels: LogLevels): boolean {
  if (level < context.currentLevel) {
    return false;
  }

  if (level === logLevels.INFO &&
      context.currentLevel > logLevels.DEBUG &&
      context.demoteHours > 0) {
    if (context.uptime > context.demoteHours * 3600) {
      return false;
    }
  }

  return true;
}

/**
 * Parse a log level from a name ("debug", "warning", ...) or a digit ("0".."3")
 * @param value - Raw value, e.g. from an environment variable
 * @returns Log level, or null when not recognized
 */
export function parseLogLevel(value: string): LogLevel | null {
  switch (value.trim().toLowerCase()) {
    case '0':
    case 'debug':
      return 0;
    case '1':
    case 'info':
      return 1;
    case '2':
    case 'warn':
    case 'warning':
      return 2;
    case '3':
    case 'critical':
      return 3;
    default:
      return null;
  }
}
