/**
 * Logging type definitions
 *
 * Types for the logging system including:
 * - Logger interface and configuration
 * - Sink interfaces (console, file)
 * - Filter context
 * - Initialization messages
 */

import type { TimerAPI } from '$types/platform';

// ═══════════════════════════════════════════════════════════════
// LOG LEVEL TYPES
// Core log level type definitions
// ═══════════════════════════════════════════════════════════════

/**
 * Log level (matches CONFIG.LOG_LEVELS values)
 */
export type LogLevel = 0 | 1 | 2 | 3; // DEBUG | INFO | WARNING | CRITICAL

/**
 * Log level constants structure
 * Passed to pure functions instead of importing CONFIG
 */
export interface LogLevels {
  DEBUG: 0;
  INFO: 1;
  WARNING: 2;
  CRITICAL: 3;
}

// ═══════════════════════════════════════════════════════════════
// LOGGER TYPES
// Core logger interface and configuration
// ═══════════════════════════════════════════════════════════════

/**
 * Leveled logging methods
 * Sessions and modules receive this narrow view
 */
export interface Logger {
  /** Log at specified level */
  log(level: LogLevel, msg: string): void;
  debug(msg: string): void;
  info(msg: string): void;
  warning(msg: string): void;
  critical(msg: string): void;
  /** Same sinks and level, every message prefixed with "[scope] " */
  scope(name: string): Logger;
}

/**
 * Root logger owning the sinks
 */
export interface RootLogger extends Logger {
  /** Update log level at runtime */
  setLevel(newLevel: LogLevel): void;
  /** Get current log level */
  getLevel(): LogLevel;
  /** Initialize all sinks */
  initialize(): Promise<InitMessage[]>;
  /** Flush and release all sinks */
  close(): Promise<void>;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Current log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL) */
  level: LogLevel;
  /** Hours after which to auto-demote INFO logs (0 to disable) */
  demoteHours: number;
}

/**
 * Sink with its minimum log level
 * Logger filters messages before sending to each sink
 */
export interface SinkWithLevel {
  sink: LogSink;
  /** Minimum level this sink receives (filters before buffering) */
  minLevel: LogLevel;
}

/**
 * Logger external dependencies
 */
export interface LoggerDependencies {
  /** Function returning current time in seconds */
  timeSource: () => number;
  sinks: SinkWithLevel[];
  /** Where sink failures are reported (defaults to console.warn) */
  onSinkError?: (message: string) => void;
}

// ═══════════════════════════════════════════════════════════════
// SINK TYPES
// Output sink interfaces for console and file
// ═══════════════════════════════════════════════════════════════

/**
 * Base sink interface
 * Level filtering happens in the logger before write() is called;
 * the level is passed along for presentation only.
 */
export interface LogSink {
  /** Write formatted message to sink (already filtered by level) */
  write(formattedMessage: string, level: LogLevel): void;
  /** Optional initialization (start timers, open files) */
  initialize?(): Promise<InitMessage>;
  /** Optional flush and release */
  close?(): Promise<void>;
}

/**
 * Console sink interface
 * Buffers messages and drains at fixed interval
 */
export interface ConsoleSink extends LogSink {
  initialize(): Promise<InitMessage>;
  close(): Promise<void>;
  /** Get current buffer size (for testing/monitoring) */
  getBufferSize(): number;
}

/**
 * Console sink configuration
 */
export interface ConsoleSinkConfig {
  /** Maximum messages in buffer before dropping */
  bufferSize: number;
  /** Interval between drains (ms) */
  drainInterval: number;
  /** Colorize by level with chalk */
  color: boolean;
}

/**
 * Console API interface
 * Abstraction over global console for testability
 */
export interface ConsoleAPI {
  log(message: string): void;
  warn(message: string): void;
}

/**
 * Console sink dependencies
 */
export interface ConsoleSinkDependencies {
  timer: TimerAPI;
  console: ConsoleAPI;
}

/**
 * File sink interface
 * Appends one timestamped line per message
 */
export interface FileSink extends LogSink {
  initialize(): Promise<InitMessage>;
  close(): Promise<void>;
  /** Whether the file is open for writing */
  isOpen(): boolean;
}

/**
 * File sink configuration
 */
export interface FileSinkConfig {
  path: string;
}

// ═══════════════════════════════════════════════════════════════
// FILTER TYPES
// Types for log filtering logic
// ═══════════════════════════════════════════════════════════════

/**
 * Context for log filtering decisions
 */
export interface FilterContext {
  currentLevel: LogLevel;
  /** Logger uptime in seconds */
  uptime: number;
  /** Hours after which to demote INFO logs */
  demoteHours: number;
}

// ═══════════════════════════════════════════════════════════════
// INITIALIZATION TYPES
// Types for sink initialization feedback
// ═══════════════════════════════════════════════════════════════

/**
 * Initialization result message
 * Returned by sinks during initialization
 */
export interface InitMessage {
  success: boolean;
  /** Human-readable status message */
  message: string;
}
