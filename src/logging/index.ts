/**
 * Logging module barrel export
 *
 * The logging system includes:
 * - Logger coordinator (createLogger)
 * - Console sink with buffering and colors (createConsoleSink)
 * - Append-only file sink (createFileSink)
 * - Pure filter and format functions
 */

export { formatLogMessage, shouldLog, fmtBattery, parseLogLevel } from './helpers';
export { createConsoleSink } from './console';
export { createFileSink } from './file';
export { createLogger } from './logger';

export type { FileSinkDependencies } from './file';
export type {
  LogLevel,
  LogLevels,
  Logger,
  RootLogger,
  LoggerConfig,
  LoggerDependencies,
  SinkWithLevel,
  LogSink,
  ConsoleSink,
  ConsoleSinkConfig,
  ConsoleSinkDependencies,
  ConsoleAPI,
  FileSink,
  FileSinkConfig,
  FilterContext,
  InitMessage
} from './types';
