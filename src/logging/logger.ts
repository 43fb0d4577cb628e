/**
 * Main logger coordinator
 *
 * Combines filtering, formatting, and output sinks into a unified logging system.
 * The logger routes messages through filters and formatters before writing to sinks.
 *
 * Features:
 * - Multiple log levels (DEBUG, INFO, WARNING, CRITICAL)
 * - Auto-demotion of INFO logs after configurable uptime
 * - Multiple output sinks (console, file)
 * - Scoped views that prefix every message ("[slot 0] ...")
 * - Runtime level adjustment
 * - Async sink initialization
 */

import { formatLogMessage, shouldLog } from './helpers';

import type {
  LogLevel,
  LogLevels,
  Logger,
  RootLogger,
  LoggerConfig,
  LoggerDependencies,
  InitMessage,
  SinkWithLevel
} from './types';

/**
 * Create a logger instance
 *
 * Each message is:
 * 1. Checked against the current log level and auto-demotion rules
 * 2. Formatted with a level-appropriate tag
 * 3. Written to every sink whose minimum level it meets
 *
 * @param config - Logger configuration (level, demoteHours)
 * @param dependencies - External dependencies (timeSource, sinks)
 * @param logLevels - Log level constants object
 * @returns Root logger with log methods and sink lifecycle
 *
 * @example
 * ```typescript
 * const logger = createLogger(
 *   { level: LOG_LEVELS.INFO, demoteHours: 0 },
 *   {
 *     timeSource: now,
 *     sinks: [
 *       { sink: consoleSink, minLevel: LOG_LEVELS.INFO },
 *       { sink: fileSink, minLevel: LOG_LEVELS.DEBUG }
 *     ]
 *   },
 *   LOG_LEVELS
 * );
 *
 * logger.info('Bridge started');
 * logger.scope('slot 0').warning('Link lost');
 * ```
 */
export function createLogger(
  config: LoggerConfig,
  dependencies: LoggerDependencies,
  logLevels: LogLevels
): RootLogger {
  let currentLevel = config.level;
  const demoteHours = config.demoteHours;
  const timeSource = dependencies.timeSource;
  const sinks: SinkWithLevel[] = dependencies.sinks;
  const onSinkError = dependencies.onSinkError ?? function (message: string) { console.warn(message); };
  const startTime = timeSource();

  function log(level: LogLevel, msg: string): void {
    const context = {
      currentLevel: currentLevel,
      uptime: timeSource() - startTime,
      demoteHours: demoteHours
    };
    if (!shouldLog(level, context, logLevels)) {
      return;
    }

    const formattedMessage = formatLogMessage(level, msg, logLevels);

    for (const entry of sinks) {
      if (level < entry.minLevel) {
        continue;
      }

      try {
        entry.sink.write(formattedMessage, level);
      } catch (err) {
        // Sink errors should not crash the logger
        onSinkError('Logger sink error: ' + String(err));
      }
    }
  }

  /**
   * Build a logger view that prefixes every message
   * @param prefix - Text prepended to each message ("" for the root)
   */
  function view(prefix: string): Logger {
    function write(level: LogLevel, msg: string): void {
      log(level, prefix + msg);
    }

    return {
      log: write,
      debug: function (msg: string) { write(logLevels.DEBUG, msg); },
      info: function (msg: string) { write(logLevels.INFO, msg); },
      warning: function (msg: string) { write(logLevels.WARNING, msg); },
      critical: function (msg: string) { write(logLevels.CRITICAL, msg); },
      scope: function (name: string) { return view(prefix + '[' + name + '] '); }
    };
  }

  function setLevel(newLevel: LogLevel): void {
    currentLevel = newLevel;
  }

  function getLevel(): LogLevel {
    return currentLevel;
  }

  /**
   * Initialize all sinks concurrently
   * A sink that rejects is reported as a failed message, never as a rejection.
   */
  async function initialize(): Promise<InitMessage[]> {
    const pending: Promise<InitMessage>[] = [];

    for (const entry of sinks) {
      const sink = entry.sink;
      if (sink.initialize) {
        pending.push(sink.initialize().catch(function (err: unknown): InitMessage {
          return { success: false, message: 'Sink initialization failed: ' + String(err) };
        }));
      }
    }

    return Promise.all(pending);
  }

  /**
   * Flush and close every sink, reporting failures through onSinkError
   */
  async function close(): Promise<void> {
    for (const entry of sinks) {
      if (!entry.sink.close) continue;

      try {
        await entry.sink.close();
      } catch (err) {
        onSinkError('Logger sink close error: ' + String(err));
      }
    }
  }

  const root = view('');

  return {
    log: root.log,
    debug: root.debug,
    info: root.info,
    warning: root.warning,
    critical: root.critical,
    scope: root.scope,
    setLevel: setLevel,
    getLevel: getLevel,
    initialize: initialize,
    close: close
  };
}
