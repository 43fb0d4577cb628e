/**
 * Console output sink with timed buffering
 *
 * Messages are queued by write() and flushed on a fixed interval so that
 * logging from the control loop never blocks a tick on terminal I/O:
 * - Buffering messages up to a configurable limit
 * - Draining the queue at fixed intervals
 * - Dropping messages with warning when buffer overflows
 * - Flushing what is left on close()
 */

import chalk from 'chalk';

import type { TimerHandle } from '$types/platform';
import type {
  ConsoleSink,
  ConsoleSinkConfig,
  ConsoleSinkDependencies,
  InitMessage,
  LogLevel
} from '../types';

interface BufferedLine {
  text: string;
  level: LogLevel;
}

/**
 * Apply the level color to a line
 * @param text - Formatted line
 * @param level - Level the line was logged at
 */
function colorize(text: string, level: LogLevel): string {
  switch (level) {
    case 0:
      return chalk.gray(text);
    case 2:
      return chalk.yellow(text);
    case 3:
      return chalk.red.bold(text);
    default:
      return text;
  }
}

/**
 * Create a console sink with buffering
 *
 * @param dependencies - Timer for the drain interval, console for output
 * @param config - Sink configuration (bufferSize, drainInterval, color)
 * @returns Console sink instance
 *
 * @example
 * ```typescript
 * const consoleSink = createConsoleSink(
 *   { timer: createNodeTimer(true), console: console },
 *   { bufferSize: 200, drainInterval: 50, color: true }
 * );
 * await consoleSink.initialize();
 * consoleSink.write('Hello world', LOG_LEVELS.INFO);
 * ```
 */
export function createConsoleSink(
  dependencies: ConsoleSinkDependencies,
  config: ConsoleSinkConfig
): ConsoleSink {
  const timer = dependencies.timer;
  const output = dependencies.console;
  const buffer: BufferedLine[] = [];
  let drainHandle: TimerHandle | null = null;

  /**
   * Write every buffered line in FIFO order
   * Warnings and above go to stderr
   */
  function drain(): void {
    const lines = buffer.splice(0, buffer.length);

    for (const line of lines) {
      const text = config.color ? colorize(line.text, line.level) : line.text;
      if (line.level >= 2) {
        output.warn(text);
      } else {
        output.log(text);
      }
    }
  }

  function write(formattedMessage: string, level: LogLevel): void {
    if (buffer.length < config.bufferSize) {
      buffer.push({ text: formattedMessage, level: level });
    } else {
      output.warn('Console log buffer overflow, dropping message: ' + formattedMessage);
    }
  }

  function getBufferSize(): number {
    return buffer.length;
  }

  /**
   * Start the drain timer (idempotent)
   */
  async function initialize(): Promise<InitMessage> {
    if (drainHandle === null) {
      drainHandle = timer.set(config.drainInterval, true, drain);
    }
    return { success: true, message: 'Console sink initialized' };
  }

  /**
   * Stop the drain timer and flush what is left
   */
  async function close(): Promise<void> {
    if (drainHandle !== null) {
      timer.clear(drainHandle);
      drainHandle = null;
    }
    drain();
  }

  return {
    write: write,
    initialize: initialize,
    close: close,
    getBufferSize: getBufferSize
  };
}
