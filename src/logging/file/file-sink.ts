/**
 * Append-only log file sink
 *
 * One line per message, prefixed with an ISO timestamp. The parent
 * directory is created on initialize(). Messages written before the file
 * is open, or after it failed, are dropped.
 */

import { once } from 'node:events';
import { createWriteStream, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import type { WriteStream } from 'node:fs';
import type { FileSink, FileSinkConfig, InitMessage, LogLevel } from '../types';

/**
 * File sink dependencies
 */
export interface FileSinkDependencies {
  /** Timestamp prefix for each line */
  timestamp?: () => string;
  /** Receives stream errors after the file was opened */
  onError?: (message: string) => void;
}

/**
 * Create a file sink
 *
 * @param config - Target file path
 * @param dependencies - Optional timestamp source and error reporter
 * @returns File sink instance
 */
export function createFileSink(config: FileSinkConfig, dependencies: FileSinkDependencies = {}): FileSink {
  const timestamp = dependencies.timestamp ?? function () { return new Date().toISOString(); };
  const onError = dependencies.onError ?? function (message: string) { console.warn(message); };
  let stream: WriteStream | null = null;

  function write(formattedMessage: string, _level: LogLevel): void {
    if (stream === null) return;
    stream.write(timestamp() + ' ' + formattedMessage + '\n');
  }

  async function initialize(): Promise<InitMessage> {
    if (stream !== null) {
      return { success: true, message: 'File sink already open: ' + config.path };
    }

    try {
      mkdirSync(dirname(config.path), { recursive: true });
      const opened = createWriteStream(config.path, { flags: 'a' });
      await once(opened, 'open');

      opened.on('error', function (err: Error) {
        stream = null;
        onError('File log sink disabled: ' + err.message);
      });
      stream = opened;
      return { success: true, message: 'File sink writing to ' + config.path };
    } catch (err) {
      return { success: false, message: 'File sink could not open ' + config.path + ': ' + String(err) };
    }
  }

  async function close(): Promise<void> {
    const current = stream;
    if (current === null) return;

    stream = null;
    await new Promise<void>(function (resolve) {
      current.end(function () { resolve(); });
    });
  }

  function isOpen(): boolean {
    return stream !== null;
  }

  return {
    write: write,
    initialize: initialize,
    close: close,
    isOpen: isOpen
  };
}
