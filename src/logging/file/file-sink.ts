/**
 * Append-only file sink
 *
 * Opens the log file on initialize (creating its directory) and appends one
 * plain line per message. Messages written before initialize are dropped,
 * and so is everything after a write error.
 */

import * as fs from 'fs';
import * as path from 'path';

import type { FileSink, FileSinkConfig, LogLevel } from '../types';

/**
 * Create a file sink
 *
 * @param config - Sink configuration (path)
 * @returns File sink instance
 */
export function createFileSink(config: FileSinkConfig): FileSink {
  let stream: fs.WriteStream | null = null;

  function write(formattedMessage: string, _level: LogLevel): void {
    if (stream === null) {
      return;
    }
    stream.write(formattedMessage + "\n");
  }

  function initialize(callback: (success: boolean, message: string) => void): void {
    let opening: fs.WriteStream;
    try {
      fs.mkdirSync(path.dirname(config.path), { recursive: true });
      opening = fs.createWriteStream(config.path, { flags: 'a' });
    } catch (err) {
      stream = null;
      callback(false, 'File sink disabled: ' + (err instanceof Error ? err.message : String(err)));
      return;
    }

    let opened = false;
    stream = opening;

    opening.on('open', function() {
      opened = true;
      callback(true, 'File sink writing to ' + config.path);
    });

    // Open failures go to the init callback; later ones to the console
    opening.on('error', function(err: Error) {
      if (stream === opening) {
        stream = null;
      }
      if (opened) {
        console.warn('[WARNING]  File sink disabled: ' + err.message);
      } else {
        callback(false, 'File sink disabled: ' + err.message);
      }
    });
  }

  function close(): Promise<void> {
    const current = stream;
    stream = null;
    if (current === null) {
      return Promise.resolve();
    }
    return new Promise(function(resolve) {
      current.end(function() { resolve(); });
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
