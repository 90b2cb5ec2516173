/**
 * Console output sink
 *
 * Writes each message as soon as it is logged. DEBUG and INFO go to the
 * regular log stream, WARNING and CRITICAL to the warning stream, so the
 * interactive menu on stdout stays readable when stderr is redirected.
 */

import chalk from 'chalk';

import type { LogLevel, LogSink, ConsoleSinkConfig, ConsoleAPI } from '../types';

/**
 * Apply the level color to a formatted line
 */
function colorize(formattedMessage: string, level: LogLevel): string {
  if (level === 0) return chalk.gray(formattedMessage);
  if (level === 2) return chalk.yellow(formattedMessage);
  if (level === 3) return chalk.red.bold(formattedMessage);
  return formattedMessage;
}

/**
 * Create a console sink
 *
 * @param consoleApi - Console API for output (global console object)
 * @param config - Sink configuration (colors)
 * @returns Console sink instance
 *
 * @example
 * ```typescript
 * const consoleSink = createConsoleSink(console, { colors: true });
 * consoleSink.write("09:05:03 [INFO]     Muter started", 1);
 * ```
 */
export function createConsoleSink(
  consoleApi: ConsoleAPI,
  config: ConsoleSinkConfig
): LogSink {
  function write(formattedMessage: string, level: LogLevel): void {
    const line = config.colors ? colorize(formattedMessage, level) : formattedMessage;
    if (level >= 2) {
      consoleApi.warn(line);
    } else {
      consoleApi.log(line);
    }
  }

  return {
    write: write
  };
}
