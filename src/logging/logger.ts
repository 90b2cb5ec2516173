/**
 * Main logger coordinator
 *
 * Combines filtering, formatting, and output sinks into a unified logging system.
 *
 * Features:
 * - Multiple log levels (DEBUG, INFO, WARNING, CRITICAL)
 * - Multiple output sinks (console, file), each with its own minimum level
 * - Runtime level adjustment
 * - Callback-based sink initialization
 */

import { formatLogMessage, shouldLog } from './helpers';

import type { LogLevel, LogLevels, Logger, LoggerConfig, LoggerDependencies, InitMessage, SinkWithLevel } from './types';

/**
 * Create a logger instance
 *
 * Each message is:
 * 1. Checked against the current log level
 * 2. Formatted with time and a level tag
 * 3. Written to every sink whose minimum level it meets
 *
 * @param config - Logger configuration (level)
 * @param dependencies - External dependencies (timeSource, sinks)
 * @param logLevels - Log level constants object
 * @returns Logger instance with log methods
 *
 * @example
 * ```typescript
 * const logger = createLogger(
 *   { level: LOG_LEVELS.INFO },
 *   {
 *     timeSource: Date.now,
 *     sinks: [
 *       { sink: consoleSink, minLevel: LOG_LEVELS.INFO },
 *       { sink: fileSink, minLevel: LOG_LEVELS.DEBUG }
 *     ]
 *   },
 *   LOG_LEVELS
 * );
 *
 * logger.info("Muter started");
 * ```
 */
export function createLogger(
  config: LoggerConfig,
  dependencies: LoggerDependencies,
  logLevels: LogLevels
): Logger {
  let currentLevel = config.level;
  const timeSource = dependencies.timeSource;
  const sinks: SinkWithLevel[] = dependencies.sinks;

  function log(level: LogLevel, msg: string): void {
    if (!shouldLog(level, currentLevel)) {
      return;
    }

    const formattedMessage = formatLogMessage(level, msg, timeSource(), logLevels);

    for (let i = 0; i < sinks.length; i++) {
      if (level < sinks[i].minLevel) {
        continue;
      }

      try {
        sinks[i].sink.write(formattedMessage, level);
      } catch (err) {
        // Sink errors should not crash the logger
        console.warn('Logger sink error: ' + String(err));
      }
    }
  }

  function debug(msg: string): void {
    log(logLevels.DEBUG, msg);
  }

  function info(msg: string): void {
    log(logLevels.INFO, msg);
  }

  function warning(msg: string): void {
    log(logLevels.WARNING, msg);
  }

  function critical(msg: string): void {
    log(logLevels.CRITICAL, msg);
  }

  function setLevel(newLevel: LogLevel): void {
    currentLevel = newLevel;
  }

  function getLevel(): LogLevel {
    return currentLevel;
  }

  /**
   * Initialize all sinks
   * @param callback - Called once every sink has reported, with (success, messages[])
   */
  function initialize(callback: (success: boolean, messages: InitMessage[]) => void): void {
    const messages: InitMessage[] = [];
    const pending: SinkWithLevel[] = sinks.filter(function(s) { return s.sink.initialize !== undefined; });
    let completed = 0;

    if (pending.length === 0) {
      callback(true, messages);
      return;
    }

    pending.forEach(function(entry) {
      const init = entry.sink.initialize;
      if (!init) {
        return;
      }
      init.call(entry.sink, function(success: boolean, message: string) {
        messages.push({ success: success, message: message });
        completed++;
        if (completed === pending.length) {
          callback(messages.every(function(m) { return m.success; }), messages);
        }
      });
    });
  }

  /**
   * Close all sinks that hold resources
   */
  async function close(): Promise<void> {
    for (const entry of sinks) {
      if (entry.sink.close) {
        await entry.sink.close();
      }
    }
  }

  return {
    log: log,
    debug: debug,
    info: info,
    warning: warning,
    critical: critical,
    setLevel: setLevel,
    getLevel: getLevel,
    initialize: initialize,
    close: close
  };
}
