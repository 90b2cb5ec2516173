/**
 * Logging module barrel export
 *
 * The logging system includes:
 * - Logger coordinator (createLogger)
 * - Console sink with level colors (createConsoleSink)
 * - Append-only file sink (createFileSink)
 * - Pure filter and format functions
 */

export { formatLogMessage, formatClock, levelTag, shouldLog, toLogLevel, fmtPoint } from './helpers';
export { createConsoleSink } from './console/console-sink';
export { createFileSink } from './file/file-sink';
export { createLogger } from './logger';

export type {
  LogLevel,
  LogLevels,
  Logger,
  LoggerConfig,
  LoggerDependencies,
  SinkWithLevel,
  LogSink,
  ConsoleSinkConfig,
  ConsoleAPI,
  FileSink,
  FileSinkConfig,
  InitMessage
} from './types';
