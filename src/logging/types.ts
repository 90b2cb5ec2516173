/**
 * Logging type definitions
 *
 * Types for the logging system including:
 * - Logger interface and configuration
 * - Sink interfaces (console, file)
 * - Initialization messages
 */

// ═══════════════════════════════════════════════════════════════
// LOG LEVEL TYPES
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
// ═══════════════════════════════════════════════════════════════

/**
 * Main logger interface
 * Provides leveled logging methods and runtime configuration
 */
export interface Logger {
  log(level: LogLevel, msg: string): void;
  debug(msg: string): void;
  info(msg: string): void;
  warning(msg: string): void;
  critical(msg: string): void;
  /** Update log level at runtime */
  setLevel(newLevel: LogLevel): void;
  getLevel(): LogLevel;
  /** Initialize all sinks */
  initialize(callback: (success: boolean, messages: InitMessage[]) => void): void;
  /** Flush and release sinks that hold resources */
  close(): Promise<void>;
}

export interface LoggerConfig {
  /** Current log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL) */
  level: LogLevel;
}

/**
 * Sink with its minimum log level
 * Logger filters messages before sending to each sink
 */
export interface SinkWithLevel {
  sink: LogSink;
  /** Minimum level this sink receives */
  minLevel: LogLevel;
}

/**
 * Logger external dependencies
 */
export interface LoggerDependencies {
  /** Function returning current time in milliseconds since epoch */
  timeSource: () => number;
  sinks: SinkWithLevel[];
}

// ═══════════════════════════════════════════════════════════════
// SINK TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Base sink interface
 * Level filtering happens in logger before write() is called;
 * the level is passed along for presentation only
 */
export interface LogSink {
  write(formattedMessage: string, level: LogLevel): void;
  /** Optional initialization (e.g., open a file) */
  initialize?(callback: (success: boolean, message: string) => void): void;
  /** Optional teardown */
  close?(): Promise<void>;
}

export interface ConsoleSinkConfig {
  /** Colorize output by level */
  colors: boolean;
}

/**
 * Console API interface
 * Abstraction over global console for testability
 */
export interface ConsoleAPI {
  log(message: string): void;
  warn(message: string): void;
}

export interface FileSinkConfig {
  /** Path of the append-only log file */
  path: string;
}

/**
 * File sink interface
 * Appends plain (uncolored) lines to a log file
 */
export interface FileSink extends LogSink {
  initialize(callback: (success: boolean, message: string) => void): void;
  close(): Promise<void>;
  isOpen(): boolean;
}

// ═══════════════════════════════════════════════════════════════
// INITIALIZATION TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Initialization result message
 * Returned by sinks during initialization
 */
export interface InitMessage {
  success: boolean;
  message: string;
}
