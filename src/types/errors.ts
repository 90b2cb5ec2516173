/**
 * Global error types for ad-mute
 * Startup and bridge failures; detection misses and actuator failures are never thrown
 */

/**
 * Base validation error for all modules
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when the merged configuration fails validation
 */
export class ConfigValidationError extends ValidationError {
  readonly fields: string[];

  constructor(message: string, fields: string[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.fields = fields;
  }
}

/**
 * Error thrown when the controller cannot be started
 * (template directory missing, actuator backend unavailable)
 */
export class StartupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StartupError';
  }
}

/**
 * Error thrown when a template image cannot be read or decoded
 */
export class TemplateLoadError extends Error {
  readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = 'TemplateLoadError';
    this.path = path;
  }
}

/**
 * Error thrown when a PowerShell bridge script fails to run or returns bad output
 */
export class PowerShellError extends Error {
  readonly script: string;

  constructor(message: string, script: string) {
    super(message);
    this.name = 'PowerShellError';
    this.script = script;
  }
}
