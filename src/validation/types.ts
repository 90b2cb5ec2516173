/**
 * Validation result types
 */

/**
 * A problem that stops startup, tagged with the config key it belongs to
 */
export interface ValidationError {
  field: string;
  message: string;
  level: 'CRITICAL';
}

/**
 * A setting that works but is outside its recommended range
 */
export interface ValidationWarning {
  field: string;
  message: string;
  level: 'WARNING';
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}
