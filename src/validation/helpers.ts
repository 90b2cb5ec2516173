/**
 * Validation helper functions
 * Provides reusable utilities for configuration validation
 */

import { toLogLevel } from '@logging';
import { isFiniteNumber, isInteger } from '@utils/number';

import type { ValidationError, ValidationWarning } from './types';

// ═══════════════════════════════════════════════════════════════
// ERROR AND WARNING BUILDERS
// ═══════════════════════════════════════════════════════════════

/**
 * Add a critical error to the errors list
 */
export function addError(errors: ValidationError[], field: string, message: string): void {
  errors.push({ level: 'CRITICAL', field: field, message: message });
}

/**
 * Add a warning to the warnings list
 */
export function addWarning(warnings: ValidationWarning[], field: string, message: string): void {
  warnings.push({ level: 'WARNING', field: field, message: message });
}

// ═══════════════════════════════════════════════════════════════
// TYPE VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Validate that a value is a boolean
 * @param value - Value to validate
 * @param field - Field name for error messages
 * @param errors - Array to append errors to
 */
export function validateBoolean(
  value: unknown,
  field: string,
  errors: ValidationError[]
): void {
  if (typeof value !== 'boolean') {
    addError(errors, field, `${field} must be a boolean (got ${typeof value})`);
  }
}

/**
 * Validate that a value is a non-empty (after trimming) string
 */
export function validateNonEmptyString(
  value: unknown,
  field: string,
  errors: ValidationError[]
): void {
  if (typeof value !== 'string' || value.trim().length === 0) {
    addError(errors, field, `${field} must be a non-empty string`);
  }
}

/**
 * Validate that a number is one of the LOG_LEVELS values
 */
export function validateLogLevel(
  value: number,
  field: string,
  errors: ValidationError[]
): void {
  if (toLogLevel(value) === null) {
    addError(errors, field, `${field} must be 0 (DEBUG), 1 (INFO), 2 (WARNING) or 3 (CRITICAL) (got ${value})`);
  }
}

// ═══════════════════════════════════════════════════════════════
// RANGE VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Optional recommended range; values outside it only warn
 */
export interface RecommendedRange {
  min: number;
  max: number;
}

/**
 * Validate a number against critical and recommended ranges
 *
 * Critical range violations produce errors (validation fails).
 * Recommended range violations produce warnings (validation passes).
 *
 * @param value - Value to validate
 * @param field - Field name for error messages
 * @param criticalMin - Minimum acceptable value (hard limit)
 * @param criticalMax - Maximum acceptable value (hard limit)
 * @param errors - Array to append errors to
 * @param warnings - Array to append warnings to
 * @param recommended - Recommended range (optional)
 */
export function validateNumberRange(
  value: number,
  field: string,
  criticalMin: number,
  criticalMax: number,
  errors: ValidationError[],
  warnings: ValidationWarning[],
  recommended?: RecommendedRange
): void {
  if (!isFiniteNumber(value) || value < criticalMin || value > criticalMax) {
    addError(errors, field, `${field} must be between ${criticalMin} and ${criticalMax} (got ${value})`);
    return;
  }

  if (recommended && (value < recommended.min || value > recommended.max)) {
    addWarning(
      warnings,
      field,
      `${field} is outside recommended range ${recommended.min}-${recommended.max} (got ${value})`
    );
  }
}

/**
 * Validate an integer against critical and recommended ranges
 */
export function validateIntegerRange(
  value: number,
  field: string,
  criticalMin: number,
  criticalMax: number,
  errors: ValidationError[],
  warnings: ValidationWarning[],
  recommended?: RecommendedRange
): void {
  if (!isInteger(value)) {
    addError(errors, field, `${field} must be an integer (got ${value})`);
    return;
  }

  validateNumberRange(value, field, criticalMin, criticalMax, errors, warnings, recommended);
}
