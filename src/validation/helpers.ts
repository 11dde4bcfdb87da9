/**
 * Validation helper functions
 * Provides reusable utilities for configuration validation
 */

import { isFiniteNumber, isInteger } from '@utils/number';

import type { ValidationError, ValidationWarning } from './types';

// ═══════════════════════════════════════════════════════════════
// ERROR AND WARNING BUILDERS
// ═══════════════════════════════════════════════════════════════

/**
 * Add a critical error to the errors list
 * @param errors - Array to append the error to
 * @param field - Field name that failed validation
 * @param message - Human-readable error message
 */
export function addError(errors: ValidationError[], field: string, message: string): void {
  errors.push({ level: 'CRITICAL', field: field, message: message });
}

/**
 * Add a warning to the warnings list
 * @param warnings - Array to append the warning to
 * @param field - Field name with sub-optimal value
 * @param message - Human-readable warning message
 */
export function addWarning(warnings: ValidationWarning[], field: string, message: string): void {
  warnings.push({ level: 'WARNING', field: field, message: message });
}

// ═══════════════════════════════════════════════════════════════
// RANGE VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Validate a number against an inclusive range
 *
 * NaN and Infinity are always out of range.
 *
 * @param value - Value to validate
 * @param field - Field name for error messages
 * @param min - Minimum acceptable value
 * @param max - Maximum acceptable value
 * @param errors - Array to append errors to
 */
export function validateNumberRange(
  value: number,
  field: string,
  min: number,
  max: number,
  errors: ValidationError[]
): void {
  if (!isFiniteNumber(value) || value < min || value > max) {
    addError(errors, field, `${field} must be between ${min} and ${max} (got ${value})`);
  }
}

/**
 * Validate an integer with a lower bound
 *
 * @param value - Value to validate
 * @param field - Field name for error messages
 * @param min - Minimum acceptable value
 * @param errors - Array to append errors to
 */
export function validateMinInteger(
  value: number,
  field: string,
  min: number,
  errors: ValidationError[]
): void {
  if (!isInteger(value)) {
    addError(errors, field, `${field} must be an integer (got ${value})`);
    return;
  }

  if (value < min) {
    addError(errors, field, `${field} must be at least ${min} (got ${value})`);
  }
}

// ═══════════════════════════════════════════════════════════════
// FORMAT VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Validate an absolute http(s) URL
 *
 * @param value - Value to validate
 * @param field - Field name for error messages
 * @param errors - Array to append errors to
 */
export function validateHttpUrl(value: string, field: string, errors: ValidationError[]): void {
  let protocol: string | null = null;
  try {
    protocol = new URL(value).protocol;
  } catch (_err) {
    protocol = null;
  }

  if (protocol !== 'http:' && protocol !== 'https:') {
    addError(errors, field, `${field} must be an http(s) URL (got ${value})`);
  }
}
