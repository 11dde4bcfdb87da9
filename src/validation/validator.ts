/**
 * Configuration validator
 *
 * Runs after the environment is parsed and before any network call.
 * Errors fail the run with a configuration exit code; warnings are logged.
 */

import { TIME_CONSTANTS } from '@utils/constants';

import { addWarning, validateHttpUrl, validateMinInteger, validateNumberRange } from './helpers';

import type { AlertUserConfig } from '$types';
import type { ValidationError, ValidationResult, ValidationWarning } from './types';

export function validateConfig(config: AlertUserConfig): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  // Location
  validateNumberRange(config.LATITUDE, 'LATITUDE', -90, 90, errors);
  validateNumberRange(config.LONGITUDE, 'LONGITUDE', -180, 180, errors);

  // Weather API
  validateHttpUrl(config.REDMET_BASE, 'REDMET_BASE', errors);

  // Slot grid and query window
  validateMinInteger(config.SLOT_MINUTES, 'SLOT_MINUTES', 1, errors);
  validateMinInteger(config.MAX_AGE_MIN, 'MAX_AGE_MIN', 0, errors);
  validateMinInteger(config.LOOKBACK_HOURS, 'LOOKBACK_HOURS', 1, errors);
  validateMinInteger(config.SUPPRESS_IF_OLDER_THAN_MIN, 'SUPPRESS_IF_OLDER_THAN_MIN', 0, errors);

  const slotValid = !errors.some(function(e) { return e.field === 'SLOT_MINUTES'; });
  if (slotValid && TIME_CONSTANTS.MINUTES_PER_HOUR % config.SLOT_MINUTES !== 0) {
    addWarning(warnings, 'SLOT_MINUTES', `SLOT_MINUTES does not divide an hour (got ${config.SLOT_MINUTES})`);
  }

  // Readings on the oldest slots would always be suppressed
  if (config.SUPPRESS_IF_OLDER_THAN_MIN < config.MAX_AGE_MIN) {
    addWarning(
      warnings,
      'SUPPRESS_IF_OLDER_THAN_MIN',
      `SUPPRESS_IF_OLDER_THAN_MIN (${config.SUPPRESS_IF_OLDER_THAN_MIN}) is below MAX_AGE_MIN (${config.MAX_AGE_MIN})`
    );
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings
  };
}
