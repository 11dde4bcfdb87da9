/**
 * Tests for validation helpers
 */

import { addError, addWarning, validateHttpUrl, validateMinInteger, validateNumberRange } from './helpers';

import type { ValidationError, ValidationWarning } from './types';

describe('Validation Helpers', () => {
  let errors: ValidationError[];
  let warnings: ValidationWarning[];

  beforeEach(() => {
    errors = [];
    warnings = [];
  });

  describe('addError / addWarning', () => {
    it('should tag errors as CRITICAL', () => {
      addError(errors, 'X', 'bad');
      expect(errors).toEqual([{ level: 'CRITICAL', field: 'X', message: 'bad' }]);
    });

    it('should tag warnings as WARNING', () => {
      addWarning(warnings, 'X', 'odd');
      expect(warnings).toEqual([{ level: 'WARNING', field: 'X', message: 'odd' }]);
    });
  });

  describe('validateNumberRange', () => {
    it('should accept values inside the range', () => {
      validateNumberRange(0, 'LAT', -90, 90, errors);
      expect(errors).toEqual([]);
    });

    it('should reject NaN', () => {
      validateNumberRange(Number.NaN, 'LAT', -90, 90, errors);
      expect(errors[0].message).toBe('LAT must be between -90 and 90 (got NaN)');
    });

    it('should reject Infinity', () => {
      validateNumberRange(Number.POSITIVE_INFINITY, 'LAT', -90, 90, errors);
      expect(errors).toHaveLength(1);
    });
  });

  describe('validateMinInteger', () => {
    it('should accept the bound itself', () => {
      validateMinInteger(1, 'N', 1, errors);
      expect(errors).toEqual([]);
    });

    it('should report a non-integer once', () => {
      validateMinInteger(-0.5, 'N', 1, errors);
      expect(errors.map(e => e.message)).toEqual(['N must be an integer (got -0.5)']);
    });
  });

  describe('validateHttpUrl', () => {
    it('should accept https URLs', () => {
      validateHttpUrl('https://api.example.test/ws', 'BASE', errors);
      expect(errors).toEqual([]);
    });

    it('should reject an empty string', () => {
      validateHttpUrl('', 'BASE', errors);
      expect(errors.map(e => e.message)).toEqual(['BASE must be an http(s) URL (got )']);
    });
  });
});
