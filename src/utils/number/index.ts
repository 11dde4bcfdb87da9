/**
 * Number utilities
 *
 * API payloads carry numeric fields as numbers, numeric strings, empty
 * strings or nulls depending on the station firmware. These helpers turn
 * them into either a finite number or null.
 */

const DECIMAL_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Check if a value is a finite number
 *
 * Does NOT coerce: isFiniteNumber("5") = false.
 *
 * @param value - Value to check
 * @returns true if value is a finite number
 */
export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Check if a value is an integer
 *
 * @param value - Value to check
 * @returns true if value is an integer
 */
export function isInteger(value: unknown): value is number {
  return isFiniteNumber(value) && Math.floor(value) === value;
}

/**
 * Coerce a loosely-typed field to a decimal
 *
 * - finite numbers pass through
 * - decimal strings ("31.5", " 7 ", "-2.5e1") are parsed
 * - anything else (null, "", "n/d", NaN, Infinity, booleans, objects) yields null
 *
 * @param value - Raw field value
 * @returns Finite number or null
 */
export function toOptionalNumber(value: unknown): number | null {
  if (isFiniteNumber(value)) {
    return value;
  }

  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!DECIMAL_TEXT.test(trimmed)) {
      return null;
    }
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }

  return null;
}

/**
 * Format with one decimal, rounding exact ties to the even digit
 *
 * toFixed rounds ties away from zero, so 12.25 would print as "12.3".
 * Only multiples of 0.25 can be exact ties at one decimal.
 *
 * @param value - Value to format
 * @returns Text such as "12.2"
 */
export function formatOneDecimal(value: number): string {
  if (!Number.isInteger(value * 4) || Number.isInteger(value * 2)) {
    return value.toFixed(1);
  }

  const tenths = Math.floor(Math.abs(value) * 10);
  const even = tenths % 2 === 0 ? tenths : tenths + 1;
  return (value < 0 ? '-' : '') + (even / 10).toFixed(1);
}
