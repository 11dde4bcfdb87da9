/**
 * Time utility functions
 */

/**
 * Get the current local wall-clock instant
 * @returns Current time
 */
export function now(): Date {
  return new Date();
}
