/**
 * Common type definitions used throughout the project
 */

/**
 * Optional decimal reading - null when the API omits the field or sends a non-numeric value
 */
export type OptionalReading = number | null;

/**
 * Geographic point in decimal degrees
 */
export interface Coordinate {
  readonly latitude: number;
  readonly longitude: number;
}
