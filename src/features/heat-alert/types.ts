/**
 * Heat-index alert types
 */

/**
 * Outcome of the staleness and threshold rules for one selection
 */
export interface AlertDecision {
  /** Minutes between the reading timestamp and now (fractional) */
  ageMinutes: number;
  /** Reading older than SUPPRESS_IF_OLDER_THAN_MIN */
  suppressedByAge: boolean;
  /** Heat index at or below the threshold */
  suppressedByThreshold: boolean;
  /** Send the alert */
  shouldNotify: boolean;
}

/**
 * Configuration for heat-index alerts
 * Maps to AlertConfig properties
 */
export interface HeatAlertConfig {
  /** Alert only when the heat index is strictly above this (°C) */
  HEAT_INDEX_THRESHOLD_C: number;
  /** Never alert on readings older than this (minutes) */
  SUPPRESS_IF_OLDER_THAN_MIN: number;
}
