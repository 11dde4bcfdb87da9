/**
 * Heat-index selector type definitions
 */

import type { OptionalReading } from '$types/common';

/**
 * Record as returned by the weather API, before any validation
 */
export type RawRecord = Record<string, unknown>;

/**
 * Usable reading extracted from a raw record
 */
export interface Reading {
  /** Parsed local wall-clock timestamp */
  timestamp: Date;

  /** Timestamp text exactly as the API sent it */
  rawTimestamp: string;

  /** Heat index in °C */
  heatIndex: number;

  /** Air temperature in °C, informational only */
  temperature: OptionalReading;
}

/**
 * Chosen reading and the grid slot it matched
 */
export interface Selection {
  reading: Reading;
  slot: Date;
}

/**
 * API field names read by the selector
 */
export const RECORD_FIELDS = {
  TIMESTAMP: 'fecha',
  HEAT_INDEX: 'indice_calor',
  TEMPERATURE: 'temperatura',
} as const;
