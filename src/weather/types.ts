/**
 * REDMET weather API types
 */

import type { Coordinate, OptionalReading } from '$types/common';
import type { RawRecord } from '@core/selector';

/**
 * Weather station near the queried coordinate
 */
export interface Station {
  /** API-assigned identifier (estacionid) in string form; null when the entry has none */
  id: string | null;
  /** Human station code (codigo) */
  code: string;
  /** Site name (finca) */
  label: string;
  /** Distance from the queried coordinate in km (distancia) */
  distanceKm: OptionalReading;
}

/**
 * Finds stations near a coordinate, nearest first
 */
export interface StationLocator {
  findNearestStations(coordinate: Coordinate): Promise<Station[]>;
}

/**
 * Reads a station's records within a time range
 */
export interface RecordFetcher {
  fetchRecords(stationId: string, start: Date, end: Date): Promise<RawRecord[]>;
}

/**
 * REDMET client configuration
 */
export interface RedmetClientConfig {
  /** API root, e.g. https://redmet.icc.org.gt/ws */
  baseUrl: string;
  user: string;
  password: string;
  /** Timeout for the nearest-stations call */
  stationsTimeoutMs: number;
  /** Timeout for the records call */
  recordsTimeoutMs: number;
}

/**
 * Field names of a station entry in the nearest-stations response
 */
export const STATION_FIELDS = {
  LIST: 'estaciones',
  ID: 'estacionid',
  CODE: 'codigo',
  LABEL: 'finca',
  DISTANCE: 'distancia',
} as const;
