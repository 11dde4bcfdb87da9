/**
 * Response parsing for the REDMET API
 *
 * The API is loosely typed: lists may be null, ids may be numbers or
 * strings, and the records endpoint answers with either a map keyed by
 * station id or a flat list. Shapes that do not match are treated as
 * "no data" rather than errors.
 */

import { toOptionalNumber } from '@utils/number';

import { STATION_FIELDS } from './types';

import type { RawRecord } from '@core/selector';
import type { Station } from './types';

/**
 * Check for a plain JSON object
 * @param value - Parsed JSON value
 * @returns True for non-null, non-array objects
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a text field, accepting numbers as text
 * @param value - Raw field
 * @returns Text, or "" when absent
 */
function textField(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return '';
}

/**
 * Read the station id; 0, "0" and blank values count as missing
 * @param value - Raw estacionid field
 * @returns Id text, or null
 */
function stationId(value: unknown): string | null {
  const id = textField(value).trim();
  return id === '' || id === '0' ? null : id;
}

/**
 * Parse the nearest-stations response
 *
 * Every list entry yields one Station at its API position, so callers that
 * take the first N entries count unusable ones too. Entries without an id,
 * or that are not objects, get `id: null`.
 *
 * @param body - Parsed JSON body
 * @param onInvalid - Called with a reason when the body itself is unusable
 * @returns Stations in API order (nearest first)
 */
export function parseStations(body: unknown, onInvalid: (reason: string) => void): Station[] {
  if (!isRecord(body)) {
    onInvalid('response is not an object');
    return [];
  }

  const list = body[STATION_FIELDS.LIST];
  if (!Array.isArray(list)) {
    return [];
  }

  const stations: Station[] = [];
  list.forEach(function(entry: unknown) {
    if (!isRecord(entry)) {
      stations.push({ id: null, code: '', label: '', distanceKm: null });
      return;
    }

    stations.push({
      id: stationId(entry[STATION_FIELDS.ID]),
      code: textField(entry[STATION_FIELDS.CODE]),
      label: textField(entry[STATION_FIELDS.LABEL]),
      distanceKm: toOptionalNumber(entry[STATION_FIELDS.DISTANCE]),
    });
  });

  return stations;
}

/**
 * Extract a station's records from the records response
 *
 * - `{ "<stationId>": [...] }` → that list
 * - `[...]` → the list itself
 * - anything else → []
 *
 * Elements that are not objects are dropped.
 *
 * @param body - Parsed JSON body
 * @param stationId - Station the records were requested for
 * @returns Raw records in API order
 */
export function extractRecords(body: unknown, stationId: string): RawRecord[] {
  let list: unknown = [];

  if (Array.isArray(body)) {
    list = body;
  } else if (isRecord(body)) {
    list = body[stationId];
  }

  if (!Array.isArray(list)) {
    return [];
  }

  return list.filter(isRecord);
}

/**
 * Build an HTTP basic authorization header
 * @param user - User name
 * @param password - Password
 * @returns Header value
 */
export function basicAuthHeader(user: string, password: string): string {
  return 'Basic ' + Buffer.from(user + ':' + password).toString('base64');
}
