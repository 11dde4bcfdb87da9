/**
 * Helper functions for reading selection
 */

import { toOptionalNumber } from '@utils/number';
import { parseApiTimestamp } from '@utils/time';

import { RECORD_FIELDS } from './types';

import type { RawRecord, Reading } from './types';

/**
 * Extract a usable reading from a raw API record
 *
 * Discards (returns null) when the timestamp is missing, not a string or not
 * in "YYYY-MM-DD HH:MM:SS" form, or when the heat index is missing or not
 * numeric. An unusable temperature does not discard the record.
 *
 * @param record - Raw API record
 * @returns Reading, or null when the record is unusable
 */
export function parseRecord(record: RawRecord): Reading | null {
  const rawTimestamp = record[RECORD_FIELDS.TIMESTAMP];
  if (typeof rawTimestamp !== 'string') {
    return null;
  }

  const timestamp = parseApiTimestamp(rawTimestamp);
  if (timestamp === null) {
    return null;
  }

  const heatIndex = toOptionalNumber(record[RECORD_FIELDS.HEAT_INDEX]);
  if (heatIndex === null) {
    return null;
  }

  return {
    timestamp: timestamp,
    rawTimestamp: rawTimestamp,
    heatIndex: heatIndex,
    temperature: toOptionalNumber(record[RECORD_FIELDS.TEMPERATURE]),
  };
}
