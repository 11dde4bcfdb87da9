/**
 * Heat-index selector
 *
 * Reconciles irregular station timestamps with the freshness grid: every
 * usable reading is snapped down to its slot, then the grid is walked newest
 * first and the first slot that has a reading wins.
 */

import { floorToSlot } from '@utils/time';

import { parseRecord } from './helpers';

import type { RawRecord, Reading, Selection } from './types';

export type { RawRecord, Reading, Selection };

/**
 * Pick the most recent usable reading that lands on an allowed slot
 *
 * @param records - Raw API records, in ascending time order
 * @param slots - Freshness grid, newest first
 * @param slotMinutes - Slot size used to build the grid
 * @returns Selected reading and matched slot, or null when no reading aligns
 *
 * @remarks
 * **Input order**: when several readings fall into the same slot, the one
 * processed last is kept. Records must therefore be supplied in ascending
 * time order for "latest reading per slot" semantics; the weather API
 * returns them that way.
 *
 * **Discarded records**: unparseable timestamps and missing or non-numeric
 * heat indexes are skipped silently.
 */
export function selectReading(
  records: readonly RawRecord[],
  slots: readonly Date[],
  slotMinutes: number
): Selection | null {
  const bySlot = new Map<number, Reading>();

  for (const record of records) {
    const reading = parseRecord(record);
    if (reading === null) {
      continue;
    }
    bySlot.set(floorToSlot(reading.timestamp, slotMinutes).getTime(), reading);
  }

  for (const slot of slots) {
    const reading = bySlot.get(slot.getTime());
    if (reading !== undefined) {
      return { reading: reading, slot: slot };
    }
  }

  return null;
}
