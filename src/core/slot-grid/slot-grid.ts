/**
 * Time-slot grid builder
 *
 * Produces the ordered set of freshness slots a reading may align to:
 * the slot containing "now", then one slot further back per step until
 * the maximum age is reached.
 */

import { addMinutes, floorToSlot } from '@utils/time';

import type { SlotGrid } from './types';

export type { SlotGrid };

/**
 * Build the freshness grid
 *
 * @param now - Current local time
 * @param slotMinutes - Slot size in minutes (> 0, normally a divisor of 60)
 * @param maxAgeMinutes - How far back the grid reaches (>= 0)
 * @returns Grid of floor(maxAgeMinutes / slotMinutes) + 1 slots, newest first
 *
 * @remarks
 * A slot size that does not divide 60 still works but produces uneven
 * boundaries across the hour (see validateConfig warnings).
 *
 * @example
 * ```typescript
 * // now = 10:52:31, slot = 15, max age = 45
 * buildSlots(now, 15, 45).slots; // 10:45, 10:30, 10:15, 10:00
 * ```
 */
export function buildSlots(now: Date, slotMinutes: number, maxAgeMinutes: number): SlotGrid {
  const current = floorToSlot(now, slotMinutes);
  const slots: Date[] = [];

  for (let offset = 0; offset <= maxAgeMinutes; offset += slotMinutes) {
    slots.push(addMinutes(current, -offset));
  }

  return { slots: slots, current: current };
}
