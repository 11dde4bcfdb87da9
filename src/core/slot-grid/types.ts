/**
 * Slot grid type definitions
 */

/**
 * Freshness grid for one run
 */
export interface SlotGrid {
  /** Acceptable slots, newest first, strictly decreasing */
  slots: Date[];

  /** Slot containing "now" (first element of slots) */
  current: Date;
}
