/**
 * Local wall-clock helpers
 *
 * The weather API speaks naive local timestamps ("YYYY-MM-DD HH:MM:SS", no
 * offset), so every helper here reads and writes the local calendar fields.
 * Minute arithmetic runs on those fields rather than on elapsed time, which
 * keeps slot keys and ages in step across daylight-saving changes.
 */

import { TIME_CONSTANTS } from '../constants';

const API_TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

/**
 * Left-pad a calendar field with zeros
 * @param value - Field value
 * @param width - Output width
 * @returns Padded field
 */
function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Wall-clock fields of a local date as a UTC epoch value
 *
 * Differences of these values count clock-face minutes, so an hour that
 * repeats or disappears at a daylight-saving change does not skew them.
 */
function wallClockMs(date: Date): number {
  const wall = new Date(0);
  wall.setUTCFullYear(date.getFullYear(), date.getMonth(), date.getDate());
  wall.setUTCHours(date.getHours(), date.getMinutes(), date.getSeconds(), date.getMilliseconds());
  return wall.getTime();
}

/**
 * Local date showing the wall-clock fields encoded by wallClockMs
 */
function fromWallClockMs(ms: number): Date {
  const wall = new Date(ms);
  const date = new Date(0);
  date.setFullYear(wall.getUTCFullYear(), wall.getUTCMonth(), wall.getUTCDate());
  date.setHours(wall.getUTCHours(), wall.getUTCMinutes(), wall.getUTCSeconds(), wall.getUTCMilliseconds());
  return date;
}

/**
 * Truncate a timestamp to the start of its slot
 * @param date - Timestamp to truncate
 * @param slotMinutes - Slot size in minutes
 * @returns New date with minute floored to a multiple of slotMinutes and seconds zeroed
 */
export function floorToSlot(date: Date, slotMinutes: number): Date {
  const wall = new Date(wallClockMs(date));
  wall.setUTCMinutes(Math.floor(wall.getUTCMinutes() / slotMinutes) * slotMinutes, 0, 0);
  return fromWallClockMs(wall.getTime());
}

/**
 * Shift a timestamp by a number of wall-clock minutes
 * @param date - Base timestamp
 * @param minutes - Minutes to add (negative to go back)
 * @returns Shifted date
 */
export function addMinutes(date: Date, minutes: number): Date {
  return fromWallClockMs(wallClockMs(date) + minutes * TIME_CONSTANTS.MS_PER_MINUTE);
}

/**
 * Wall-clock minutes between two timestamps (fractional)
 * @param later - End timestamp
 * @param earlier - Start timestamp
 * @returns later - earlier in clock-face minutes
 */
export function minutesBetween(later: Date, earlier: Date): number {
  return (wallClockMs(later) - wallClockMs(earlier)) / TIME_CONSTANTS.MS_PER_MINUTE;
}

/**
 * Format as "YYYY-MM-DD HH:MM" (query window format)
 * @param date - Timestamp to format
 * @returns Local wall-clock text
 */
export function formatApiMinute(date: Date): string {
  return pad(date.getFullYear(), 4) + '-' + pad(date.getMonth() + 1) + '-' + pad(date.getDate()) +
    ' ' + pad(date.getHours()) + ':' + pad(date.getMinutes());
}

/**
 * Parse an API record timestamp
 *
 * Accepts exactly "YYYY-MM-DD HH:MM:SS". Calendar-invalid values such as
 * "2024-02-30 10:00:00" or "2024-01-01 24:00:00" are rejected, as are local
 * times that do not exist on this machine's clock.
 *
 * @param text - Raw timestamp text
 * @returns Local date, or null when the text does not match
 */
export function parseApiTimestamp(text: string): Date | null {
  const match = API_TIMESTAMP.exec(text);
  if (!match) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const hour = Number(match[4]);
  const minute = Number(match[5]);
  const second = Number(match[6]);

  // setFullYear keeps two-digit years literal
  const date = new Date(0);
  date.setFullYear(year, month - 1, day);
  date.setHours(hour, minute, second, 0);

  if (
    date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day ||
    date.getHours() !== hour || date.getMinutes() !== minute || date.getSeconds() !== second
  ) {
    return null;
  }

  return date;
}
