/**
 * Helper functions for alert message rendering
 */

import type { OptionalReading } from '$types/common';
import { formatOneDecimal } from '@utils/number';

/**
 * Escape text for Telegram HTML parse mode
 * @param text - Raw text
 * @returns Text with &, < and > escaped
 */
export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * Format a station distance
 * @param distanceKm - Distance, null when unknown
 * @returns "2.4 km" or "NA"
 */
export function fmtDistance(distanceKm: OptionalReading): string {
  if (distanceKm === null) return 'NA';
  return String(distanceKm) + ' km';
}

/**
 * Round to one decimal for display
 * @param value - Value to round
 * @returns Value with one decimal, e.g. "5.0"
 */
export function fmtOneDecimal(value: number): string {
  return formatOneDecimal(value);
}
