/**
 * Run orchestrator helpers
 */

import { selectReading } from '@core/selector';
import { fmtDistance, fmtOneDecimal } from '@features/heat-alert';
import { fmtCelsius } from '@logging';
import { formatApiMinute } from '@utils/time';

import type { Selection } from '@core/selector';
import type { Station } from '@weather';
import type { RunContext, StationSelection } from './types';

/**
 * Try stations in locator order until one yields an aligned reading
 *
 * One records request per station, sequentially. Entries without an id are
 * skipped but still count as tried. Transport errors propagate.
 *
 * @param context - Run context
 * @param stations - Candidate stations, nearest first
 * @param slots - Freshness grid, newest first
 * @param start - Query window start
 * @param end - Query window end
 * @returns First station with a selection, or null
 */
export async function findSelection(
  context: RunContext,
  stations: readonly Station[],
  slots: readonly Date[],
  start: Date,
  end: Date
): Promise<StationSelection | null> {
  const logger = context.logger;

  for (const [index, station] of stations.entries()) {
    if (station.id === null) {
      logger.debug('Station #' + (index + 1) + ' (' + (station.code || 'no code') + ') has no estacionid, skipped');
      continue;
    }

    const records = await context.fetcher.fetchRecords(station.id, start, end);

    if (records.length === 0) {
      logger.debug('Station ' + station.code + ': no records between ' + formatApiMinute(start) + ' and ' + formatApiMinute(end));
      continue;
    }

    const selection = selectReading(records, slots, context.config.SLOT_MINUTES);
    if (selection === null) {
      logger.debug('Station ' + station.code + ': ' + records.length + ' records, none on the freshness grid');
      continue;
    }

    return { station: station, selection: selection };
  }

  return null;
}

/**
 * One-line summary of the chosen reading
 * @param station - Station the reading came from
 * @param selection - Chosen reading and slot
 * @param ageMinutes - Reading age at run time
 * @returns Log line
 */
export function describeSelection(station: Station, selection: Selection, ageMinutes: number): string {
  const reading = selection.reading;
  return 'Station ' + station.code + ' (' + fmtDistance(station.distanceKm) + ')' +
    ' | HI ' + fmtCelsius(reading.heatIndex) +
    ' | T ' + fmtCelsius(reading.temperature) +
    ' | API ' + reading.rawTimestamp +
    ' | slot ' + formatApiMinute(selection.slot) +
    ' | age ' + fmtOneDecimal(ageMinutes) + ' min';
}
