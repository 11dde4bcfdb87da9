/**
 * Run orchestrator
 *
 * One pass: locate stations, pick the freshest aligned reading from the
 * first station that has one, decide, then notify. Everything is awaited
 * in sequence; transport and notification errors reach the caller.
 */

import { buildSlots } from '@core/slot-grid';
import { decideAlert, fmtOneDecimal, formatAlertMessage } from '@features/heat-alert';
import { TIME_CONSTANTS } from '@utils/constants';
import { addMinutes } from '@utils/time';

import { describeSelection, findSelection } from './helpers';

import type { RunContext, RunOutcome } from './types';

export async function runOnce(context: RunContext, now: Date): Promise<RunOutcome> {
  const config = context.config;
  const logger = context.logger;

  const stations = await context.locator.findNearestStations({
    latitude: config.LATITUDE,
    longitude: config.LONGITUDE
  });

  if (stations.length === 0) {
    logger.warning('No stations near ' + config.LATITUDE + ', ' + config.LONGITUDE);
    return 'no-stations';
  }

  const candidates = stations.slice(0, config.MAX_STATIONS_TRIED);
  const grid = buildSlots(now, config.SLOT_MINUTES, config.MAX_AGE_MIN);
  const start = addMinutes(now, -config.LOOKBACK_HOURS * TIME_CONSTANTS.MINUTES_PER_HOUR);

  const found = await findSelection(context, candidates, grid.slots, start, now);
  if (found === null) {
    logger.info('No fresh reading on ' + candidates.length + ' station(s), nothing to do');
    return 'no-selection';
  }

  const decision = decideAlert(found.selection, now, config);
  logger.info(describeSelection(found.station, found.selection, decision.ageMinutes));

  const message = formatAlertMessage(found.station, found.selection, decision, config);
  if (message === null) {
    if (decision.suppressedByAge) {
      logger.info('Reading is ' + fmtOneDecimal(decision.ageMinutes) + ' min old (limit ' + config.SUPPRESS_IF_OLDER_THAN_MIN + '), no alert');
      return 'suppressed-age';
    }
    logger.info('Heat index ' + fmtOneDecimal(found.selection.reading.heatIndex) + ' °C not above ' + fmtOneDecimal(config.HEAT_INDEX_THRESHOLD_C) + ' °C, no alert');
    return 'suppressed-threshold';
  }

  if (config.DRY_RUN) {
    logger.info('Dry run, alert not sent:\n' + message);
    return 'dry-run';
  }

  await context.notifier.notify(message, config.TELEGRAM_CHAT_IDS);
  logger.info('🚨 Alert sent to ' + config.TELEGRAM_CHAT_IDS.length + ' chat(s)');
  return 'notified';
}
