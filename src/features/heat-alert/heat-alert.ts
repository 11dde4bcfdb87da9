/**
 * Heat-index alert decision and message formatting
 *
 * Two suppression rules, evaluated in order:
 * 1. Age: readings older than SUPPRESS_IF_OLDER_THAN_MIN never alert.
 * 2. Threshold: the heat index must be strictly above HEAT_INDEX_THRESHOLD_C.
 */

import { fmtCelsius } from '@logging';
import { minutesBetween } from '@utils/time';

import { escapeHtml, fmtDistance, fmtOneDecimal } from './helpers';

import type { Selection } from '@core/selector';
import type { Station } from '@weather';
import type { AlertDecision, HeatAlertConfig } from './types';

export type { AlertDecision, HeatAlertConfig };

/**
 * Apply the staleness and threshold rules to a selection
 *
 * @param selection - Reading chosen by the selector
 * @param now - Current local time
 * @param config - Threshold and staleness cutoff
 * @returns Decision flags and the reading age
 *
 * @remarks
 * The age check short-circuits: a stale reading is reported as suppressed by
 * age only, whatever its heat index. Equality with the threshold does not
 * alert.
 */
export function decideAlert(selection: Selection, now: Date, config: HeatAlertConfig): AlertDecision {
  const ageMinutes = minutesBetween(now, selection.reading.timestamp);

  if (ageMinutes > config.SUPPRESS_IF_OLDER_THAN_MIN) {
    return { ageMinutes: ageMinutes, suppressedByAge: true, suppressedByThreshold: false, shouldNotify: false };
  }

  if (selection.reading.heatIndex <= config.HEAT_INDEX_THRESHOLD_C) {
    return { ageMinutes: ageMinutes, suppressedByAge: false, suppressedByThreshold: true, shouldNotify: false };
  }

  return { ageMinutes: ageMinutes, suppressedByAge: false, suppressedByThreshold: false, shouldNotify: true };
}

/**
 * Render the Telegram alert (HTML parse mode)
 *
 * @param station - Station the reading came from
 * @param selection - Selected reading
 * @param decision - Decision for the selection
 * @param config - Threshold shown in the message
 * @returns Message text, or null when the decision does not notify
 */
export function formatAlertMessage(
  station: Station,
  selection: Selection,
  decision: AlertDecision,
  config: HeatAlertConfig
): string | null {
  if (!decision.shouldNotify) {
    return null;
  }

  const reading = selection.reading;

  return [
    '🚨 <b>ALERTA DE SENSACIÓN TÉRMICA</b>',
    '',
    '🏭 <b>ESTACIÓN UTILIZADA:</b> ' + escapeHtml(station.code) + ' - ' + escapeHtml(station.label),
    '📍 <b>DISTANCIA:</b> ' + fmtDistance(station.distanceKm),
    '🌡️ <b>TEMPERATURA:</b> ' + fmtCelsius(reading.temperature),
    '🔥 <b>SENSACIÓN TÉRMICA:</b> ' + fmtOneDecimal(reading.heatIndex) + ' °C (umbral &gt; ' +
      fmtOneDecimal(config.HEAT_INDEX_THRESHOLD_C) + ' °C)',
    '🕒 <b>FECHA API CONSULTA:</b> ' + escapeHtml(reading.rawTimestamp),
    '⏱️ <b>RETRASO:</b> ' + fmtOneDecimal(decision.ageMinutes) + ' min',
    '',
    '📡 <b>FUENTE:</b> REDMET ICC',
  ].join('\n');
}
