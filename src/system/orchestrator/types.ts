/**
 * Run orchestrator type definitions
 */

import type { AlertConfig } from '$types';
import type { Selection } from '@core/selector';
import type { Logger } from '@logging';
import type { Notifier } from '@notify';
import type { RecordFetcher, Station, StationLocator } from '@weather';

/**
 * Everything one run needs, built once by boot/init
 */
export interface RunContext {
  config: AlertConfig;
  logger: Logger;
  locator: StationLocator;
  fetcher: RecordFetcher;
  notifier: Notifier;
}

/**
 * How a run ended. All of these are normal completions.
 */
export type RunOutcome =
  | 'no-stations'
  | 'no-selection'
  | 'suppressed-age'
  | 'suppressed-threshold'
  | 'dry-run'
  | 'notified';

/**
 * First station that produced an aligned reading
 */
export interface StationSelection {
  station: Station;
  selection: Selection;
}
