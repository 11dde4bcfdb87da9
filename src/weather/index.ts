export { RedmetClient } from './redmet-client';
export { parseStations, extractRecords, basicAuthHeader, isRecord } from './helpers';
export { STATION_FIELDS } from './types';
export type { Station, StationLocator, RecordFetcher, RedmetClientConfig } from './types';
