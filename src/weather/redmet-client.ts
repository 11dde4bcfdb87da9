/**
 * REDMET API client
 * Read-only client for the nearest-stations and station-records endpoints
 */

import { TransportError } from '$types/errors';
import { formatApiMinute } from '@utils/time';

import { basicAuthHeader, extractRecords, parseStations } from './helpers';

import type { Coordinate } from '$types/common';
import type { RawRecord } from '@core/selector';
import type { Logger } from '@logging';
import type { RecordFetcher, RedmetClientConfig, Station, StationLocator } from './types';

/**
 * Detect the rejection fetch produces when its signal aborts
 * @param error - Caught value
 * @returns True for AbortError
 */
function isAbortError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';
}

export class RedmetClient implements StationLocator, RecordFetcher {
  private readonly baseUrl: string;
  private readonly authHeader: string;

  constructor(
    private readonly config: RedmetClientConfig,
    private readonly logger: Logger
  ) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.authHeader = basicAuthHeader(config.user, config.password);
  }

  /**
   * Send one GET request and parse the JSON body
   *
   * Non-2xx status, network failure, timeout and invalid JSON all become a
   * TransportError. No retry.
   */
  private async getJson(url: URL, timeoutMs: number): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: {
          Accept: 'application/json',
          Authorization: this.authHeader,
        },
        signal: controller.signal,
      });

      if (!response.ok) {
        await response.body?.cancel();
        throw new TransportError('HTTP ' + response.status + ': ' + response.statusText + ' (' + url.pathname + ')', response.status);
      }

      const body: unknown = await response.json();
      return body;
    } catch (error) {
      if (error instanceof TransportError) {
        throw error;
      }
      if (isAbortError(error)) {
        throw new TransportError('Request timeout after ' + timeoutMs + 'ms (' + url.pathname + ')');
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportError('Request failed (' + url.pathname + '): ' + reason);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Stations near a coordinate, in API order (nearest first), including entries without an id
   */
  async findNearestStations(coordinate: Coordinate): Promise<Station[]> {
    const url = new URL(this.baseUrl + '/getLecturas/' + coordinate.latitude + '/' + coordinate.longitude);
    const body = await this.getJson(url, this.config.stationsTimeoutMs);

    const logger = this.logger;
    return parseStations(body, function(reason) {
      logger.debug('Ignoring stations response: ' + reason);
    });
  }

  /**
   * Raw records of one station between start and end (local wall clock, minute precision)
   */
  async fetchRecords(stationId: string, start: Date, end: Date): Promise<RawRecord[]> {
    const url = new URL(this.baseUrl + '/redmet/estaciones/lecturas');
    url.searchParams.set('fechaini', formatApiMinute(start));
    url.searchParams.set('fechafin', formatApiMinute(end));
    url.searchParams.set('tipo', 'fecha');
    url.searchParams.set('estacionids[]', stationId);

    const body = await this.getJson(url, this.config.recordsTimeoutMs);
    return extractRecords(body, stationId);
  }
}
