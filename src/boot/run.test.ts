/**
 * Tests for the scheduled run entry
 */

import { describeError, runJob } from './run';

import type { Mock } from 'vitest';
import type { EnvSource } from './types';

const ENV: EnvSource = {
  TELEGRAM_TOKEN: 'test-secret',
  TELEGRAM_CHAT_IDS: '1001,1002',
  REDMET_USER: 'user',
  REDMET_PASS: 'test-secret',
  LAT: '14.30',
  LON: '-91.05',
};

const NOW = new Date(2024, 5, 1, 10, 52, 0);

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), { headers: { 'Content-Type': 'application/json' } });
}

/**
 * Fake of both HTTP services: REDMET answers by path, Telegram always accepts
 */
function createFakeServices(heatIndex: number): Mock {
  return vi.fn((input: unknown) => {
    if (input instanceof URL && input.pathname.includes('/getLecturas/')) {
      return Promise.resolve(jsonResponse({
        estaciones: [{ estacionid: 7, codigo: 'ST-7', finca: 'Finca Sur', distancia: 4.2 }],
      }));
    }
    if (input instanceof URL) {
      return Promise.resolve(jsonResponse({
        7: [{ fecha: '2024-06-01 10:47:00', indice_calor: heatIndex, temperatura: 30.1 }],
      }));
    }
    return Promise.resolve(jsonResponse({ ok: true }));
  });
}

describe('runJob', () => {
  let consoleApi: { log: Mock; error: Mock };
  let fetchMock: Mock;

  beforeEach(() => {
    consoleApi = { log: vi.fn(), error: vi.fn() };
    fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
  });

  function run(env: EnvSource): Promise<number> {
    return runJob(env, {}, { consoleApi: consoleApi, colors: false }, () => NOW);
  }

  function telegramCalls(): unknown[][] {
    return fetchMock.mock.calls.filter(call => typeof call[0] === 'string');
  }

  // ═══════════════════════════════════════════════════════════════
  // EXIT CODES
  // ═══════════════════════════════════════════════════════════════

  describe('exit codes', () => {
    it('should exit 2 on missing configuration without any request', async () => {
      const code = await run({});

      expect(code).toBe(2);
      expect(fetchMock).not.toHaveBeenCalled();
      expect(consoleApi.error).toHaveBeenNthCalledWith(1, 'INIT FAIL: Invalid configuration');
      expect(consoleApi.error).toHaveBeenNthCalledWith(2, '  - TELEGRAM_CHAT_IDS is required');
    });

    it('should exit 2 on validation errors', async () => {
      const code = await run({ ...ENV, LON: '200' });

      expect(code).toBe(2);
      expect(consoleApi.error).toHaveBeenCalledWith('  - LONGITUDE must be between -180 and 180 (got 200)');
    });

    it('should exit 1 when the weather API fails', async () => {
      fetchMock.mockResolvedValue(new Response('', { status: 500, statusText: 'Internal Server Error' }));

      const code = await run(ENV);

      expect(code).toBe(1);
      expect(consoleApi.error).toHaveBeenCalledWith(
        '🚨 [CRITICAL] TransportError: HTTP 500: Internal Server Error (/ws/getLecturas/14.3/-91.05)'
      );
    });

    it('should exit 1 when a delivery fails', async () => {
      const services = createFakeServices(35);
      fetchMock.mockImplementation((input: unknown) => {
        if (typeof input === 'string') {
          return Promise.resolve(new Response('', { status: 403, statusText: 'Forbidden' }));
        }
        return services(input);
      });

      const code = await run(ENV);

      expect(code).toBe(1);
      expect(consoleApi.error).toHaveBeenCalledWith(
        '🚨 [CRITICAL] NotificationError: Delivery to 1001 failed: HTTP 403: Forbidden'
      );
      expect(telegramCalls()).toHaveLength(1);
    });

    it('should exit 0 when there is nothing to report', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ estaciones: [] }));

      expect(await run(ENV)).toBe(0);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // FULL RUN
  // ═══════════════════════════════════════════════════════════════

  describe('full run', () => {
    it('should notify every chat when the heat index is above the threshold', async () => {
      fetchMock.mockImplementation(createFakeServices(35));

      const code = await run(ENV);

      expect(code).toBe(0);
      expect(telegramCalls().map(call => call[0])).toEqual([
        'https://api.telegram.org/bottest-secret/sendMessage',
        'https://api.telegram.org/bottest-secret/sendMessage',
      ]);
    });

    it('should not notify at or below the threshold', async () => {
      fetchMock.mockImplementation(createFakeServices(10));

      expect(await run(ENV)).toBe(0);
      expect(telegramCalls()).toHaveLength(0);
    });

    it('should not notify in dry-run mode', async () => {
      fetchMock.mockImplementation(createFakeServices(35));

      const code = await runJob(ENV, { dryRun: true }, { consoleApi: consoleApi, colors: false }, () => NOW);

      expect(code).toBe(0);
      expect(telegramCalls()).toHaveLength(0);
    });

    it('should never print the bot token', async () => {
      fetchMock.mockImplementation(createFakeServices(35));

      await runJob(ENV, { logLevel: 'debug' }, { consoleApi: consoleApi, colors: false }, () => NOW);

      const printed = [...consoleApi.log.mock.calls, ...consoleApi.error.mock.calls].map(call => String(call[0]));
      expect(printed.some(line => line.includes('test-secret'))).toBe(false);
    });
  });
});

describe('describeError', () => {
  it('should prefix errors with their name', () => {
    expect(describeError(new TypeError('boom'))).toBe('TypeError: boom');
  });

  it('should stringify other values', () => {
    expect(describeError('plain')).toBe('plain');
  });
});
