/**
 * Run initialization
 */

import { ConfigurationError } from '$types/errors';
import { fmtOneDecimal } from '@features/heat-alert';
import { createConsoleSink, createLogger } from '@logging';
import { createTelegramNotifier } from '@notify';
import { validateConfig } from '@validation';
import { RedmetClient } from '@weather';

import type { AlertConfig } from '$types';
import type { InitOptions, RunContext } from './types';

/**
 * Validate the configuration and wire logger, weather client and notifier
 *
 * @param config - Loaded configuration
 * @param options - Console output and colour choice
 * @returns Context for one run
 * @throws ConfigurationError when validation finds errors
 */
export function initialize(config: AlertConfig, options: InitOptions = {}): RunContext {
  const validation = validateConfig(config);

  if (!validation.valid) {
    throw new ConfigurationError(validation.errors.map(function(err) { return err.message; }));
  }

  // Setup logging
  const consoleSink = createConsoleSink(options.consoleApi ?? console, {
    colors: options.colors ?? process.stdout.isTTY === true
  });

  const logger = createLogger({
    level: config.LOG_LEVEL
  }, {
    sinks: [{ sink: consoleSink, minLevel: config.LOG_LEVELS.DEBUG }]
  }, config.LOG_LEVELS);

  logger.info('🚀 Heat-index alert | 📍 ' + config.LATITUDE + ', ' + config.LONGITUDE +
    ' | 🔥 > ' + fmtOneDecimal(config.HEAT_INDEX_THRESHOLD_C) + ' °C | 🕒 ' + config.SLOT_MINUTES + '/' +
    config.MAX_AGE_MIN + ' min | 💬 ' + config.TELEGRAM_CHAT_IDS.length + ' chat(s)' + (config.DRY_RUN ? ' | DRY RUN' : ''));

  validation.warnings.forEach(function(warn) {
    logger.warning('[' + warn.field + ']: ' + warn.message);
  });

  const client = new RedmetClient({
    baseUrl: config.REDMET_BASE,
    user: config.REDMET_USER,
    password: config.REDMET_PASS,
    stationsTimeoutMs: config.STATIONS_TIMEOUT_MS,
    recordsTimeoutMs: config.RECORDS_TIMEOUT_MS
  }, logger);

  const notifier = createTelegramNotifier({
    token: config.TELEGRAM_TOKEN,
    apiBase: config.TELEGRAM_API_BASE,
    timeoutMs: config.TELEGRAM_TIMEOUT_MS
  }, logger);

  return {
    config: config,
    logger: logger,
    locator: client,
    fetcher: client,
    notifier: notifier
  };
}
