/**
 * Configuration defaults, application constants and environment loading
 */

import { ConfigurationError } from '$types/errors';
import { parseLogLevel } from '@logging';

import { parseBoolean, parseChatIds, readNumber, readText, requireText } from './helpers';

import type { AlertAppConstants, AlertConfig, AlertUserConfig } from '$types';
import type { ConfigOverrides, EnvSource } from './types';

// ─────────────────────────────────────────────────────────────
// APPLICATION CONSTANTS
//   Not read from the environment.
// ─────────────────────────────────────────────────────────────

export const APP_CONSTANTS: Readonly<AlertAppConstants> = {
  LOG_LEVELS: {
    DEBUG: 0,
    INFO: 1,
    WARNING: 2,
    CRITICAL: 3
  },

  // MAX_STATIONS_TRIED
  //   Role: How many of the nearest stations are queried for records.
  MAX_STATIONS_TRIED: 3,

  // *_TIMEOUT_MS
  //   Role: Per-request timeouts. A timeout ends the run with exit code 1.
  STATIONS_TIMEOUT_MS: 30000,
  RECORDS_TIMEOUT_MS: 60000,
  TELEGRAM_TIMEOUT_MS: 20000,

  TELEGRAM_API_BASE: 'https://api.telegram.org',
};

// ─────────────────────────────────────────────────────────────
// USER DEFAULTS
//   Values used when the optional environment variables are unset.
// ─────────────────────────────────────────────────────────────

type OptionalUserKeys =
  | 'REDMET_BASE'
  | 'HEAT_INDEX_THRESHOLD_C'
  | 'SLOT_MINUTES'
  | 'MAX_AGE_MIN'
  | 'LOOKBACK_HOURS'
  | 'SUPPRESS_IF_OLDER_THAN_MIN'
  | 'LOG_LEVEL'
  | 'DRY_RUN';

export const USER_DEFAULTS: Readonly<Pick<AlertUserConfig, OptionalUserKeys>> = {
  // REDMET_BASE
  //   Role: Root of the REDMET web service.
  //   Critical: Absolute http(s) URL.
  REDMET_BASE: 'https://redmet.icc.org.gt/ws',

  // HEAT_INDEX_THRESHOLD_C (env: HEAT_INDEX_THRESHOLD)
  //   Role: Alert when the heat index is strictly above this value.
  HEAT_INDEX_THRESHOLD_C: 10.0,

  // SLOT_MINUTES
  //   Role: Granularity of the freshness grid.
  //   Critical: Positive integer.
  //   Recommended: A divisor of 60 (5, 10, 15, 30).
  SLOT_MINUTES: 15,

  // MAX_AGE_MIN
  //   Role: How far back the freshness grid reaches from the current slot.
  //   Critical: Integer >= 0.
  MAX_AGE_MIN: 45,

  // LOOKBACK_HOURS
  //   Role: Width of the records query window.
  //   Critical: Integer >= 1.
  LOOKBACK_HOURS: 6,

  // SUPPRESS_IF_OLDER_THAN_MIN
  //   Role: Never alert on a reading older than this.
  //   Critical: Integer >= 0.
  //   Recommended: At least MAX_AGE_MIN.
  SUPPRESS_IF_OLDER_THAN_MIN: 90,

  LOG_LEVEL: APP_CONSTANTS.LOG_LEVELS.INFO,

  // DRY_RUN
  //   Role: Log the formatted alert instead of sending it.
  DRY_RUN: false,
};

// ─────────────────────────────────────────────────────────────
// LOADING
// ─────────────────────────────────────────────────────────────

/**
 * Build the configuration from environment variables
 *
 * Every problem is collected before failing, so one run reports all of them.
 * Command-line overrides take precedence over the environment.
 *
 * @param env - Environment variables (usually process.env after dotenv)
 * @param overrides - Values from command-line flags
 * @returns Complete configuration
 * @throws ConfigurationError when a required value is missing or a value cannot be parsed
 */
export function loadConfig(env: EnvSource, overrides: ConfigOverrides = {}): AlertConfig {
  const problems: string[] = [];

  const chatIdsText = requireText(env, 'TELEGRAM_CHAT_IDS', problems);
  const chatIds = parseChatIds(chatIdsText);
  if (chatIdsText !== '' && chatIds.length === 0) {
    problems.push('TELEGRAM_CHAT_IDS must list at least one chat id');
  }

  const logLevelText = overrides.logLevel ?? readText(env, 'LOG_LEVEL');
  let logLevel = USER_DEFAULTS.LOG_LEVEL;
  if (logLevelText !== null) {
    const parsed = parseLogLevel(logLevelText, APP_CONSTANTS.LOG_LEVELS);
    if (parsed === null) {
      problems.push('LOG_LEVEL must be one of debug, info, warning, critical (got "' + logLevelText + '")');
    } else {
      logLevel = parsed;
    }
  }

  const dryRunText = readText(env, 'DRY_RUN');
  let dryRun = USER_DEFAULTS.DRY_RUN;
  if (dryRunText !== null) {
    const parsed = parseBoolean(dryRunText);
    if (parsed === null) {
      problems.push('DRY_RUN must be true or false (got "' + dryRunText + '")');
    } else {
      dryRun = parsed;
    }
  }

  const user: AlertUserConfig = {
    TELEGRAM_TOKEN: requireText(env, 'TELEGRAM_TOKEN', problems),
    TELEGRAM_CHAT_IDS: chatIds,
    REDMET_USER: requireText(env, 'REDMET_USER', problems),
    REDMET_PASS: requireText(env, 'REDMET_PASS', problems),
    REDMET_BASE: readText(env, 'REDMET_BASE') ?? USER_DEFAULTS.REDMET_BASE,
    LATITUDE: readNumber(env, 'LAT', null, problems),
    LONGITUDE: readNumber(env, 'LON', null, problems),
    HEAT_INDEX_THRESHOLD_C: readNumber(env, 'HEAT_INDEX_THRESHOLD', USER_DEFAULTS.HEAT_INDEX_THRESHOLD_C, problems),
    SLOT_MINUTES: readNumber(env, 'SLOT_MINUTES', USER_DEFAULTS.SLOT_MINUTES, problems),
    MAX_AGE_MIN: readNumber(env, 'MAX_AGE_MIN', USER_DEFAULTS.MAX_AGE_MIN, problems),
    LOOKBACK_HOURS: readNumber(env, 'LOOKBACK_HOURS', USER_DEFAULTS.LOOKBACK_HOURS, problems),
    SUPPRESS_IF_OLDER_THAN_MIN: readNumber(env, 'SUPPRESS_IF_OLDER_THAN_MIN', USER_DEFAULTS.SUPPRESS_IF_OLDER_THAN_MIN, problems),
    LOG_LEVEL: logLevel,
    DRY_RUN: overrides.dryRun === true ? true : dryRun,
  };

  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }

  return { ...APP_CONSTANTS, ...user };
}
