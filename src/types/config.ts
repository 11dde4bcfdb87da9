/**
 * Type definitions for the heat-index alert configuration
 */

import type { LogLevel, LogLevels } from '@logging';

/**
 * User-configurable settings
 * Read from the environment once at startup and passed by reference to every component
 */
export interface AlertUserConfig {
  // ───────── TELEGRAM ─────────
  readonly TELEGRAM_TOKEN: string;
  readonly TELEGRAM_CHAT_IDS: readonly string[];

  // ───────── WEATHER API ─────────
  readonly REDMET_USER: string;
  readonly REDMET_PASS: string;
  readonly REDMET_BASE: string;

  // ───────── LOCATION ─────────
  readonly LATITUDE: number;
  readonly LONGITUDE: number;

  // ───────── ALERT RULES ─────────
  readonly HEAT_INDEX_THRESHOLD_C: number;
  readonly SLOT_MINUTES: number;
  readonly MAX_AGE_MIN: number;
  readonly LOOKBACK_HOURS: number;
  readonly SUPPRESS_IF_OLDER_THAN_MIN: number;

  // ───────── RUNTIME ─────────
  readonly LOG_LEVEL: LogLevel;
  readonly DRY_RUN: boolean;
}

/**
 * Application constants
 * Internal constants that should rarely change
 */
export interface AlertAppConstants {
  // ───────── LOGGING CONSTANTS ─────────
  readonly LOG_LEVELS: LogLevels;

  // ───────── RUN CONSTANTS ─────────
  readonly MAX_STATIONS_TRIED: number;

  // ───────── HTTP CONSTANTS ─────────
  readonly STATIONS_TIMEOUT_MS: number;
  readonly RECORDS_TIMEOUT_MS: number;
  readonly TELEGRAM_TIMEOUT_MS: number;
  readonly TELEGRAM_API_BASE: string;
}

/**
 * Complete alert configuration
 * Combines user config and app constants
 */
export type AlertConfig = AlertUserConfig & AlertAppConstants;
