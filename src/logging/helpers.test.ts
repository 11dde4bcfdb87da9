/**
 * Unit tests for logging helper functions
 */

import { fmtCelsius, formatLogMessage, parseLogLevel, shouldLog } from './helpers';

import type { LogLevels } from './types';

const LOG_LEVELS: LogLevels = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  CRITICAL: 3
};

describe('formatLogMessage', () => {
  test('should format DEBUG level with correct tag', () => {
    expect(formatLogMessage(LOG_LEVELS.DEBUG, 'test message', LOG_LEVELS)).toBe('[DEBUG]    test message');
  });

  test('should format INFO level with emoji and correct tag', () => {
    expect(formatLogMessage(LOG_LEVELS.INFO, 'test message', LOG_LEVELS)).toBe('ℹ️ [INFO]     test message');
  });

  test('should format WARNING level with emoji and correct tag', () => {
    expect(formatLogMessage(LOG_LEVELS.WARNING, 'test message', LOG_LEVELS)).toBe('⚠️ [WARNING]  test message');
  });

  test('should format CRITICAL level with emoji and correct tag', () => {
    expect(formatLogMessage(LOG_LEVELS.CRITICAL, 'test message', LOG_LEVELS)).toBe('🚨 [CRITICAL] test message');
  });

  test('should handle empty message', () => {
    expect(formatLogMessage(LOG_LEVELS.INFO, '', LOG_LEVELS)).toBe('ℹ️ [INFO]     ');
  });
});

describe('shouldLog', () => {
  test('should allow messages at or above the current level', () => {
    expect(shouldLog(LOG_LEVELS.INFO, LOG_LEVELS.INFO)).toBe(true);
    expect(shouldLog(LOG_LEVELS.CRITICAL, LOG_LEVELS.INFO)).toBe(true);
  });

  test('should block messages below the current level', () => {
    expect(shouldLog(LOG_LEVELS.DEBUG, LOG_LEVELS.INFO)).toBe(false);
  });
});

describe('parseLogLevel', () => {
  test('should parse every level name case-insensitively', () => {
    expect(parseLogLevel('debug', LOG_LEVELS)).toBe(0);
    expect(parseLogLevel('INFO', LOG_LEVELS)).toBe(1);
    expect(parseLogLevel(' Warning ', LOG_LEVELS)).toBe(2);
    expect(parseLogLevel('critical', LOG_LEVELS)).toBe(3);
  });

  test('should accept warn and error aliases', () => {
    expect(parseLogLevel('warn', LOG_LEVELS)).toBe(2);
    expect(parseLogLevel('error', LOG_LEVELS)).toBe(3);
  });

  test('should return null for unknown names', () => {
    expect(parseLogLevel('verbose', LOG_LEVELS)).toBeNull();
    expect(parseLogLevel('', LOG_LEVELS)).toBeNull();
  });
});

describe('fmtCelsius', () => {
  test('should format with one decimal', () => {
    expect(fmtCelsius(31.26)).toBe('31.3 °C');
    expect(fmtCelsius(31.25)).toBe('31.2 °C');
    expect(fmtCelsius(30)).toBe('30.0 °C');
  });

  test('should return NA for unknown readings', () => {
    expect(fmtCelsius(null)).toBe('NA');
  });
});
