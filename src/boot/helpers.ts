/**
 * Environment parsing helpers
 */

import { toOptionalNumber } from '@utils/number';

import type { EnvSource } from './types';

/**
 * Read a trimmed variable
 * @param env - Environment variables
 * @param key - Variable name
 * @returns Trimmed value, or null when unset or blank
 */
export function readText(env: EnvSource, key: string): string | null {
  const value = env[key];
  if (value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

/**
 * Read a required variable, recording a problem when it is missing
 * @returns Trimmed value, or '' when missing
 */
export function requireText(env: EnvSource, key: string, problems: string[]): string {
  const value = readText(env, key);
  if (value === null) {
    problems.push(key + ' is required');
    return '';
  }
  return value;
}

/**
 * Read a decimal variable
 *
 * A null fallback makes the variable required. Unparseable text is a
 * problem even when a fallback exists.
 *
 * @param env - Environment variables
 * @param key - Variable name
 * @param fallback - Default value, or null when required
 * @param problems - Collected configuration problems
 * @returns Parsed value, the fallback, or 0 after recording a problem
 */
export function readNumber(env: EnvSource, key: string, fallback: number | null, problems: string[]): number {
  const text = readText(env, key);

  if (text === null) {
    if (fallback === null) {
      problems.push(key + ' is required');
      return 0;
    }
    return fallback;
  }

  const parsed = toOptionalNumber(text);
  if (parsed === null) {
    problems.push(key + ' must be a number (got "' + text + '")');
    return fallback ?? 0;
  }
  return parsed;
}

/**
 * Split a comma-separated chat id list; entries are trimmed and blanks dropped
 */
export function parseChatIds(text: string): string[] {
  return text
    .split(',')
    .map(function(part) { return part.trim(); })
    .filter(function(part) { return part !== ''; });
}

/**
 * Parse a boolean flag (true/false, 1/0, yes/no, on/off)
 * @returns Parsed flag, or null when not recognised
 */
export function parseBoolean(text: string): boolean | null {
  switch (text.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
    case 'on':
      return true;
    case 'false':
    case '0':
    case 'no':
    case 'off':
      return false;
    default:
      return null;
  }
}
