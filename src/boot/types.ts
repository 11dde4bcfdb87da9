/**
 * Boot type definitions
 */

import type { ConsoleAPI } from '@logging';

/**
 * Source of environment variables (process.env or a test object)
 */
export type EnvSource = Readonly<Record<string, string | undefined>>;

/**
 * Values set from command-line flags
 */
export interface ConfigOverrides {
  dryRun?: boolean;
  logLevel?: string;
}

/**
 * Process exit codes
 */
export const EXIT_CODES = {
  OK: 0,
  FAILURE: 1,
  CONFIGURATION: 2,
} as const;

export type ExitCode = typeof EXIT_CODES[keyof typeof EXIT_CODES];

export type { RunContext, RunOutcome } from '@system/orchestrator';

/**
 * Console output and colour choice for the run
 */
export interface InitOptions {
  consoleApi?: ConsoleAPI;
  colors?: boolean;
}
