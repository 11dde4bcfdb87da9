/**
 * One scheduled run, from environment to exit code
 */

import { ConfigurationError } from '$types/errors';
import { runOnce } from '@system/orchestrator';
import { now } from '@utils/time';

import { loadConfig } from './config';
import { initialize } from './init';
import { EXIT_CODES } from './types';

import type { ConfigOverrides, EnvSource, ExitCode, InitOptions, RunContext } from './types';

/**
 * Render a caught value for the final log line
 * @param error - Caught value
 * @returns "Name: message" for errors, String(value) otherwise
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.name + ': ' + error.message;
  }
  return String(error);
}

/**
 * Load configuration, run once and map the result to an exit code
 *
 * - configuration or validation problems: 2 (nothing is fetched)
 * - transport, notification or unexpected failures: 1
 * - every run outcome, including "no data": 0
 *
 * @param env - Environment variables
 * @param overrides - Values from command-line flags
 * @param options - Console output and colour choice
 * @param clock - Time source for the run
 * @returns Process exit code
 */
export async function runJob(
  env: EnvSource,
  overrides: ConfigOverrides = {},
  options: InitOptions = {},
  clock: () => Date = now
): Promise<ExitCode> {
  const consoleApi = options.consoleApi ?? console;

  let context: RunContext;
  try {
    context = initialize(loadConfig(env, overrides), options);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      consoleApi.error('INIT FAIL: Invalid configuration');
      error.problems.forEach(function(problem) {
        consoleApi.error('  - ' + problem);
      });
      return EXIT_CODES.CONFIGURATION;
    }
    throw error;
  }

  try {
    const outcome = await runOnce(context, clock());
    context.logger.debug('Run finished: ' + outcome);
    return EXIT_CODES.OK;
  } catch (error) {
    context.logger.critical(describeError(error));
    return EXIT_CODES.FAILURE;
  }
}
