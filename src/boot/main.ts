/**
 * Command-line entry point
 *
 * heat-index-alert [--dry-run] [--log-level <level>] [--env-file <path>]
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';

import { program } from 'commander';
import * as dotenv from 'dotenv';

import { describeError, runJob } from './run';
import { EXIT_CODES } from './types';

import type { ExitCode } from './types';

type CliOptions = {
  dryRun?: boolean;
  logLevel?: string;
  envFile: string;
};

const PROJECT_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../..');

program
  .name('heat-index-alert')
  .description('Check the nearest REDMET stations and alert Telegram chats when the heat index is above the threshold')
  .option('--dry-run', 'Log the alert instead of sending it')
  .option('--log-level <level>', 'debug | info | warning | critical')
  .option('--env-file <path>', 'Environment file (optional)', path.join(PROJECT_ROOT, '.env'))
  .parse(process.argv);

const options = program.opts<CliOptions>();

async function main(): Promise<ExitCode> {
  // Values already in the environment win over the file
  if (fs.existsSync(options.envFile)) {
    const result = dotenv.config({ path: options.envFile });
    if (result.error) {
      console.error('INIT FAIL: Cannot read ' + options.envFile + ': ' + result.error.message);
      return EXIT_CODES.CONFIGURATION;
    }
  }

  return runJob(process.env, { dryRun: options.dryRun, logLevel: options.logLevel });
}

main().then(function(code) {
  process.exitCode = code;
}, function(error: unknown) {
  console.error('🚨 [CRITICAL] ' + describeError(error));
  process.exitCode = EXIT_CODES.FAILURE;
});
