/**
 * Console output sink
 *
 * Writes DEBUG and INFO lines to stdout and WARNING and CRITICAL lines to
 * stderr, so a scheduler that captures only stderr still sees failures.
 * Lines are coloured by level with chalk when colours are enabled.
 */

import { Chalk } from 'chalk';

import type { LogLevel, LogSink, ConsoleSinkConfig, ConsoleAPI } from '../types';

const WARNING_LEVEL: LogLevel = 2;
const CRITICAL_LEVEL: LogLevel = 3;

/**
 * Create a console sink
 *
 * @param consoleApi - Console API for output (global console object)
 * @param config - Sink configuration
 * @returns Console sink instance
 *
 * @example
 * ```typescript
 * const consoleSink = createConsoleSink(console, { colors: process.stdout.isTTY });
 * consoleSink.write('ℹ️ [INFO]     Hello', LOG_LEVELS.INFO);
 * ```
 */
export function createConsoleSink(consoleApi: ConsoleAPI, config: ConsoleSinkConfig): LogSink {
  // Level 1 (16 colours) is enough for four levels and keeps output stable
  const chalk = new Chalk({ level: config.colors ? 1 : 0 });

  function style(formattedMessage: string, level: LogLevel): string {
    if (level >= CRITICAL_LEVEL) return chalk.red(formattedMessage);
    if (level >= WARNING_LEVEL) return chalk.yellow(formattedMessage);
    if (level === 0) return chalk.gray(formattedMessage);
    return formattedMessage;
  }

  function write(formattedMessage: string, level: LogLevel): void {
    const line = style(formattedMessage, level);
    if (level >= WARNING_LEVEL) {
      consoleApi.error(line);
    } else {
      consoleApi.log(line);
    }
  }

  return {
    write: write
  };
}
