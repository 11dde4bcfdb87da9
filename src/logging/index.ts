/**
 * Logging module barrel export
 *
 * - Logger coordinator (createLogger)
 * - Console sink (createConsoleSink)
 * - Pure format and filter functions
 */

export { formatLogMessage, shouldLog, parseLogLevel, fmtCelsius } from './helpers';
export { createConsoleSink } from './console/console-sink';
export { createLogger } from './logger';

export type {
  LogLevel,
  LogLevels,
  Logger,
  LoggerConfig,
  LoggerDependencies,
  SinkWithLevel,
  LogSink,
  ConsoleSinkConfig,
  ConsoleAPI
} from './types';
