/**
 * Logging
 *
 * createLogger fans tagged, clock-stamped lines out to sinks; the console sink
 * buffers and drains them on a timer.
 */

export { createLogger } from './logger';
export { createConsoleSink } from './console';
export { formatClockStamp, formatLogMessage, shouldLog, fmtTemp, fmtPct } from './helpers';

export type {
  ConsoleAPI,
  ConsoleSink,
  ConsoleSinkConfig,
  FilterContext,
  InitMessage,
  LogLevel,
  LogLevels,
  LogSink,
  Logger,
  LoggerConfig,
  LoggerDependencies,
  SimClockReading,
  SimClockSource,
  SinkWithLevel
} from './types';
