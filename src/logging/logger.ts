/**
 * Leveled logger fanning out to sinks
 *
 * Lines are gated by the current level (with INFO demotion on long runs),
 * tagged, stamped with the simulated tick/time once a clock is attached and
 * written to every sink whose minLevel they meet. A throwing sink is reported
 * on stderr and skipped; it never reaches the simulation.
 */

import { formatClockStamp, formatLogMessage, shouldLog } from './helpers';

import type {
  InitMessage,
  LogLevel,
  LogLevels,
  Logger,
  LoggerConfig,
  LoggerDependencies,
  SimClockSource,
  SinkWithLevel
} from './types';

/**
 * Create a logger
 *
 * @example
 * ```typescript
 * const logger = createLogger(
 *   { level: LOG_LEVELS.INFO, demoteHours: 24 },
 *   { timeSource: now, sinks: [{ sink: consoleSink, minLevel: LOG_LEVELS.INFO }] },
 *   LOG_LEVELS
 * );
 * logger.attachClock(function() { return { tick: 3, time: 6 }; });
 * logger.info("SATURATION cleared"); // "ℹ️ [INFO]     [#3 t=6.0s] SATURATION cleared"
 * ```
 */
export function createLogger(
  config: LoggerConfig,
  dependencies: LoggerDependencies,
  logLevels: LogLevels
): Logger {
  let currentLevel = config.level;
  let clock: SimClockSource | null = dependencies.clock ?? null;
  const timeSource = dependencies.timeSource;
  const sinks: SinkWithLevel[] = dependencies.sinks;
  const startedAt = timeSource();

  function writeToSinks(level: LogLevel, line: string): void {
    for (const entry of sinks) {
      if (level < entry.minLevel) continue;
      try {
        entry.sink.write(line);
      } catch (err) {
        console.warn("Log sink write failed: " + String(err));
      }
    }
  }

  function log(level: LogLevel, msg: string): void {
    const allowed = shouldLog(level, {
      currentLevel: currentLevel,
      uptime: timeSource() - startedAt,
      demoteHours: config.demoteHours
    }, logLevels);
    if (!allowed) return;

    const stamp = clock === null ? "" : formatClockStamp(clock());
    writeToSinks(level, formatLogMessage(level, msg, logLevels, stamp));
  }

  function initialize(callback: (success: boolean, messages: InitMessage[]) => void): void {
    const pending = sinks.filter(function(entry) {
      return entry.sink.initialize !== undefined;
    });
    const messages: InitMessage[] = [];

    if (pending.length === 0) {
      callback(true, messages);
      return;
    }

    for (const entry of pending) {
      entry.sink.initialize?.(function(success: boolean, message: string) {
        messages.push({ success: success, message: message });
        if (messages.length === pending.length) {
          callback(messages.every(function(m) { return m.success; }), messages);
        }
      });
    }
  }

  function dispose(): void {
    for (const entry of sinks) {
      try {
        entry.sink.dispose?.();
      } catch (err) {
        console.warn("Log sink dispose failed: " + String(err));
      }
    }
  }

  return {
    log: log,
    debug: function(msg: string) { log(logLevels.DEBUG, msg); },
    info: function(msg: string) { log(logLevels.INFO, msg); },
    warning: function(msg: string) { log(logLevels.WARNING, msg); },
    critical: function(msg: string) { log(logLevels.CRITICAL, msg); },
    setLevel: function(newLevel: LogLevel) { currentLevel = newLevel; },
    getLevel: function() { return currentLevel; },
    isDebugEnabled: function() { return currentLevel <= logLevels.DEBUG; },
    attachClock: function(source: SimClockSource | null) { clock = source; },
    initialize: initialize,
    dispose: dispose
  };
}
