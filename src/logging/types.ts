/**
 * Logging type definitions
 */

// ═══════════════════════════════════════════════════════════════
// LEVELS
// ═══════════════════════════════════════════════════════════════

export type LogLevel = 0 | 1 | 2 | 3; // DEBUG | INFO | WARNING | CRITICAL

/**
 * Level constants, as carried in CONFIG.LOG_LEVELS
 */
export interface LogLevels {
  DEBUG: 0;
  INFO: 1;
  WARNING: 2;
  CRITICAL: 3;
}

// ═══════════════════════════════════════════════════════════════
// LOGGER
// ═══════════════════════════════════════════════════════════════

/**
 * Position on the simulated timeline, stamped onto each line
 */
export interface SimClockReading {
  tick: number;
  /** Simulated seconds */
  time: number;
}

/**
 * Returns the current simulated position, or null before the first tick
 */
export type SimClockSource = () => SimClockReading | null;

export interface Logger {
  log(level: LogLevel, msg: string): void;
  debug(msg: string): void;
  info(msg: string): void;
  warning(msg: string): void;
  critical(msg: string): void;
  setLevel(newLevel: LogLevel): void;
  getLevel(): LogLevel;
  /** Lets callers skip building per-tick debug strings */
  isDebugEnabled(): boolean;
  /**
   * Stamp lines with the simulated tick and time from now on.
   * Pass null to go back to unstamped lines.
   */
  attachClock(source: SimClockSource | null): void;
  /** Calls back once every sink with an initialize step has answered */
  initialize(callback: (success: boolean, messages: InitMessage[]) => void): void;
  dispose(): void;
}

export interface LoggerConfig {
  level: LogLevel;
  /** Wall-clock hours after which INFO is dropped unless at DEBUG (0 = never) */
  demoteHours: number;
}

export interface SinkWithLevel {
  sink: LogSink;
  /** Lines below this level never reach the sink */
  minLevel: LogLevel;
}

export interface LoggerDependencies {
  /** Wall-clock seconds, used for INFO demotion */
  timeSource: () => number;
  sinks: SinkWithLevel[];
  clock?: SimClockSource;
}

// ═══════════════════════════════════════════════════════════════
// SINKS
// ═══════════════════════════════════════════════════════════════

/**
 * Receives fully formatted lines; level filtering is already done
 */
export interface LogSink {
  write(formattedMessage: string): void;
  initialize?(callback: (success: boolean, message: string) => void): void;
  dispose?(): void;
}

/**
 * Bounded line buffer drained to the console on a repeating timer
 */
export interface ConsoleSink extends LogSink {
  initialize(callback: (success: boolean, message: string) => void): void;
  /** Write out everything still buffered */
  flush(): void;
  /** Flush, then cancel the drain timer */
  dispose(): void;
  getBufferSize(): number;
}

export interface ConsoleSinkConfig {
  /** Lines kept while waiting for the drain; the oldest are dropped past this */
  bufferSize: number;
  /** ms between drained lines */
  drainInterval: number;
}

/**
 * The slice of the global console the sink writes through
 */
export interface ConsoleAPI {
  log(message: string): void;
  warn(message: string): void;
}

// ═══════════════════════════════════════════════════════════════
// FILTERING / INIT
// ═══════════════════════════════════════════════════════════════

export interface FilterContext {
  currentLevel: LogLevel;
  /** Wall-clock seconds since the logger was created */
  uptime: number;
  demoteHours: number;
}

export interface InitMessage {
  success: boolean;
  message: string;
}
