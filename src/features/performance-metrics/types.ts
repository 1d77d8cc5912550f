/**
 * Performance metrics state
 *
 * Wall-clock execution statistics of scheduled ticks. Times are in seconds.
 */
export interface PerformanceState {
  /** Ticks measured since the scheduler started */
  tickCount: number;

  /** Cumulative tick execution time, for the average */
  tickTimeSum: number;

  tickTimeMax: number;

  /** Starts at INITIAL_TICK_TIME_MIN (Infinity) so the first tick sets it */
  tickTimeMin: number;

  /** Ticks that exceeded PERF_SLOW_TICK_THRESHOLD_MS */
  slowTickCount: number;

  /** Wall-clock time (seconds) of the last summary log */
  lastPerfLog: number;
}

/**
 * Result of measuring one tick
 */
export interface TickTrackingResult {
  performance: PerformanceState;
  wasSlow: boolean;
  /** Execution time of this tick (seconds) */
  tickTime: number;
}
