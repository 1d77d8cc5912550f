/**
 * Tick scheduler types
 */

import type { PerformanceState } from '@features/performance-metrics';

export interface SchedulerOptions {
  /** Wall-clock period between ticks (TICK_PERIOD_MS) */
  periodMs: number;
  /** Simulated seconds advanced per tick (TICK_DT_SEC) */
  dtSec: number;
}

export interface SchedulerMetricsConfig {
  /** PERF_LOG_INTERVAL_SEC */
  logIntervalSec: number;
  /** PERF_SLOW_TICK_THRESHOLD_MS */
  slowThresholdMs: number;
  /** PERF_WARN_SLOW_TICKS */
  warnSlowTicks: boolean;
  /** INITIAL_TICK_TIME_MIN */
  initialTickTimeMin: number;
}

export interface TickScheduler {
  /** Begin calling driver.tick every period; false if already active */
  start(): boolean;
  /** Cancel the timer; false if not active. The driver phase is untouched. */
  stop(): boolean;
  isActive(): boolean;
  getPerformance(): PerformanceState;
}
