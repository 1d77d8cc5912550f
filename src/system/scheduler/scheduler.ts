/**
 * Fixed-cadence tick scheduler
 *
 * Maps wall-clock periods onto fixed simulated steps: every periodMs the
 * driver advances by dtSec. The scheduler owns the timer only; whether a tick
 * actually runs is the driver's decision (a STOPPED driver answers NO_OP).
 */

import {
  formatPerformanceSummary,
  initPerformanceState,
  isSummaryDue,
  trackTickExecution
} from '@features/performance-metrics';
import type { PerformanceState } from '@features/performance-metrics';
import type { Logger } from '@logging';
import type { SimulationDriver } from '@system/driver';
import type { TimerAPI, TimerHandle } from '$types/timer';
import { nowMs } from '@utils/time';

import type { SchedulerMetricsConfig, SchedulerOptions, TickScheduler } from './types';

function wallClockSec(): number {
  return nowMs() / 1000;
}

/**
 * Create a tick scheduler
 *
 * @param clock - Wall-clock seconds, used for tick timing only
 */
export function createTickScheduler(
  timerApi: TimerAPI,
  driver: SimulationDriver,
  options: SchedulerOptions,
  logger: Logger,
  metricsConfig: SchedulerMetricsConfig,
  clock: () => number = wallClockSec
): TickScheduler {
  let handle: TimerHandle | null = null;
  let performance: PerformanceState = initPerformanceState(metricsConfig.initialTickTimeMin);

  function onTimer(): void {
    const startedAt = clock();
    const result = driver.tick(options.dtSec);
    const finishedAt = clock();

    if (!result.ok && result.condition !== 'INVALID_CONFIG') {
      return;
    }

    const tracked = trackTickExecution(performance, startedAt, finishedAt, metricsConfig.slowThresholdMs);
    performance = tracked.performance;

    if (tracked.wasSlow && metricsConfig.warnSlowTicks) {
      logger.warning("Slow tick: " + (tracked.tickTime * 1000).toFixed(1) + "ms (threshold " +
        metricsConfig.slowThresholdMs + "ms)");
    }

    if (isSummaryDue(performance, finishedAt, metricsConfig.logIntervalSec)) {
      logger.info(formatPerformanceSummary(performance));
      performance = Object.assign({}, performance, { lastPerfLog: finishedAt });
    }
  }

  function start(): boolean {
    if (handle !== null) {
      return false;
    }
    performance = initPerformanceState(metricsConfig.initialTickTimeMin, clock());
    handle = timerApi.set(options.periodMs, true, onTimer);
    logger.info("Tick scheduler started: every " + options.periodMs + "ms, dt=" + options.dtSec + "s");
    return true;
  }

  function stop(): boolean {
    if (handle === null) {
      return false;
    }
    timerApi.clear(handle);
    handle = null;
    logger.info("Tick scheduler stopped. " + formatPerformanceSummary(performance));
    return true;
  }

  return {
    start: start,
    stop: stop,
    isActive: function() { return handle !== null; },
    getPerformance: function() { return performance; }
  };
}
