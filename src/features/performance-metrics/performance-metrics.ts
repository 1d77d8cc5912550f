/**
 * Performance metrics tracking
 * Measures how long each scheduled tick takes and flags slow ones
 */

import { isFiniteNumber } from '@utils/number';

import type { PerformanceState, TickTrackingResult } from './types';

/**
 * Fresh metrics state
 * @param initialMin - Seed for the running minimum (CONFIG.INITIAL_TICK_TIME_MIN)
 * @param startedAt - Wall-clock seconds used as the first summary reference
 */
export function initPerformanceState(initialMin: number = Infinity, startedAt: number = 0): PerformanceState {
  return {
    tickCount: 0,
    tickTimeSum: 0,
    tickTimeMax: 0,
    tickTimeMin: initialMin,
    slowTickCount: 0,
    lastPerfLog: startedAt
  };
}

/**
 * Record one tick execution
 *
 * @param performance - Current metrics (not mutated)
 * @param tickStartSec - Wall-clock start in seconds
 * @param tickEndSec - Wall-clock end in seconds
 * @param slowThresholdMs - Ticks longer than this are slow; 0 or less disables detection
 *
 * @remarks
 * Non-finite timestamps leave the metrics untouched. A negative duration
 * (clock stepped backwards) counts as a zero-length tick.
 *
 * @example
 * ```typescript
 * const result = trackTickExecution(perf, start, nowSec(), 20);
 * perf = result.performance;
 * ```
 */
export function trackTickExecution(
  performance: PerformanceState,
  tickStartSec: number,
  tickEndSec: number,
  slowThresholdMs: number
): TickTrackingResult {
  if (!isFiniteNumber(tickStartSec) || !isFiniteNumber(tickEndSec)) {
    return { performance: performance, wasSlow: false, tickTime: 0 };
  }

  const tickTime = Math.max(0, tickEndSec - tickStartSec);
  const wasSlow = slowThresholdMs > 0 && tickTime * 1000 > slowThresholdMs;

  return {
    performance: {
      tickCount: performance.tickCount + 1,
      tickTimeSum: performance.tickTimeSum + tickTime,
      tickTimeMax: Math.max(performance.tickTimeMax, tickTime),
      tickTimeMin: Math.min(performance.tickTimeMin, tickTime),
      slowTickCount: performance.slowTickCount + (wasSlow ? 1 : 0),
      lastPerfLog: performance.lastPerfLog
    },
    wasSlow: wasSlow,
    tickTime: tickTime
  };
}

/**
 * True once intervalSec has passed since the last summary
 */
export function isSummaryDue(performance: PerformanceState, nowSec: number, intervalSec: number): boolean {
  return nowSec - performance.lastPerfLog >= intervalSec;
}

/**
 * Summary line for logging
 *
 * @example
 * ```typescript
 * formatPerformanceSummary(perf);
 * // "Performance: 1234 ticks, avg=4.2ms, min=2.1ms, max=15.3ms, slow=5 (0.4%)"
 * ```
 */
export function formatPerformanceSummary(performance: PerformanceState): string {
  if (performance.tickCount === 0) {
    return 'Performance: No ticks executed yet';
  }

  const avgTimeMs = (performance.tickTimeSum / performance.tickCount) * 1000;
  const minTimeMs = performance.tickTimeMin * 1000;
  const maxTimeMs = performance.tickTimeMax * 1000;
  const slowPct = (performance.slowTickCount / performance.tickCount) * 100;

  return `Performance: ${performance.tickCount} ticks, ` +
    `avg=${avgTimeMs.toFixed(1)}ms, ` +
    `min=${minTimeMs.toFixed(1)}ms, ` +
    `max=${maxTimeMs.toFixed(1)}ms, ` +
    `slow=${performance.slowTickCount} (${slowPct.toFixed(1)}%)`;
}
