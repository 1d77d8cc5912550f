/**
 * Simulator entry point
 *
 * Runs the default configuration in real time until SIGINT/SIGTERM, then
 * logs a run summary and exits.
 */

import { initialize } from './init';
import { formatRunSummary, summaryOptionsFromConfig, trackRunSummary } from '@features/run-summary';
import { createTickScheduler } from '@system/scheduler';
import { createNodeTimer } from '@utils/timer';

import type { KilnApp } from './types';

function run(app: KilnApp): void {
  const config = app.config;
  const scheduler = createTickScheduler(createNodeTimer(false), app.driver, {
    periodMs: config.TICK_PERIOD_MS,
    dtSec: config.TICK_DT_SEC
  }, app.logger, {
    logIntervalSec: config.PERF_LOG_INTERVAL_SEC,
    slowThresholdMs: config.PERF_SLOW_TICK_THRESHOLD_MS,
    warnSlowTicks: config.PERF_WARN_SLOW_TICKS,
    initialTickTimeMin: config.INITIAL_TICK_TIME_MIN
  });

  const runSummary = trackRunSummary(app.driver, summaryOptionsFromConfig(config));

  function shutdown(): void {
    scheduler.stop();
    app.driver.stop();
    const summary = runSummary.summary();
    if (summary !== null) {
      app.logger.info(formatRunSummary(summary));
    }
    app.logger.dispose();
  }

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  app.driver.start();
  scheduler.start();
}

const app = initialize(undefined, { onReady: run });

if (app === null) {
  process.exitCode = 1;
}
