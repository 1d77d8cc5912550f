/**
 * Simulator initialization
 */

import CONFIG from './config';
import { createLogger, createConsoleSink, fmtTemp } from '@logging';
import { buildDriverOptions, createSimulationDriver } from '@system/driver';
import { now } from '@utils/time';
import { createNodeTimer } from '@utils/timer';
import { validateConfig } from '@validation';

import type { InitMessage, Logger, SinkWithLevel } from '@logging';
import type { SimulationDriver } from '@system/driver';
import type { KilnConfig } from '$types';
import type { InitOptions, KilnApp } from './types';

function buildDriver(config: KilnConfig, logger: Logger): SimulationDriver | null {
  try {
    return createSimulationDriver(buildDriverOptions(config), { logger: logger });
  } catch (err) {
    console.error("INIT FAIL: " + String(err));
    return null;
  }
}

/**
 * Validate the configuration and build logger and driver
 *
 * @param config - Defaults to the shipped CONFIG
 * @returns null (with errors printed) when the configuration is invalid
 */
export function initialize(config: KilnConfig = CONFIG, options: InitOptions = {}): KilnApp | null {
  // Validate configuration
  const validation = validateConfig(config);

  if (!validation.valid) {
    console.error("INIT FAIL: Invalid configuration");
    validation.errors.forEach(function(err) {
      console.error("  [" + err.field + "]: " + err.message);
    });
    return null;
  }

  if (validation.warnings.length > 0) {
    validation.warnings.forEach(function(warn) {
      console.warn("  [" + warn.field + "]: " + warn.message);
    });
  }

  // Setup logging
  const timerApi = options.timerApi ?? createNodeTimer(true);
  const consoleApi = options.consoleApi ?? console;

  const sinks: SinkWithLevel[] = [];
  if (config.CONSOLE_ENABLED) {
    const consoleSink = createConsoleSink(timerApi, consoleApi, {
      bufferSize: config.CONSOLE_BUFFER_SIZE,
      drainInterval: config.CONSOLE_INTERVAL_MS
    });
    sinks.push({ sink: consoleSink, minLevel: config.CONSOLE_LOG_LEVEL });
  }

  const logger = createLogger({
    level: config.GLOBAL_LOG_LEVEL,
    demoteHours: config.GLOBAL_LOG_AUTO_DEMOTE_HOURS
  }, {
    timeSource: now,
    sinks: sinks
  }, config.LOG_LEVELS);

  const driver = buildDriver(config, logger);
  if (driver === null) {
    logger.dispose();
    return null;
  }

  logger.attachClock(function() {
    const state = driver.currentState();
    return state.tick > 0 ? { tick: state.tick, time: state.time } : null;
  });

  const app: KilnApp = { config: config, logger: logger, driver: driver };

  // Initialize logger and call onReady when done
  logger.initialize(function(_success: boolean, messages: InitMessage[]) {
    // Startup banner FIRST
    logger.info("🚀 Kiln Simulator v1.0");
    logger.info("🎯 " + fmtTemp(config.SETPOINT_C) + " | " + config.INITIAL_MODE +
      " | PID kp=" + config.KP + " ki=" + config.KI + " kd=" + config.KD +
      " | out " + config.OUTPUT_MIN_PCT + "-" + config.OUTPUT_MAX_PCT + "%");
    logger.info("🔥 tau=" + config.PLANT_TIME_CONSTANT_SEC + "s gain=" + config.PLANT_PROCESS_GAIN_C_PER_PCT +
      "C/% max=" + fmtTemp(config.MAX_TEMPERATURE_C) + " | ⏱️ dt=" + config.TICK_DT_SEC + "s every " +
      config.TICK_PERIOD_MS + "ms");

    // Sink init failures AFTER the banner, straight to the console
    for (let i = 0; i < messages.length; i++) {
      if (!messages[i].success) {
        consoleApi.log('⚠️ [WARNING]  ' + messages[i].message);
      }
    }

    if (options.onReady) {
      options.onReady(app);
    }
  });

  return app;
}
