/**
 * Simulation driver: advances controller, plant and emissions in lockstep
 *
 * Phases: IDLE -> RUNNING <-> STOPPED, with reset returning to IDLE from
 * anywhere. Each tick runs Controller -> Plant -> Emissions, appends one
 * Sample and publishes events. Commands issued while a tick is running
 * (typically from an event listener) are queued and applied, in order, once
 * the tick has finished, so a computation never sees a half-applied config.
 */

import { computeControl, assertControllerConfig, validateControllerConfig } from '@core/pid';
import type { ControllerConfig } from '@core/pid';
import { advanceTemperature, validatePlantParameters } from '@core/plant';
import { estimateEmissions, validateEmissionsParameters } from '@core/emissions';
import { createHistory } from '@core/history';
import { EVENT_NAMES } from '@events/types';
import type { KilnEventListener, KilnEventMap, KilnEventName } from '@events/types';
import { fmtTemp } from '@logging';
import { createInitialState, toSnapshot } from '@system/state';
import type { Sample, SimulationState } from '@system/state';

import {
  applyConfigPatch,
  cloneControllerConfig,
  formatSampleStatus,
  freezeControllerConfig
} from './helpers';
import type {
  CommandStatus,
  ConfigUpdateResult,
  ControllerConfigPatch,
  DriverCommand,
  DriverDependencies,
  DriverOptions,
  ResetOptions,
  SimulationDriver,
  TickResult
} from './types';

type ListenerRegistry = { [K in KilnEventName]: Set<KilnEventListener<K>> };

/**
 * Create a simulation driver
 *
 * @param options - Plant, emissions and initial controller configuration
 * @param dependencies - Logger
 * @throws {ValidationError} If plant, emissions or controller configuration is invalid
 *
 * @example
 * ```typescript
 * const driver = createSimulationDriver(buildDriverOptions(CONFIG), { logger });
 * driver.start();
 * const result = driver.tick(1);
 * ```
 */
export function createSimulationDriver(
  options: DriverOptions,
  dependencies: DriverDependencies
): SimulationDriver {
  validatePlantParameters(options.plant);
  validateEmissionsParameters(options.emissions);
  assertControllerConfig(options.controller);

  const logger = dependencies.logger;
  const defaultConfig = freezeControllerConfig(options.controller);
  const listeners: ListenerRegistry = {
    kiln_sample: new Set(),
    kiln_condition: new Set(),
    kiln_lifecycle: new Set(),
    kiln_config: new Set()
  };
  const samples = createHistory<Sample>(options.historyCapacity);
  const queue: DriverCommand[] = [];

  let config = cloneControllerConfig(options.controller);
  let state = createInitialState(options.initialTemperature);
  let ticking = false;
  let draining = false;
  let saturationReported = false;

  // ─────────────────────────────────────────────────────────────
  // Events
  // ─────────────────────────────────────────────────────────────

  // Each listener runs in isolation: a throw is logged and the next one still runs
  function emit<K extends KilnEventName>(event: K, payload: KilnEventMap[K]): void {
    const registered: ListenerRegistry[K] = listeners[event];
    for (const listener of Array.from(registered)) {
      try {
        listener(payload);
      } catch (err) {
        logger.warning("Listener error on " + event + ": " + String(err));
      }
    }
  }

  function on<K extends KilnEventName>(event: K, listener: KilnEventListener<K>): void {
    const registered: ListenerRegistry[K] = listeners[event];
    registered.add(listener);
  }

  function off<K extends KilnEventName>(event: K, listener: KilnEventListener<K>): void {
    const registered: ListenerRegistry[K] = listeners[event];
    registered.delete(listener);
  }

  // ─────────────────────────────────────────────────────────────
  // Command application (only ever runs outside a tick)
  // ─────────────────────────────────────────────────────────────

  function applyStart(): CommandStatus {
    if (state.phase === 'RUNNING') {
      return 'NO_OP';
    }
    state.phase = 'RUNNING';
    logger.info("Simulation started at t=" + state.time.toFixed(1) + "s, " + fmtTemp(state.temperature, config.setpoint));
    emit(EVENT_NAMES.LIFECYCLE, { type: 'started', phase: state.phase, time: state.time });
    return 'APPLIED';
  }

  function applyStop(): CommandStatus {
    if (state.phase !== 'RUNNING') {
      return 'NO_OP';
    }
    state.phase = 'STOPPED';
    logger.info("Simulation stopped at t=" + state.time.toFixed(1) + "s after " + state.tick + " ticks");
    emit(EVENT_NAMES.LIFECYCLE, { type: 'stopped', phase: state.phase, time: state.time });
    return 'APPLIED';
  }

  function applyReset(resetOptions: ResetOptions): CommandStatus {
    state = createInitialState(options.initialTemperature);
    samples.clear();
    saturationReported = false;
    if (resetOptions.restoreDefaultConfig === true) {
      config = cloneControllerConfig(defaultConfig);
    }
    logger.info("Simulation reset" + (resetOptions.restoreDefaultConfig === true ? " (default config restored)" : ""));
    emit(EVENT_NAMES.LIFECYCLE, { type: 'reset', phase: state.phase, time: state.time });
    return 'APPLIED';
  }

  function applyConfig(next: ControllerConfig): void {
    const previousMode = config.mode;
    config = next;
    if (previousMode !== next.mode) {
      logger.info("Controller mode " + previousMode + " -> " + next.mode);
    }
    emit(EVENT_NAMES.CONFIG, { config: freezeControllerConfig(next), previousMode: previousMode });
  }

  function applyCommand(command: DriverCommand): void {
    switch (command.type) {
      case 'start':
        applyStart();
        break;
      case 'stop':
        applyStop();
        break;
      case 'reset':
        applyReset(command.options);
        break;
      case 'configure': {
        // Re-validate: a queued reset may have replaced the config it was checked against
        const next = applyConfigPatch(config, command.patch);
        const issues = validateControllerConfig(next);
        if (issues.length > 0) {
          logger.warning("Dropped queued config update: " + issues.join('; '));
          break;
        }
        applyConfig(next);
        break;
      }
    }
  }

  function drainQueue(): void {
    if (draining) {
      return;
    }
    draining = true;
    try {
      let command = queue.shift();
      while (command !== undefined) {
        applyCommand(command);
        command = queue.shift();
      }
    } finally {
      draining = false;
    }
  }

  function isBusy(): boolean {
    return ticking || draining;
  }

  function enqueue(command: DriverCommand): boolean {
    if (queue.length >= options.maxPendingCommands) {
      logger.warning("Command queue full (" + options.maxPendingCommands + "), dropping " + command.type);
      return false;
    }
    queue.push(command);
    return true;
  }

  /**
   * Apply now when idle, otherwise queue behind the running tick
   */
  function submit(command: DriverCommand, applyNow: () => CommandStatus): CommandStatus {
    if (isBusy()) {
      return enqueue(command) ? 'DEFERRED' : 'QUEUE_FULL';
    }
    return applyNow();
  }

  // ─────────────────────────────────────────────────────────────
  // Public commands
  // ─────────────────────────────────────────────────────────────

  function start(): CommandStatus {
    return submit({ type: 'start' }, applyStart);
  }

  function stop(): CommandStatus {
    return submit({ type: 'stop' }, applyStop);
  }

  function reset(resetOptions: ResetOptions = {}): CommandStatus {
    return submit({ type: 'reset', options: resetOptions }, function() {
      return applyReset(resetOptions);
    });
  }

  function setConfig(patch: ControllerConfigPatch): ConfigUpdateResult {
    const projected = applyConfigPatch(config, patch);
    const issues = validateControllerConfig(projected);
    if (issues.length > 0) {
      logger.warning("Rejected config update: " + issues.join('; '));
      return { ok: false, condition: 'INVALID_CONFIG', errors: issues };
    }

    if (isBusy()) {
      if (!enqueue({ type: 'configure', patch: patch })) {
        return { ok: false, condition: 'QUEUE_FULL', errors: ["command queue full (" + options.maxPendingCommands + ")"] };
      }
      return { ok: true, deferred: true, config: freezeControllerConfig(projected) };
    }

    applyConfig(projected);
    return { ok: true, deferred: false, config: freezeControllerConfig(projected) };
  }

  // ─────────────────────────────────────────────────────────────
  // Tick
  // ─────────────────────────────────────────────────────────────

  function executeTick(dt: number): TickResult {
    const pid = computeControl(config.setpoint, state.temperature, dt, config, state.controller);
    if (!pid.ok) {
      logger.warning("Tick " + (state.tick + 1) + " skipped: " + pid.message);
      emit(EVENT_NAMES.CONDITION, {
        condition: 'INVALID_CONFIG',
        message: pid.message,
        tick: state.tick,
        time: state.time
      });
      return { ok: false, condition: 'INVALID_CONFIG', message: pid.message };
    }

    const plant = advanceTemperature(state.temperature, pid.output, dt, options.plant);
    const emissionRate = estimateEmissions(pid.output, plant.temperature, options.emissions);

    const sample: Sample = Object.freeze({
      tick: state.tick + 1,
      time: state.time + dt,
      temperature: plant.temperature,
      controlOutput: pid.output,
      emissionRate: emissionRate,
      setpoint: config.setpoint,
      mode: config.mode,
      saturated: plant.saturated,
      outputSaturated: pid.saturated
    });

    samples.append(sample);
    state.tick = sample.tick;
    state.time = sample.time;
    state.temperature = sample.temperature;
    state.controlOutput = sample.controlOutput;
    state.emissionRate = sample.emissionRate;
    state.controller = pid.state;

    if (options.debugStatusEveryTicks > 0 &&
        sample.tick % options.debugStatusEveryTicks === 0 &&
        logger.isDebugEnabled()) {
      logger.debug(formatSampleStatus(sample));
    }

    emit(EVENT_NAMES.SAMPLE, { sample: sample, state: toSnapshot(state, config) });

    if (plant.saturated) {
      const message = "Temperature clamped to " + fmtTemp(plant.temperature) +
        " (model gave " + fmtTemp(plant.unclamped) + ")";
      if (!saturationReported) {
        logger.warning(message);
        saturationReported = true;
      }
      emit(EVENT_NAMES.CONDITION, {
        condition: 'SATURATION',
        message: message,
        tick: sample.tick,
        time: sample.time
      });
      return { ok: true, sample: sample, condition: 'SATURATION' };
    }

    if (saturationReported) {
      logger.info("Temperature back inside physical range: " + fmtTemp(plant.temperature));
      saturationReported = false;
    }
    return { ok: true, sample: sample, condition: null };
  }

  function tick(dt: number): TickResult {
    if (ticking) {
      return { ok: false, condition: 'NO_OP_BUSY', message: "tick ignored: a tick is already running" };
    }
    if (state.phase !== 'RUNNING') {
      return { ok: false, condition: 'NO_OP_NOT_RUNNING', message: "tick ignored: driver is " + state.phase };
    }

    ticking = true;
    try {
      return executeTick(dt);
    } finally {
      ticking = false;
      drainQueue();
    }
  }

  // ─────────────────────────────────────────────────────────────
  // Queries
  // ─────────────────────────────────────────────────────────────

  function currentState(): SimulationState {
    return toSnapshot(state, config);
  }

  function history(): readonly Sample[] {
    return samples.toArray();
  }

  function latestSample(): Sample | null {
    return samples.latest();
  }

  function getConfig(): ControllerConfig {
    return freezeControllerConfig(config);
  }

  return {
    start: start,
    stop: stop,
    reset: reset,
    setConfig: setConfig,
    tick: tick,
    currentState: currentState,
    history: history,
    latestSample: latestSample,
    getConfig: getConfig,
    getPhase: function() { return state.phase; },
    pendingCommands: function() { return queue.length; },
    on: on,
    off: off
  };
}
