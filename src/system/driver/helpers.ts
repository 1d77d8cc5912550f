/**
 * Simulation driver helper functions
 */

import type { KilnConfig } from '$types/config';
import type { ControllerConfig } from '@core/pid';
import { fmtPct, fmtTemp } from '@logging';
import type { Sample } from '@system/state';

import type { ControllerConfigPatch, DriverOptions } from './types';

/**
 * Deep copy of a controller configuration
 */
export function cloneControllerConfig(config: ControllerConfig): ControllerConfig {
  return {
    setpoint: config.setpoint,
    gains: { kp: config.gains.kp, ki: config.gains.ki, kd: config.gains.kd },
    outputBounds: { min: config.outputBounds.min, max: config.outputBounds.max },
    manualOutput: config.manualOutput,
    mode: config.mode
  };
}

/**
 * Deep-frozen copy for handing to consumers
 */
export function freezeControllerConfig(config: ControllerConfig): ControllerConfig {
  const copy = cloneControllerConfig(config);
  Object.freeze(copy.gains);
  Object.freeze(copy.outputBounds);
  return Object.freeze(copy);
}

/**
 * Project a patch onto a configuration without touching either
 */
export function applyConfigPatch(config: ControllerConfig, patch: ControllerConfigPatch): ControllerConfig {
  const gains = patch.gains ?? {};
  const bounds = patch.outputBounds ?? {};

  return {
    setpoint: patch.setpoint ?? config.setpoint,
    gains: {
      kp: gains.kp ?? config.gains.kp,
      ki: gains.ki ?? config.gains.ki,
      kd: gains.kd ?? config.gains.kd
    },
    outputBounds: {
      min: bounds.min ?? config.outputBounds.min,
      max: bounds.max ?? config.outputBounds.max
    },
    manualOutput: patch.manualOutput ?? config.manualOutput,
    mode: patch.mode ?? config.mode
  };
}

/**
 * Derive driver options from the flat application config
 */
export function buildDriverOptions(config: KilnConfig): DriverOptions {
  return {
    controller: {
      setpoint: config.SETPOINT_C,
      gains: { kp: config.KP, ki: config.KI, kd: config.KD },
      outputBounds: { min: config.OUTPUT_MIN_PCT, max: config.OUTPUT_MAX_PCT },
      manualOutput: config.MANUAL_OUTPUT_PCT,
      mode: config.INITIAL_MODE
    },
    plant: {
      timeConstantSec: config.PLANT_TIME_CONSTANT_SEC,
      ambientTemperature: config.AMBIENT_TEMPERATURE_C,
      processGain: config.PLANT_PROCESS_GAIN_C_PER_PCT,
      maxTemperature: config.MAX_TEMPERATURE_C
    },
    emissions: {
      idleFuelRateKgH: config.IDLE_FUEL_RATE_KG_H,
      fuelRatePerOutputKgH: config.FUEL_RATE_PER_PCT_KG_H,
      co2PerKgFuel: config.CO2_PER_KG_FUEL,
      temperatureCoefficient: config.CO2_TEMP_COEFF_KG_H_PER_C,
      referenceTemperature: config.CO2_REFERENCE_TEMP_C
    },
    initialTemperature: config.INITIAL_TEMPERATURE_C,
    historyCapacity: config.HISTORY_CAPACITY,
    maxPendingCommands: config.MAX_PENDING_COMMANDS,
    debugStatusEveryTicks: config.DEBUG_STATUS_EVERY_TICKS
  };
}

/**
 * One-line status for DEBUG logging
 * @example "t=12.0s T=52.3C (sp=1350.0C) out=100.0% co2=3487.0kg/h AUTO"
 */
export function formatSampleStatus(sample: Sample): string {
  return "t=" + sample.time.toFixed(1) + "s" +
    " T=" + fmtTemp(sample.temperature, sample.setpoint) +
    " out=" + fmtPct(sample.controlOutput) +
    " co2=" + sample.emissionRate.toFixed(1) + "kg/h " +
    sample.mode;
}
