/**
 * Type definition for Kiln Simulator configuration
 */

import type { LogLevel, LogLevels } from '@logging';
import type { ControlMode } from './common';

/**
 * User-configurable settings
 * Everything a user might reasonably tune for control, plant behaviour, reporting and observability
 */
export interface KilnUserConfig {
  // ───────── CONTROLLER ─────────
  readonly SETPOINT_C: number;
  readonly KP: number;
  readonly KI: number;
  readonly KD: number;
  readonly OUTPUT_MIN_PCT: number;
  readonly OUTPUT_MAX_PCT: number;
  readonly MANUAL_OUTPUT_PCT: number;
  readonly INITIAL_MODE: ControlMode;

  // ───────── PLANT (KILN THERMAL MODEL) ─────────
  readonly INITIAL_TEMPERATURE_C: number;
  readonly AMBIENT_TEMPERATURE_C: number;
  readonly PLANT_TIME_CONSTANT_SEC: number;
  readonly PLANT_PROCESS_GAIN_C_PER_PCT: number;
  readonly MAX_TEMPERATURE_C: number;

  // ───────── SIMULATION CLOCK ─────────
  readonly TICK_DT_SEC: number;
  readonly TICK_PERIOD_MS: number;
  readonly HISTORY_CAPACITY: number;

  // ───────── EMISSIONS ─────────
  readonly IDLE_FUEL_RATE_KG_H: number;
  readonly FUEL_RATE_PER_PCT_KG_H: number;
  readonly CO2_PER_KG_FUEL: number;
  readonly CO2_TEMP_COEFF_KG_H_PER_C: number;
  readonly CO2_REFERENCE_TEMP_C: number;

  // ───────── CLINKER QUALITY & RUN SUMMARY ─────────
  readonly QUALITY_GOOD_C: number;
  readonly QUALITY_PARTIAL_C: number;
  readonly SETPOINT_BAND_C: number;

  // ───────── EFFICIENCY ESTIMATE ─────────
  readonly BASELINE_FUEL_RATE_KG_H: number;
  readonly OPERATING_DAYS_PER_YEAR: number;
  readonly FUEL_PRICE_PER_TONNE: number;

  // ───────── KILN ROTATION (COSMETIC) ─────────
  readonly KILN_MOTOR_RPM: number;

  // ───────── PERFORMANCE ─────────
  readonly PERF_LOG_INTERVAL_SEC: number;
  readonly PERF_SLOW_TICK_THRESHOLD_MS: number;
  readonly PERF_WARN_SLOW_TICKS: boolean;

  // ───────── CONSOLE SETTINGS ─────────
  readonly CONSOLE_ENABLED: boolean;
  readonly CONSOLE_LOG_LEVEL: LogLevel;
  readonly CONSOLE_BUFFER_SIZE: number;
  readonly CONSOLE_INTERVAL_MS: number;

  // ───────── GLOBAL LOGGING SETTINGS ─────────
  readonly GLOBAL_LOG_LEVEL: LogLevel;
  readonly GLOBAL_LOG_AUTO_DEMOTE_HOURS: number;
}

/**
 * Application constants
 * Internal engine constants that should rarely change
 */
export interface KilnAppConstants {
  // ───────── LOGGING CONSTANTS ─────────
  readonly LOG_LEVELS: LogLevels;

  // ───────── DRIVER CONSTANTS ─────────
  readonly MAX_PENDING_COMMANDS: number;
  readonly DEBUG_STATUS_EVERY_TICKS: number;

  // ───────── PERFORMANCE CONSTANTS ─────────
  readonly INITIAL_TICK_TIME_MIN: number;
}

/**
 * Complete configuration (user settings + app constants)
 */
export type KilnConfig = KilnUserConfig & KilnAppConstants;
