/**
 * User configuration validation
 *
 * Field checks first, then cross-field rules. A cross-field rule only runs
 * when every field it reads passed its own check, so one bad value produces
 * one error.
 */

import type { KilnUserConfig } from '$types';
import { CONTROL_MODES } from '$types/common';
import { KilnConfigValidationError } from '$types/errors';

import { checkBoolean, checkOneOf, checkRange, createIssueCollector } from './helpers';
import type { FieldRange, IssueCollector, UncheckedUserConfig, ValidationResult } from './types';

type NumericField = {
  [K in keyof KilnUserConfig]: KilnUserConfig[K] extends number ? K : never
}[keyof KilnUserConfig];

const LOG_LEVEL_VALUES: readonly number[] = [0, 1, 2, 3];

/**
 * Hard limits (errors) and recommended bands (warnings), in report order
 */
const FIELD_RANGES: ReadonlyArray<readonly [NumericField, FieldRange]> = [
  // Controller
  ['SETPOINT_C', { min: 0, max: 3000, recommended: [1350, 1450] }],
  ['KP', { min: 0, max: 1000, recommended: [0.1, 10] }],
  ['KI', { min: 0, max: 1000, recommended: [0, 1] }],
  ['KD', { min: 0, max: 1000, recommended: [0, 100] }],
  ['OUTPUT_MIN_PCT', { min: 0, max: 100 }],
  ['OUTPUT_MAX_PCT', { min: 0, max: 100 }],
  ['MANUAL_OUTPUT_PCT', { min: 0, max: 100 }],

  // Plant
  ['INITIAL_TEMPERATURE_C', { min: -40, max: 3000 }],
  ['AMBIENT_TEMPERATURE_C', { min: -40, max: 60, recommended: [0, 40] }],
  ['PLANT_TIME_CONSTANT_SEC', { min: 1, max: 86400, recommended: [300, 1800] }],
  ['PLANT_PROCESS_GAIN_C_PER_PCT', { min: 0.01, max: 100 }],
  ['MAX_TEMPERATURE_C', { min: 100, max: 3000 }],

  // Clock
  ['TICK_DT_SEC', { min: 0.001, max: 3600 }],
  ['TICK_PERIOD_MS', { min: 10, max: 60000, recommended: [50, 1000], integer: true }],
  ['HISTORY_CAPACITY', { min: 1, max: 1000000, recommended: [60, 100000], integer: true }],

  // Emissions
  ['IDLE_FUEL_RATE_KG_H', { min: 0, max: 100000 }],
  ['FUEL_RATE_PER_PCT_KG_H', { min: 0, max: 10000 }],
  ['CO2_PER_KG_FUEL', { min: 0, max: 10, recommended: [2, 4] }],
  ['CO2_TEMP_COEFF_KG_H_PER_C', { min: 0, max: 100 }],
  ['CO2_REFERENCE_TEMP_C', { min: -40, max: 3000 }],

  // Reporting
  ['QUALITY_GOOD_C', { min: 0, max: 3000 }],
  ['QUALITY_PARTIAL_C', { min: 0, max: 3000 }],
  ['SETPOINT_BAND_C', { min: 0.1, max: 500, recommended: [5, 50] }],
  ['BASELINE_FUEL_RATE_KG_H', { min: 1, max: 100000 }],
  ['OPERATING_DAYS_PER_YEAR', { min: 1, max: 366, integer: true }],
  ['FUEL_PRICE_PER_TONNE', { min: 0, max: 1000000 }],
  ['KILN_MOTOR_RPM', { min: 0.01, max: 10, recommended: [1, 5] }],

  // Performance
  ['PERF_LOG_INTERVAL_SEC', { min: 1, max: 86400 }],
  ['PERF_SLOW_TICK_THRESHOLD_MS', { min: 1, max: 10000 }],

  // Logging
  ['CONSOLE_BUFFER_SIZE', { min: 10, max: 10000, integer: true }],
  ['CONSOLE_INTERVAL_MS', { min: 1, max: 1000 }],
  ['GLOBAL_LOG_AUTO_DEMOTE_HOURS', { min: 0, max: 720 }]
];

function checkCrossFieldRules(issues: IssueCollector, passed: (field: NumericField) => number | null): void {
  const outMin = passed('OUTPUT_MIN_PCT');
  const outMax = passed('OUTPUT_MAX_PCT');
  const manual = passed('MANUAL_OUTPUT_PCT');
  if (outMin !== null && outMax !== null) {
    if (outMin > outMax) {
      issues.error('OUTPUT_MIN_PCT', "OUTPUT_MIN_PCT must not exceed OUTPUT_MAX_PCT");
    } else if (manual !== null && (manual < outMin || manual > outMax)) {
      issues.warning('MANUAL_OUTPUT_PCT', "MANUAL_OUTPUT_PCT is outside the output bounds and will be clamped");
    }
  }

  const ambient = passed('AMBIENT_TEMPERATURE_C');
  const ceiling = passed('MAX_TEMPERATURE_C');
  const initial = passed('INITIAL_TEMPERATURE_C');
  const setpoint = passed('SETPOINT_C');
  if (ambient !== null && ceiling !== null) {
    if (ceiling <= ambient) {
      issues.error('MAX_TEMPERATURE_C', "MAX_TEMPERATURE_C must be above AMBIENT_TEMPERATURE_C");
    } else {
      if (initial !== null && (initial < ambient || initial > ceiling)) {
        issues.error('INITIAL_TEMPERATURE_C', "INITIAL_TEMPERATURE_C must be between AMBIENT_TEMPERATURE_C and MAX_TEMPERATURE_C");
      }
      if (setpoint !== null && (setpoint < ambient || setpoint > ceiling)) {
        issues.error('SETPOINT_C', "SETPOINT_C must be between AMBIENT_TEMPERATURE_C and MAX_TEMPERATURE_C");
      }
    }
  }

  const dt = passed('TICK_DT_SEC');
  const tau = passed('PLANT_TIME_CONSTANT_SEC');
  if (dt !== null && tau !== null) {
    if (dt >= tau) {
      issues.error('TICK_DT_SEC', "TICK_DT_SEC must be smaller than PLANT_TIME_CONSTANT_SEC");
    } else if (dt > tau / 100) {
      issues.warning('TICK_DT_SEC', "TICK_DT_SEC is more than 1% of PLANT_TIME_CONSTANT_SEC; integration will be coarse");
    }
  }

  // Steady state at full output is ambient + gain * OUTPUT_MAX
  const gain = passed('PLANT_PROCESS_GAIN_C_PER_PCT');
  if (gain !== null && ambient !== null && outMax !== null && setpoint !== null &&
      gain * outMax + ambient < setpoint) {
    issues.warning('SETPOINT_C', "SETPOINT_C is above what full output can reach");
  }

  const good = passed('QUALITY_GOOD_C');
  const partial = passed('QUALITY_PARTIAL_C');
  if (good !== null && partial !== null && partial >= good) {
    issues.error('QUALITY_PARTIAL_C', "QUALITY_PARTIAL_C must be below QUALITY_GOOD_C");
  }

  const period = passed('TICK_PERIOD_MS');
  const slow = passed('PERF_SLOW_TICK_THRESHOLD_MS');
  if (period !== null && slow !== null && slow >= period) {
    issues.warning('PERF_SLOW_TICK_THRESHOLD_MS', "PERF_SLOW_TICK_THRESHOLD_MS is not below TICK_PERIOD_MS");
  }
}

/**
 * Validate a user configuration
 *
 * Accepts values of any type per field, so configurations assembled from
 * flags or JSON can be checked before they are trusted.
 */
export function validateConfig(config: UncheckedUserConfig): ValidationResult {
  const issues = createIssueCollector();
  const numbers = new Map<NumericField, number>();

  for (const [field, range] of FIELD_RANGES) {
    const value = checkRange(issues, field, config[field], range);
    if (value !== null) numbers.set(field, value);
  }

  checkOneOf(issues, 'INITIAL_MODE', config.INITIAL_MODE, CONTROL_MODES);
  checkBoolean(issues, 'PERF_WARN_SLOW_TICKS', config.PERF_WARN_SLOW_TICKS);
  checkBoolean(issues, 'CONSOLE_ENABLED', config.CONSOLE_ENABLED);
  checkOneOf(issues, 'CONSOLE_LOG_LEVEL', config.CONSOLE_LOG_LEVEL, LOG_LEVEL_VALUES);
  checkOneOf(issues, 'GLOBAL_LOG_LEVEL', config.GLOBAL_LOG_LEVEL, LOG_LEVEL_VALUES);

  checkCrossFieldRules(issues, function(field) { return numbers.get(field) ?? null; });

  return issues.result();
}

/**
 * Validate and throw when the configuration cannot be used
 *
 * For callers that build a configuration programmatically (CLI flags) and
 * have no use for a partial result.
 *
 * @returns The result, so warnings can still be shown
 * @throws {KilnConfigValidationError} Listing every error, joined by "; "
 */
export function assertValidConfig(config: UncheckedUserConfig): ValidationResult {
  const result = validateConfig(config);
  if (!result.valid) {
    throw new KilnConfigValidationError(result.errors.map(function(issue) { return issue.message; }).join('; '));
  }
  return result;
}
