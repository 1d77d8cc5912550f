/**
 * PID controller helper functions
 */

import { ControllerConfigValidationError } from '$types/errors';
import { isControlMode } from '$types/common';
import { isFiniteNumber } from '@utils/number';

import type { ControllerConfig, ControllerInternalState } from './types';

/**
 * Fresh controller memory (after construction or reset)
 */
export function createControllerState(): ControllerInternalState {
  return {
    integral: 0,
    previousError: 0,
    lastMode: null
  };
}

/**
 * Collect every problem with a controller configuration
 * @returns Human-readable issues, empty when the config is usable
 */
export function validateControllerConfig(config: ControllerConfig): string[] {
  const issues: string[] = [];

  if (!isFiniteNumber(config.setpoint)) {
    issues.push("setpoint must be a finite number, got " + config.setpoint);
  }

  const gains: Array<[string, number]> = [
    ['kp', config.gains.kp],
    ['ki', config.gains.ki],
    ['kd', config.gains.kd]
  ];
  for (const [name, value] of gains) {
    if (!isFiniteNumber(value) || value < 0) {
      issues.push(name + " must be a non-negative finite number, got " + value);
    }
  }

  const min = config.outputBounds.min;
  const max = config.outputBounds.max;
  if (!isFiniteNumber(min) || !isFiniteNumber(max)) {
    issues.push("outputBounds must be finite, got [" + min + ", " + max + "]");
  } else if (min > max) {
    issues.push("outputBounds.min (" + min + ") must not exceed outputBounds.max (" + max + ")");
  }

  if (!isFiniteNumber(config.manualOutput)) {
    issues.push("manualOutput must be a finite number, got " + config.manualOutput);
  }

  if (!isControlMode(config.mode)) {
    issues.push("mode must be AUTO or MANUAL, got " + String(config.mode));
  }

  return issues;
}

/**
 * Validate a controller configuration at construction time
 * @throws {ControllerConfigValidationError} If the configuration is unusable
 */
export function assertControllerConfig(config: ControllerConfig): void {
  const issues = validateControllerConfig(config);
  if (issues.length > 0) {
    throw new ControllerConfigValidationError(issues.join('; '));
  }
}
