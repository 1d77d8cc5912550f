/**
 * Discrete PID controller with conditional-integration anti-windup
 *
 * Pure function: the caller owns ControllerInternalState and passes it back
 * on the next tick. Mode handling:
 * - MANUAL: output = clamp(manualOutput); integral and previous error frozen
 * - MANUAL -> AUTO: previous error reseeded, integral back-calculated so the
 *   first AUTO output equals the manual output (bumpless transfer)
 * - first AUTO tick after reset: previous error seeded, no derivative kick
 */

import { clamp, isFiniteNumber } from '@utils/number';

import { validateControllerConfig } from './helpers';
import type { ControllerConfig, ControllerInternalState, PidComputeResult } from './types';

/**
 * Compute the controller output for one tick
 *
 * @param setpoint - Target temperature in °C
 * @param measured - Current kiln temperature in °C
 * @param dt - Tick length in seconds (must be > 0)
 * @param config - Controller configuration (gains, bounds, mode)
 * @param state - Memory from the previous tick (not mutated)
 * @returns Output with the next state, or INVALID_CONFIG
 */
export function computeControl(
  setpoint: number,
  measured: number,
  dt: number,
  config: ControllerConfig,
  state: ControllerInternalState
): PidComputeResult {
  const issues = validateControllerConfig(config);
  if (!isFiniteNumber(dt) || dt <= 0) {
    issues.unshift("dt must be a positive finite number, got " + dt);
  }
  if (!isFiniteNumber(setpoint) || !isFiniteNumber(measured)) {
    issues.push("setpoint and measured temperature must be finite, got " + setpoint + " / " + measured);
  }
  if (issues.length > 0) {
    return { ok: false, condition: 'INVALID_CONFIG', message: issues.join('; ') };
  }

  const { kp, ki, kd } = config.gains;
  const { min, max } = config.outputBounds;
  const error = setpoint - measured;
  const manualOutput = clamp(config.manualOutput, min, max);

  if (config.mode === 'MANUAL') {
    return {
      ok: true,
      output: manualOutput,
      rawOutput: config.manualOutput,
      saturated: manualOutput !== config.manualOutput,
      terms: { proportional: 0, integral: 0, derivative: 0 },
      error: error,
      state: {
        integral: state.integral,
        previousError: state.previousError,
        lastMode: 'MANUAL'
      }
    };
  }

  let integral = state.integral;
  let derivative = 0;

  if (state.lastMode === 'MANUAL') {
    // Bumpless transfer: kp*e + ki*I == manual output, no accumulation this tick
    integral = ki !== 0 ? (manualOutput - kp * error) / ki : 0;
  } else {
    if (state.lastMode === 'AUTO') {
      derivative = (error - state.previousError) / dt;
    }

    // Conditional integration: hold the integral while the output is already
    // past a bound and the error would push it further out
    const heldRaw = kp * error + ki * integral + kd * derivative;
    const windingUp = (heldRaw > max && error > 0) || (heldRaw < min && error < 0);
    if (!windingUp) {
      integral = integral + error * dt;
    }
  }

  const terms = {
    proportional: kp * error,
    integral: ki * integral,
    derivative: kd * derivative
  };
  const rawOutput = terms.proportional + terms.integral + terms.derivative;
  const output = clamp(rawOutput, min, max);

  return {
    ok: true,
    output: output,
    rawOutput: rawOutput,
    saturated: output !== rawOutput,
    terms: terms,
    error: error,
    state: {
      integral: integral,
      previousError: error,
      lastMode: 'AUTO'
    }
  };
}
