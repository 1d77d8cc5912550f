/**
 * PID controller type definitions
 */

import type { ControlMode } from '$types/common';

export interface PidGains {
  kp: number;
  ki: number;
  kd: number;
}

/**
 * Output limits in % of heat input
 */
export interface OutputBounds {
  min: number;
  max: number;
}

/**
 * Operator-editable controller configuration
 */
export interface ControllerConfig {
  /** Target kiln temperature in °C */
  setpoint: number;
  gains: PidGains;
  outputBounds: OutputBounds;
  /** Output applied in MANUAL mode (clamped to outputBounds) */
  manualOutput: number;
  mode: ControlMode;
}

/**
 * Controller memory carried from one tick to the next
 */
export interface ControllerInternalState {
  /** Accumulated error·seconds */
  integral: number;

  /** Error seen by the previous AUTO computation */
  previousError: number;

  /** Mode of the previous computation; null until the first one after reset */
  lastMode: ControlMode | null;
}

/**
 * Individual contributions to the raw output
 */
export interface PidTerms {
  proportional: number;
  integral: number;
  derivative: number;
}

export interface PidComputeSuccess {
  ok: true;
  /** Output after clamping to outputBounds */
  output: number;
  /** Output before clamping */
  rawOutput: number;
  /** True when the output sits on a bound because of the clamp */
  saturated: boolean;
  terms: PidTerms;
  /** Error used for this computation (setpoint - measured) */
  error: number;
  state: ControllerInternalState;
}

export interface PidComputeFailure {
  ok: false;
  condition: 'INVALID_CONFIG';
  message: string;
}

export type PidComputeResult = PidComputeSuccess | PidComputeFailure;
