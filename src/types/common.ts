/**
 * Common type definitions used throughout the project
 */

/**
 * Temperature in degrees Celsius
 */
export type Celsius = number;

/**
 * Controller operating mode
 * - AUTO: PID computes the output from setpoint and measured temperature
 * - MANUAL: operator-supplied output is applied verbatim (clamped)
 */
export type ControlMode = 'AUTO' | 'MANUAL';

/**
 * Driver lifecycle phase. Reset is a transition back to IDLE, not a phase.
 */
export type SimulationPhase = 'IDLE' | 'RUNNING' | 'STOPPED';

export const CONTROL_MODES: readonly ControlMode[] = ['AUTO', 'MANUAL'];

/**
 * Type guard for ControlMode values arriving from untyped input
 */
export function isControlMode(value: unknown): value is ControlMode {
  return value === 'AUTO' || value === 'MANUAL';
}
