/**
 * Simulation state type definitions
 */

import type { ControlMode, SimulationPhase } from '$types/common';
import type { ControllerInternalState } from '@core/pid';

/**
 * One completed tick, as stored in the history
 */
export interface Sample {
  readonly tick: number;
  /** Simulated seconds at the end of the tick */
  readonly time: number;
  readonly temperature: number;
  readonly controlOutput: number;
  /** kg CO2/h */
  readonly emissionRate: number;
  readonly setpoint: number;
  readonly mode: ControlMode;
  /** Plant temperature was clamped this tick */
  readonly saturated: boolean;
  /** Controller output sat on a bound this tick */
  readonly outputSaturated: boolean;
}

/**
 * Read-only view of the driver handed to consumers
 */
export interface SimulationState {
  readonly time: number;
  readonly tick: number;
  readonly temperature: number;
  readonly controlOutput: number;
  readonly emissionRate: number;
  readonly mode: ControlMode;
  readonly running: boolean;
  readonly phase: SimulationPhase;
  readonly setpoint: number;
}

/**
 * Mutable state owned by the driver
 */
export interface DriverState {
  phase: SimulationPhase;
  /** Elapsed simulated seconds */
  time: number;
  /** Completed ticks */
  tick: number;
  temperature: number;
  controlOutput: number;
  emissionRate: number;
  controller: ControllerInternalState;
}
