/**
 * State management functions for the simulation driver
 */

import { createControllerState } from '@core/pid';
import type { ControllerConfig } from '@core/pid';

import type { DriverState, SimulationState } from './types';

export * from './types';

/**
 * Create the state the driver starts from (and returns to on reset)
 *
 * Output and emission rate start at zero: nothing has been computed yet.
 *
 * @param initialTemperature - Kiln temperature at time zero, °C
 * @returns Fresh IDLE state with empty controller memory
 */
export function createInitialState(initialTemperature: number): DriverState {
  return {
    phase: 'IDLE',
    time: 0,
    tick: 0,
    temperature: initialTemperature,
    controlOutput: 0,
    emissionRate: 0,
    controller: createControllerState()
  };
}

/**
 * Frozen snapshot of the driver state for consumers
 */
export function toSnapshot(state: DriverState, config: ControllerConfig): SimulationState {
  return Object.freeze({
    time: state.time,
    tick: state.tick,
    temperature: state.temperature,
    controlOutput: state.controlOutput,
    emissionRate: state.emissionRate,
    mode: config.mode,
    running: state.phase === 'RUNNING',
    phase: state.phase,
    setpoint: config.setpoint
  });
}
