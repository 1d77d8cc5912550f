/**
 * Event types published by the simulation driver
 *
 * The driver is the only producer. Consumers (CLI runner, WebSocket server,
 * tests) subscribe through driver.on(); a listener may issue commands, which
 * the driver queues until the current tick has finished.
 */

import type { ControlMode, SimulationPhase } from '$types/common';
import type { ControllerConfig } from '@core/pid';
import type { Sample, SimulationState } from '@system/state';

/**
 * Emitted once per successful tick
 */
export interface KilnSampleEvent {
  sample: Sample;
  state: SimulationState;
}

/**
 * Conditions worth surfacing that do not stop the simulation
 */
export type KilnConditionType = 'SATURATION' | 'INVALID_CONFIG';

export interface KilnConditionEvent {
  condition: KilnConditionType;
  message: string;
  tick: number;
  time: number;
}

/**
 * Emitted on every phase transition (and on reset, even from IDLE)
 */
export interface KilnLifecycleEvent {
  type: 'started' | 'stopped' | 'reset';
  phase: SimulationPhase;
  time: number;
}

/**
 * Emitted after a configuration patch has been accepted
 */
export interface KilnConfigEvent {
  config: ControllerConfig;
  /** Mode before the patch, to spot MANUAL/AUTO switches */
  previousMode: ControlMode;
}

/**
 * Event names used with driver.on()
 */
export const EVENT_NAMES = {
  SAMPLE: 'kiln_sample',
  CONDITION: 'kiln_condition',
  LIFECYCLE: 'kiln_lifecycle',
  CONFIG: 'kiln_config'
} as const;

/**
 * Payload type for each event name
 */
export interface KilnEventMap {
  kiln_sample: KilnSampleEvent;
  kiln_condition: KilnConditionEvent;
  kiln_lifecycle: KilnLifecycleEvent;
  kiln_config: KilnConfigEvent;
}

export type KilnEventName = keyof KilnEventMap;

export type KilnEventListener<K extends KilnEventName> = (payload: KilnEventMap[K]) => void;
