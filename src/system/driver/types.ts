/**
 * Simulation driver type definitions
 */

import type { ControlMode, SimulationPhase } from '$types/common';
import type { ControllerConfig, OutputBounds, PidGains } from '@core/pid';
import type { PlantParameters } from '@core/plant';
import type { EmissionsParameters } from '@core/emissions';
import type { KilnEventListener, KilnEventName } from '@events/types';
import type { Logger } from '@logging';
import type { Sample, SimulationState } from '@system/state';

/**
 * Everything fixed at driver construction
 */
export interface DriverOptions {
  /** Initial (and default) controller configuration */
  controller: ControllerConfig;
  plant: PlantParameters;
  emissions: EmissionsParameters;
  /** Temperature restored on reset, °C */
  initialTemperature: number;
  historyCapacity: number;
  /** Commands issued during a tick beyond this count are refused */
  maxPendingCommands: number;
  /** Emit a DEBUG status line every N ticks (0 disables) */
  debugStatusEveryTicks: number;
}

export interface DriverDependencies {
  logger: Logger;
}

/**
 * Partial controller update; nested gains and bounds may be partial too
 */
export interface ControllerConfigPatch {
  setpoint?: number;
  gains?: Partial<PidGains>;
  outputBounds?: Partial<OutputBounds>;
  manualOutput?: number;
  mode?: ControlMode;
}

export interface ResetOptions {
  /** Also restore the controller configuration given at construction */
  restoreDefaultConfig?: boolean;
}

export type TickCondition = 'SATURATION' | 'INVALID_CONFIG' | 'NO_OP_NOT_RUNNING' | 'NO_OP_BUSY';

export interface TickSuccess {
  ok: true;
  sample: Sample;
  /** SATURATION when the plant temperature was clamped this tick */
  condition: 'SATURATION' | null;
}

export interface TickFailure {
  ok: false;
  condition: Exclude<TickCondition, 'SATURATION'>;
  message: string;
}

export type TickResult = TickSuccess | TickFailure;

/**
 * Outcome of a lifecycle command
 * - APPLIED: took effect now
 * - DEFERRED: queued until the running tick finishes
 * - NO_OP: not valid in the current phase (e.g. stop while IDLE)
 * - QUEUE_FULL: refused, too many commands pending
 */
export type CommandStatus = 'APPLIED' | 'DEFERRED' | 'NO_OP' | 'QUEUE_FULL';

export type ConfigUpdateResult =
  | { ok: true; deferred: boolean; config: ControllerConfig }
  | { ok: false; condition: 'INVALID_CONFIG' | 'QUEUE_FULL'; errors: string[] };

/**
 * Commands waiting for the current tick to finish
 */
export type DriverCommand =
  | { type: 'start' }
  | { type: 'stop' }
  | { type: 'reset'; options: ResetOptions }
  | { type: 'configure'; patch: ControllerConfigPatch };

export interface SimulationDriver {
  start(): CommandStatus;
  stop(): CommandStatus;
  reset(options?: ResetOptions): CommandStatus;
  setConfig(patch: ControllerConfigPatch): ConfigUpdateResult;
  /** Advance the simulation by dt seconds */
  tick(dt: number): TickResult;
  currentState(): SimulationState;
  history(): readonly Sample[];
  latestSample(): Sample | null;
  getConfig(): ControllerConfig;
  getPhase(): SimulationPhase;
  /** Commands waiting for the current tick to end */
  pendingCommands(): number;
  on<K extends KilnEventName>(event: K, listener: KilnEventListener<K>): void;
  off<K extends KilnEventName>(event: K, listener: KilnEventListener<K>): void;
}
