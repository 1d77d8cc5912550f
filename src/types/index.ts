export type { Celsius, ControlMode, SimulationPhase } from './common';
export { CONTROL_MODES, isControlMode } from './common';
export type { KilnUserConfig, KilnAppConstants, KilnConfig } from './config';
export type { TimerAPI, TimerHandle } from './timer';
export {
  ValidationError,
  PlantConfigValidationError,
  ControllerConfigValidationError,
  EmissionsConfigValidationError,
  HistoryValidationError,
  KilnConfigValidationError
} from './errors';
