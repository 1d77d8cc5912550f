export { createSimulationDriver } from './driver';
export {
  applyConfigPatch,
  buildDriverOptions,
  cloneControllerConfig,
  freezeControllerConfig,
  formatSampleStatus
} from './helpers';
export type {
  DriverOptions,
  DriverDependencies,
  ControllerConfigPatch,
  ResetOptions,
  TickCondition,
  TickSuccess,
  TickFailure,
  TickResult,
  CommandStatus,
  ConfigUpdateResult,
  DriverCommand,
  SimulationDriver
} from './types';
