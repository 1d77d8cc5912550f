export { computeControl } from './pid';
export { createControllerState, validateControllerConfig, assertControllerConfig } from './helpers';
export type {
  PidGains,
  OutputBounds,
  ControllerConfig,
  ControllerInternalState,
  PidTerms,
  PidComputeSuccess,
  PidComputeFailure,
  PidComputeResult
} from './types';
