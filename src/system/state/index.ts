export { createInitialState, toSnapshot } from './state';
export type { Sample, SimulationState, DriverState } from './types';
