export { estimateEmissions, fuelRateForOutput } from './emissions';
export { validateEmissionsParameters } from './helpers';
export type { EmissionsParameters } from './types';
