export { advanceTemperature, equilibriumTemperature } from './plant';
export { validatePlantParameters } from './helpers';
export type { PlantParameters, PlantStepResult } from './types';
