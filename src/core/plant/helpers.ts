/**
 * Plant model helper functions
 */

import { PlantConfigValidationError } from '$types/errors';
import { isFiniteNumber } from '@utils/number';

import type { PlantParameters } from './types';

/**
 * Validate plant parameters
 * @throws {PlantConfigValidationError} If any parameter is invalid
 */
export function validatePlantParameters(params: PlantParameters): void {
  if (!isFiniteNumber(params.timeConstantSec) || params.timeConstantSec <= 0) {
    throw new PlantConfigValidationError(
      "timeConstantSec must be a positive finite number, got " + params.timeConstantSec
    );
  }
  if (!isFiniteNumber(params.processGain) || params.processGain <= 0) {
    throw new PlantConfigValidationError(
      "processGain must be a positive finite number, got " + params.processGain
    );
  }
  if (!isFiniteNumber(params.ambientTemperature)) {
    throw new PlantConfigValidationError(
      "ambientTemperature must be a finite number, got " + params.ambientTemperature
    );
  }
  if (!isFiniteNumber(params.maxTemperature) || params.maxTemperature <= params.ambientTemperature) {
    throw new PlantConfigValidationError(
      "maxTemperature (" + params.maxTemperature + ") must be finite and above ambientTemperature (" +
      params.ambientTemperature + ")"
    );
  }
}
