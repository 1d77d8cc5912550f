/**
 * Emissions helper functions
 */

import { EmissionsConfigValidationError } from '$types/errors';
import { isFiniteNumber } from '@utils/number';

import type { EmissionsParameters } from './types';

/**
 * Validate emissions parameters
 *
 * Every rate and coefficient must be finite and non-negative so the
 * estimate never goes negative and never decreases with output or temperature.
 *
 * @throws {EmissionsConfigValidationError} If any parameter is invalid
 */
export function validateEmissionsParameters(params: EmissionsParameters): void {
  const nonNegative: Array<[string, number]> = [
    ['idleFuelRateKgH', params.idleFuelRateKgH],
    ['fuelRatePerOutputKgH', params.fuelRatePerOutputKgH],
    ['co2PerKgFuel', params.co2PerKgFuel],
    ['temperatureCoefficient', params.temperatureCoefficient]
  ];

  for (const [name, value] of nonNegative) {
    if (!isFiniteNumber(value) || value < 0) {
      throw new EmissionsConfigValidationError(
        name + " must be a non-negative finite number, got " + value
      );
    }
  }

  if (!isFiniteNumber(params.referenceTemperature)) {
    throw new EmissionsConfigValidationError(
      "referenceTemperature must be a finite number, got " + params.referenceTemperature
    );
  }
}
