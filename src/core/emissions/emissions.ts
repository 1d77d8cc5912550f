/**
 * CO2 emission rate derived from control effort and kiln temperature
 */

import type { EmissionsParameters } from './types';

/**
 * Fuel feed implied by a controller output
 * @param controlOutput - Controller output in % (negative treated as 0)
 * @returns Fuel rate in kg/h
 */
export function fuelRateForOutput(controlOutput: number, params: EmissionsParameters): number {
  return params.idleFuelRateKgH + params.fuelRatePerOutputKgH * Math.max(0, controlOutput);
}

/**
 * Estimate the CO2 emission rate for the current tick
 *
 *   co2 = fuel(output) * co2PerKgFuel + tempCoeff * max(0, T - reference)
 *
 * @param controlOutput - Controller output in %
 * @param temperature - Kiln temperature in °C
 * @returns Emission rate in kg CO2/h, never negative
 */
export function estimateEmissions(
  controlOutput: number,
  temperature: number,
  params: EmissionsParameters
): number {
  const combustion = fuelRateForOutput(controlOutput, params) * params.co2PerKgFuel;
  const thermal = params.temperatureCoefficient * Math.max(0, temperature - params.referenceTemperature);
  return combustion + thermal;
}
