/**
 * Kiln thermal model: first-order lag toward an input-dependent equilibrium
 *
 *   dT/dt = (processGain * u + ambient - T) / timeConstant
 *
 * integrated with explicit Euler and clamped to [ambient, maxTemperature].
 */

import { clamp } from '@utils/number';

import type { PlantParameters, PlantStepResult } from './types';

/**
 * Steady-state temperature for a constant heat input
 * @param heatInput - Controller output in %
 * @returns Equilibrium in °C, clamped to the physical range
 */
export function equilibriumTemperature(heatInput: number, params: PlantParameters): number {
  return clamp(
    params.processGain * heatInput + params.ambientTemperature,
    params.ambientTemperature,
    params.maxTemperature
  );
}

/**
 * Advance the kiln temperature by one step
 *
 * A clamp is reported through `saturated`; it is never an error.
 *
 * @param current - Current temperature in °C
 * @param heatInput - Controller output in %
 * @param dt - Step length in seconds
 * @param params - Plant parameters (validated at construction)
 */
export function advanceTemperature(
  current: number,
  heatInput: number,
  dt: number,
  params: PlantParameters
): PlantStepResult {
  const target = params.processGain * heatInput + params.ambientTemperature;
  const unclamped = current + dt * ((target - current) / params.timeConstantSec);
  const temperature = clamp(unclamped, params.ambientTemperature, params.maxTemperature);

  return {
    temperature: temperature,
    saturated: temperature !== unclamped,
    unclamped: unclamped
  };
}
