/**
 * Plant (kiln thermal) model type definitions
 */

/**
 * Fixed physical parameters of the kiln for one run
 */
export interface PlantParameters {
  /** First-order lag time constant in seconds */
  timeConstantSec: number;

  /** Ambient temperature in °C, also the lower clamp */
  ambientTemperature: number;

  /** Steady-state temperature rise per % of heat input, °C/% */
  processGain: number;

  /** Upper physical limit in °C */
  maxTemperature: number;
}

/**
 * Result of one integration step
 */
export interface PlantStepResult {
  /** New temperature after clamping */
  temperature: number;

  /** True when the clamp changed the integrated value */
  saturated: boolean;

  /** Integrated value before clamping */
  unclamped: number;
}
