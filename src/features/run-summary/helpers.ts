/**
 * Run summary helper functions
 */

import type { Sample } from '@system/state';
import type { KilnConfig } from '$types';

import type { RunSummaryOptions } from './types';

/**
 * Step covered by a sample whose predecessor is unknown
 *
 * Taken as the average step up to that sample, which is exact for a fixed dt
 * and for the first tick of a run.
 */
export function leadingStep(sample: Sample): number {
  return sample.tick > 0 ? sample.time / sample.tick : 0;
}

/**
 * Simulated seconds each sample covers
 *
 * The step before the first retained sample is not stored (older samples may
 * have been evicted), so it comes from leadingStep.
 */
export function sampleDurations(samples: readonly Sample[]): number[] {
  if (samples.length === 0) {
    return [];
  }
  const first = samples[0];
  let previousTime = first.time - leadingStep(first);
  return samples.map(function(sample) {
    const dt = sample.time - previousTime;
    previousTime = sample.time;
    return dt;
  });
}

/**
 * Summary options from the simulator configuration
 */
export function summaryOptionsFromConfig(config: KilnConfig): RunSummaryOptions {
  return {
    setpointBandC: config.SETPOINT_BAND_C,
    quality: { goodC: config.QUALITY_GOOD_C, partialC: config.QUALITY_PARTIAL_C },
    emissions: {
      idleFuelRateKgH: config.IDLE_FUEL_RATE_KG_H,
      fuelRatePerOutputKgH: config.FUEL_RATE_PER_PCT_KG_H,
      co2PerKgFuel: config.CO2_PER_KG_FUEL,
      temperatureCoefficient: config.CO2_TEMP_COEFF_KG_H_PER_C,
      referenceTemperature: config.CO2_REFERENCE_TEMP_C
    }
  };
}
