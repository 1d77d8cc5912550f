/**
 * Efficiency estimate helper functions
 */

import type { KilnConfig } from '$types';

import type { EfficiencyParameters } from './types';

export function efficiencyParametersFromConfig(config: KilnConfig): EfficiencyParameters {
  return {
    baselineFuelRateKgH: config.BASELINE_FUEL_RATE_KG_H,
    operatingDaysPerYear: config.OPERATING_DAYS_PER_YEAR,
    fuelPricePerTonne: config.FUEL_PRICE_PER_TONNE,
    co2PerKgFuel: config.CO2_PER_KG_FUEL
  };
}
