/**
 * Annual savings estimate against a baseline fuel rate
 */

import type { EfficiencyEstimate, EfficiencyParameters } from './types';

const HOURS_PER_DAY = 24;
const KG_PER_TONNE = 1000;

/**
 * Extrapolate a run's average fuel rate to an operating year
 * @param averageFuelRateKgH - From the run summary
 */
export function estimateEfficiency(averageFuelRateKgH: number, params: EfficiencyParameters): EfficiencyEstimate {
  const annualFuelSavedKg = (params.baselineFuelRateKgH - averageFuelRateKgH) *
    params.operatingDaysPerYear * HOURS_PER_DAY;

  return {
    annualFuelSavedKg: annualFuelSavedKg,
    co2ReductionKg: annualFuelSavedKg * params.co2PerKgFuel,
    moneySaved: (annualFuelSavedKg / KG_PER_TONNE) * params.fuelPricePerTonne
  };
}

export function formatEfficiency(estimate: EfficiencyEstimate, params: EfficiencyParameters): string {
  return "Efficiency vs " + params.baselineFuelRateKgH + "kg/h baseline: fuel saved " +
    estimate.annualFuelSavedKg.toFixed(0) + "kg/yr, CO2 reduction " +
    estimate.co2ReductionKg.toFixed(0) + "kg/yr, money saved " +
    estimate.moneySaved.toFixed(2) + "/yr";
}
