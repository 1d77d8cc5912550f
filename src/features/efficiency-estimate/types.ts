export interface EfficiencyParameters {
  /** Fuel rate of the uncontrolled reference kiln (BASELINE_FUEL_RATE_KG_H) */
  baselineFuelRateKgH: number;
  /** OPERATING_DAYS_PER_YEAR */
  operatingDaysPerYear: number;
  /** Currency units per tonne of fuel (FUEL_PRICE_PER_TONNE) */
  fuelPricePerTonne: number;
  /** kg CO2 per kg fuel (CO2_PER_KG_FUEL) */
  co2PerKgFuel: number;
}

/**
 * Annualised comparison against the baseline. Negative values mean the run
 * burned more fuel than the baseline.
 */
export interface EfficiencyEstimate {
  annualFuelSavedKg: number;
  co2ReductionKg: number;
  moneySaved: number;
}
