/**
 * Emissions model type definitions
 *
 * A configurable approximation, not combustion chemistry.
 */

export interface EmissionsParameters {
  /** Fuel burned at zero output, kg/h */
  idleFuelRateKgH: number;

  /** Additional fuel per % of controller output, kg/h */
  fuelRatePerOutputKgH: number;

  /** CO2 released per kg of fuel, kg/kg */
  co2PerKgFuel: number;

  /** Extra CO2 per °C above the reference temperature, kg/h per °C */
  temperatureCoefficient: number;

  /** Temperature below which no thermal term is added, °C */
  referenceTemperature: number;
}
