import { EmissionsConfigValidationError } from '$types/errors';

import { validateEmissionsParameters } from './helpers';
import type { EmissionsParameters } from './types';

describe('emissions helpers', () => {
  const valid: EmissionsParameters = {
    idleFuelRateKgH: 100,
    fuelRatePerOutputKgH: 9,
    co2PerKgFuel: 3.17,
    temperatureCoefficient: 0.05,
    referenceTemperature: 20
  };

  it('should accept valid parameters', () => {
    expect(() => validateEmissionsParameters(valid)).not.toThrow();
  });

  it('should reject a negative coefficient', () => {
    expect(() => validateEmissionsParameters({ ...valid, co2PerKgFuel: -1 }))
      .toThrow('co2PerKgFuel must be a non-negative finite number, got -1');
  });

  it('should reject a non-finite reference temperature', () => {
    expect(() => validateEmissionsParameters({ ...valid, referenceTemperature: Number.NaN }))
      .toThrow(EmissionsConfigValidationError);
  });
});
