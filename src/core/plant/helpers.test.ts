import { PlantConfigValidationError } from '$types/errors';

import { validatePlantParameters } from './helpers';
import type { PlantParameters } from './types';

describe('plant helpers', () => {
  const valid: PlantParameters = {
    timeConstantSec: 600,
    ambientTemperature: 20,
    processGain: 15,
    maxTemperature: 1600
  };

  describe('validatePlantParameters', () => {
    it('should accept valid parameters', () => {
      expect(() => validatePlantParameters(valid)).not.toThrow();
    });

    it('should reject a non-positive time constant', () => {
      expect(() => validatePlantParameters({ ...valid, timeConstantSec: 0 }))
        .toThrow("timeConstantSec must be a positive finite number, got 0");
    });

    it('should reject a non-positive process gain', () => {
      expect(() => validatePlantParameters({ ...valid, processGain: -1 }))
        .toThrow(PlantConfigValidationError);
    });

    it('should reject a non-finite ambient temperature', () => {
      expect(() => validatePlantParameters({ ...valid, ambientTemperature: Number.NaN }))
        .toThrow("ambientTemperature must be a finite number, got NaN");
    });

    it('should reject a maximum at or below ambient', () => {
      expect(() => validatePlantParameters({ ...valid, maxTemperature: 20 }))
        .toThrow("maxTemperature (20) must be finite and above ambientTemperature (20)");
    });
  });
});
