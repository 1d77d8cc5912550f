import { ControllerConfigValidationError } from '$types/errors';

import { assertControllerConfig, createControllerState, validateControllerConfig } from './helpers';
import type { ControllerConfig } from './types';

describe('pid helpers', () => {
  const valid: ControllerConfig = {
    setpoint: 1350,
    gains: { kp: 1, ki: 0.1, kd: 0 },
    outputBounds: { min: 0, max: 100 },
    manualOutput: 50,
    mode: 'AUTO'
  };

  describe('createControllerState', () => {
    it('should start with empty memory and no previous mode', () => {
      expect(createControllerState()).toEqual({ integral: 0, previousError: 0, lastMode: null });
    });
  });

  describe('validateControllerConfig', () => {
    it('should return no issues for a valid config', () => {
      expect(validateControllerConfig(valid)).toEqual([]);
    });

    it('should list every problem', () => {
      const issues = validateControllerConfig({
        ...valid,
        setpoint: Number.POSITIVE_INFINITY,
        gains: { kp: 1, ki: -0.5, kd: 0 },
        manualOutput: Number.NaN
      });

      expect(issues).toEqual([
        'setpoint must be a finite number, got Infinity',
        'ki must be a non-negative finite number, got -0.5',
        'manualOutput must be a finite number, got NaN'
      ]);
    });

    it('should accept equal output bounds', () => {
      expect(validateControllerConfig({ ...valid, outputBounds: { min: 30, max: 30 } })).toEqual([]);
    });

    it('should reject non-finite output bounds', () => {
      expect(validateControllerConfig({ ...valid, outputBounds: { min: 0, max: Number.NaN } }))
        .toEqual(['outputBounds must be finite, got [0, NaN]']);
    });
  });

  describe('assertControllerConfig', () => {
    it('should throw a typed error joining the issues', () => {
      const config: ControllerConfig = { ...valid, outputBounds: { min: 90, max: 10 } };

      expect(() => assertControllerConfig(config)).toThrow(ControllerConfigValidationError);
      expect(() => assertControllerConfig(config))
        .toThrow('outputBounds.min (90) must not exceed outputBounds.max (10)');
    });

    it('should not throw for a valid config', () => {
      expect(() => assertControllerConfig(valid)).not.toThrow();
    });
  });
});
