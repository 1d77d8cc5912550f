/**
 * Tests for configuration validator
 */

import { USER_CONFIG } from '@boot/config';
import type { KilnUserConfig } from '$types';
import { KilnConfigValidationError } from '$types/errors';

import { assertValidConfig, validateConfig } from './validator';

const validConfig: KilnUserConfig = { ...USER_CONFIG };

function fields(issues: ReadonlyArray<{ field: string }>): string[] {
  return issues.map(function(issue) { return issue.field; });
}

describe('validateConfig', () => {
  describe('valid configuration', () => {
    it('should accept the shipped defaults without errors or warnings', () => {
      const result = validateConfig(validConfig);

      expect(result.valid).toBe(true);
      expect(result.errors).toHaveLength(0);
      expect(result.warnings).toHaveLength(0);
    });
  });

  describe('controller', () => {
    it('should reject negative gains', () => {
      const result = validateConfig({ ...validConfig, KI: -0.1 });

      expect(result.valid).toBe(false);
      expect(result.errors[0].message).toBe('KI must be between 0 and 1000 (got -0.1)');
    });

    it('should warn on an unusually large proportional gain', () => {
      const result = validateConfig({ ...validConfig, KP: 50 });

      expect(result.valid).toBe(true);
      expect(fields(result.warnings)).toEqual(['KP']);
    });

    it('should reject inverted output bounds', () => {
      const result = validateConfig({ ...validConfig, OUTPUT_MIN_PCT: 60, OUTPUT_MAX_PCT: 40 });

      expect(result.valid).toBe(false);
      expect(result.errors[0].message).toBe('OUTPUT_MIN_PCT must not exceed OUTPUT_MAX_PCT');
    });

    it('should warn when manual output lies outside the bounds', () => {
      const result = validateConfig({ ...validConfig, OUTPUT_MAX_PCT: 40 });

      expect(fields(result.warnings)).toContain('MANUAL_OUTPUT_PCT');
    });

    it('should reject an unknown initial mode', () => {
      const result = validateConfig({ ...validConfig, INITIAL_MODE: 'CASCADE' });

      expect(result.errors[0].message).toBe('INITIAL_MODE must be one of AUTO, MANUAL (got CASCADE)');
    });
  });

  describe('plant', () => {
    it('should reject a ceiling below ambient', () => {
      const result = validateConfig({ ...validConfig, AMBIENT_TEMPERATURE_C: 40, MAX_TEMPERATURE_C: 30 });

      expect(result.valid).toBe(false);
      expect(fields(result.errors)).toContain('MAX_TEMPERATURE_C');
    });

    it('should reject an initial temperature above the ceiling', () => {
      const result = validateConfig({ ...validConfig, INITIAL_TEMPERATURE_C: 1700 });

      expect(result.errors).toEqual([
        {
          level: 'CRITICAL',
          field: 'INITIAL_TEMPERATURE_C',
          message: 'INITIAL_TEMPERATURE_C must be between AMBIENT_TEMPERATURE_C and MAX_TEMPERATURE_C'
        }
      ]);
    });

    it('should reject a setpoint above the ceiling', () => {
      const result = validateConfig({ ...validConfig, SETPOINT_C: 1650 });

      expect(fields(result.errors)).toEqual(['SETPOINT_C']);
    });

    it('should warn when full output cannot reach the setpoint', () => {
      // 10 * 100 + 20 = 1020 < 1350
      const result = validateConfig({ ...validConfig, PLANT_PROCESS_GAIN_C_PER_PCT: 10 });

      expect(result.valid).toBe(true);
      expect(result.warnings[0].message).toBe('SETPOINT_C is above what full output can reach');
    });

    it('should report one error for a non-finite time constant', () => {
      const result = validateConfig({ ...validConfig, PLANT_TIME_CONSTANT_SEC: NaN });

      expect(fields(result.errors)).toEqual(['PLANT_TIME_CONSTANT_SEC']);
    });
  });

  describe('clock', () => {
    it('should reject a step at least as long as the time constant', () => {
      const result = validateConfig({ ...validConfig, TICK_DT_SEC: 600 });

      expect(result.errors[0].message).toBe('TICK_DT_SEC must be smaller than PLANT_TIME_CONSTANT_SEC');
    });

    it('should warn on a coarse step', () => {
      const result = validateConfig({ ...validConfig, TICK_DT_SEC: 10 });

      expect(result.valid).toBe(true);
      expect(fields(result.warnings)).toEqual(['TICK_DT_SEC']);
    });

    it('should reject a tick period given as text', () => {
      const result = validateConfig({ ...validConfig, TICK_PERIOD_MS: '100' });

      expect(result.errors).toEqual([
        { level: 'CRITICAL', field: 'TICK_PERIOD_MS', message: 'TICK_PERIOD_MS must be between 10 and 60000 (got 100)' }
      ]);
      expect(result.warnings).toHaveLength(0);
    });

    it('should reject a fractional history capacity', () => {
      const result = validateConfig({ ...validConfig, HISTORY_CAPACITY: 10.5 });

      expect(result.errors[0].message).toBe('HISTORY_CAPACITY must be an integer (got 10.5)');
    });
  });

  describe('reporting', () => {
    it('should reject a partial threshold at or above the good threshold', () => {
      const result = validateConfig({ ...validConfig, QUALITY_PARTIAL_C: 1350 });

      expect(result.errors[0].message).toBe('QUALITY_PARTIAL_C must be below QUALITY_GOOD_C');
    });

    it('should warn on an implausible emission factor', () => {
      const result = validateConfig({ ...validConfig, CO2_PER_KG_FUEL: 6 });

      expect(fields(result.warnings)).toEqual(['CO2_PER_KG_FUEL']);
    });
  });

  describe('performance and logging', () => {
    it('should warn when the slow-tick threshold is not below the tick period', () => {
      const result = validateConfig({ ...validConfig, PERF_SLOW_TICK_THRESHOLD_MS: 100 });

      expect(fields(result.warnings)).toEqual(['PERF_SLOW_TICK_THRESHOLD_MS']);
    });

    it('should reject an unknown log level', () => {
      const result = validateConfig({ ...validConfig, CONSOLE_LOG_LEVEL: 7 });

      expect(result.errors[0].message).toBe('CONSOLE_LOG_LEVEL must be one of 0, 1, 2, 3 (got 7)');
    });

    it('should collect every error in one pass', () => {
      const result = validateConfig({ ...validConfig, KP: -1, CONSOLE_BUFFER_SIZE: 1, GLOBAL_LOG_AUTO_DEMOTE_HOURS: -1 });

      expect(fields(result.errors)).toEqual(['KP', 'CONSOLE_BUFFER_SIZE', 'GLOBAL_LOG_AUTO_DEMOTE_HOURS']);
    });
  });
});

describe('assertValidConfig', () => {
  it('should return the result when valid', () => {
    const result = assertValidConfig({ ...validConfig, KP: 50 });

    expect(result.warnings).toHaveLength(1);
  });

  it('should throw with every error message', () => {
    const config = { ...validConfig, KP: -1, KD: -2 };

    expect(() => assertValidConfig(config)).toThrow(KilnConfigValidationError);
    expect(() => assertValidConfig(config)).toThrow(
      'KP must be between 0 and 1000 (got -1); KD must be between 0 and 1000 (got -2)'
    );
  });
});
