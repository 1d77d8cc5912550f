/**
 * Tests for configuration module
 */

import CONFIG, { USER_CONFIG, APP_CONSTANTS } from './config';

describe('Configuration', () => {
  describe('USER_CONFIG', () => {
    describe('controller settings', () => {
      it('should target the clinker burning zone', () => {
        expect(USER_CONFIG.SETPOINT_C).toBeGreaterThanOrEqual(1350);
        expect(USER_CONFIG.SETPOINT_C).toBeLessThanOrEqual(1450);
      });

      it('should have non-negative gains', () => {
        expect(USER_CONFIG.KP).toBeGreaterThanOrEqual(0);
        expect(USER_CONFIG.KI).toBeGreaterThanOrEqual(0);
        expect(USER_CONFIG.KD).toBeGreaterThanOrEqual(0);
      });

      it('should have ordered output bounds with manual output inside them', () => {
        expect(USER_CONFIG.OUTPUT_MIN_PCT).toBeLessThanOrEqual(USER_CONFIG.OUTPUT_MAX_PCT);
        expect(USER_CONFIG.MANUAL_OUTPUT_PCT).toBeGreaterThanOrEqual(USER_CONFIG.OUTPUT_MIN_PCT);
        expect(USER_CONFIG.MANUAL_OUTPUT_PCT).toBeLessThanOrEqual(USER_CONFIG.OUTPUT_MAX_PCT);
      });

      it('should start in AUTO', () => {
        expect(USER_CONFIG.INITIAL_MODE).toBe('AUTO');
      });
    });

    describe('plant settings', () => {
      it('should start inside the physical range', () => {
        expect(USER_CONFIG.INITIAL_TEMPERATURE_C).toBeGreaterThanOrEqual(USER_CONFIG.AMBIENT_TEMPERATURE_C);
        expect(USER_CONFIG.INITIAL_TEMPERATURE_C).toBeLessThanOrEqual(USER_CONFIG.MAX_TEMPERATURE_C);
      });

      it('should be able to reach the setpoint at full output', () => {
        const reachable = USER_CONFIG.PLANT_PROCESS_GAIN_C_PER_PCT * USER_CONFIG.OUTPUT_MAX_PCT +
          USER_CONFIG.AMBIENT_TEMPERATURE_C;
        expect(reachable).toBeGreaterThanOrEqual(USER_CONFIG.SETPOINT_C);
      });
    });

    describe('clock settings', () => {
      it('should step well below the plant time constant', () => {
        expect(USER_CONFIG.TICK_DT_SEC).toBeLessThanOrEqual(USER_CONFIG.PLANT_TIME_CONSTANT_SEC / 100);
      });

      it('should keep at least one simulated minute of history', () => {
        expect(USER_CONFIG.HISTORY_CAPACITY * USER_CONFIG.TICK_DT_SEC).toBeGreaterThanOrEqual(60);
      });
    });

    describe('reporting settings', () => {
      it('should have ordered quality thresholds', () => {
        expect(USER_CONFIG.QUALITY_PARTIAL_C).toBeLessThan(USER_CONFIG.QUALITY_GOOD_C);
      });

      it('should have a positive baseline fuel rate', () => {
        expect(USER_CONFIG.BASELINE_FUEL_RATE_KG_H).toBeGreaterThan(0);
      });
    });

    describe('performance metrics settings', () => {
      it('should flag slow ticks below the tick period', () => {
        expect(USER_CONFIG.PERF_SLOW_TICK_THRESHOLD_MS).toBeLessThan(USER_CONFIG.TICK_PERIOD_MS);
      });

      it('should have boolean PERF_WARN_SLOW_TICKS', () => {
        expect(typeof USER_CONFIG.PERF_WARN_SLOW_TICKS).toBe('boolean');
      });
    });

    describe('logging settings', () => {
      it('should have valid log levels', () => {
        expect([0, 1, 2, 3]).toContain(USER_CONFIG.CONSOLE_LOG_LEVEL);
        expect([0, 1, 2, 3]).toContain(USER_CONFIG.GLOBAL_LOG_LEVEL);
      });

      it('should have valid GLOBAL_LOG_AUTO_DEMOTE_HOURS', () => {
        expect(USER_CONFIG.GLOBAL_LOG_AUTO_DEMOTE_HOURS).toBeGreaterThanOrEqual(0);
        expect(USER_CONFIG.GLOBAL_LOG_AUTO_DEMOTE_HOURS).toBeLessThanOrEqual(720);
      });
    });
  });

  describe('APP_CONSTANTS', () => {
    it('should have log levels in ascending order', () => {
      expect(APP_CONSTANTS.LOG_LEVELS).toEqual({ DEBUG: 0, INFO: 1, WARNING: 2, CRITICAL: 3 });
    });

    it('should allow at least one pending command', () => {
      expect(APP_CONSTANTS.MAX_PENDING_COMMANDS).toBeGreaterThanOrEqual(1);
    });

    it('should have INITIAL_TICK_TIME_MIN as Infinity', () => {
      expect(APP_CONSTANTS.INITIAL_TICK_TIME_MIN).toBe(Infinity);
    });
  });

  describe('Combined CONFIG', () => {
    it('should contain all USER_CONFIG properties', () => {
      Object.entries(USER_CONFIG).forEach(([key, value]) => {
        expect(CONFIG).toHaveProperty(key, value);
      });
    });

    it('should contain all APP_CONSTANTS properties', () => {
      Object.entries(APP_CONSTANTS).forEach(([key, value]) => {
        expect(CONFIG).toHaveProperty(key, value);
      });
    });
  });
});
