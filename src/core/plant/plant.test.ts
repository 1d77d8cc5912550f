import { advanceTemperature, equilibriumTemperature } from './plant';
import type { PlantParameters } from './types';

describe('plant', () => {
  const params: PlantParameters = {
    timeConstantSec: 600,
    ambientTemperature: 20,
    processGain: 15,
    maxTemperature: 1600
  };

  describe('advanceTemperature', () => {
    it('should integrate one Euler step toward the equilibrium', () => {
      const result = advanceTemperature(20, 100, 1, params);

      expect(result.temperature).toBe(22.5);
      expect(result.unclamped).toBe(22.5);
      expect(result.saturated).toBe(false);
    });

    it('should cool toward ambient with zero input', () => {
      const result = advanceTemperature(620, 0, 6, params);

      // 620 + 6 * (20 - 620) / 600
      expect(result.temperature).toBe(614);
      expect(result.saturated).toBe(false);
    });

    it('should stay at ambient when already there with zero input', () => {
      const result = advanceTemperature(20, 0, 1, params);

      expect(result.temperature).toBe(20);
      expect(result.saturated).toBe(false);
    });

    it('should clamp at the maximum temperature and flag saturation', () => {
      const hot: PlantParameters = { ...params, processGain: 20 };

      const result = advanceTemperature(1599, 100, 60, hot);

      expect(result.temperature).toBe(1600);
      expect(result.unclamped).toBeCloseTo(1641.1, 6);
      expect(result.saturated).toBe(true);
    });

    it('should clamp at ambient when a large step overshoots downward', () => {
      const result = advanceTemperature(1000, 0, 1200, params);

      expect(result.unclamped).toBeCloseTo(-960, 9);
      expect(result.temperature).toBe(20);
      expect(result.saturated).toBe(true);
    });

    it('should clamp at ambient for negative heat input', () => {
      const result = advanceTemperature(20, -10, 1, params);

      expect(result.unclamped).toBe(19.75);
      expect(result.temperature).toBe(20);
      expect(result.saturated).toBe(true);
    });

    it('should approach the equilibrium monotonically without overshoot', () => {
      const target = equilibriumTemperature(50, params);
      let temperature = 20;

      for (let i = 0; i < 100; i++) {
        const next = advanceTemperature(temperature, 50, 10, params).temperature;
        expect(next).toBeGreaterThan(temperature);
        expect(next).toBeLessThan(target);
        temperature = next;
      }
    });

    it('should be deterministic', () => {
      expect(advanceTemperature(812.3, 63.1, 0.5, params))
        .toEqual(advanceTemperature(812.3, 63.1, 0.5, params));
    });
  });

  describe('equilibriumTemperature', () => {
    it('should return gain * input + ambient', () => {
      expect(equilibriumTemperature(50, params)).toBe(770);
    });

    it('should clamp to the physical range', () => {
      expect(equilibriumTemperature(200, params)).toBe(1600);
      expect(equilibriumTemperature(-5, params)).toBe(20);
    });
  });
});
