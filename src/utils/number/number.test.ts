/**
 * Tests for number utilities
 */

import { clamp, isFiniteNumber, isInteger, roundTo } from './index';

describe('number utilities', () => {
  describe('isFiniteNumber', () => {
    it('should accept finite numbers', () => {
      expect(isFiniteNumber(0)).toBe(true);
      expect(isFiniteNumber(-12.5)).toBe(true);
      expect(isFiniteNumber(1450)).toBe(true);
    });

    it('should reject NaN and infinities', () => {
      expect(isFiniteNumber(NaN)).toBe(false);
      expect(isFiniteNumber(Infinity)).toBe(false);
      expect(isFiniteNumber(-Infinity)).toBe(false);
    });

    it('should not coerce strings or null', () => {
      expect(isFiniteNumber('5')).toBe(false);
      expect(isFiniteNumber(null)).toBe(false);
      expect(isFiniteNumber(undefined)).toBe(false);
    });
  });

  describe('isInteger', () => {
    it('should accept integers', () => {
      expect(isInteger(3600)).toBe(true);
      expect(isInteger(-1)).toBe(true);
    });

    it('should reject fractions and non-numbers', () => {
      expect(isInteger(0.5)).toBe(false);
      expect(isInteger(NaN)).toBe(false);
      expect(isInteger('10')).toBe(false);
    });
  });

  describe('clamp', () => {
    it('should pass through values inside the range', () => {
      expect(clamp(50, 0, 100)).toBe(50);
    });

    it('should clamp to the lower bound', () => {
      expect(clamp(-3, 0, 100)).toBe(0);
    });

    it('should clamp to the upper bound', () => {
      expect(clamp(1573, 0, 100)).toBe(100);
    });

    it('should return the bound when min equals max', () => {
      expect(clamp(12, 40, 40)).toBe(40);
    });
  });

  describe('roundTo', () => {
    it('should round to the requested decimals', () => {
      expect(roundTo(22.66666, 1)).toBe(22.7);
      expect(roundTo(22.66666, 0)).toBe(23);
      expect(roundTo(1.005, 2)).toBe(1);
    });
  });
});
