/**
 * Unit tests for simulation driver helpers
 */

import CONFIG from '@boot/config';
import type { ControllerConfig } from '@core/pid';
import type { Sample } from '@system/state';

import {
  applyConfigPatch,
  buildDriverOptions,
  cloneControllerConfig,
  formatSampleStatus,
  freezeControllerConfig
} from './helpers';

const BASE: ControllerConfig = {
  setpoint: 1350,
  gains: { kp: 1, ki: 0.1, kd: 0 },
  outputBounds: { min: 0, max: 100 },
  manualOutput: 50,
  mode: 'AUTO'
};

describe('cloneControllerConfig', () => {
  it('should copy nested objects', () => {
    const copy = cloneControllerConfig(BASE);

    expect(copy).toEqual(BASE);
    expect(copy.gains).not.toBe(BASE.gains);
    expect(copy.outputBounds).not.toBe(BASE.outputBounds);
  });
});

describe('freezeControllerConfig', () => {
  it('should freeze the copy all the way down', () => {
    const frozen = freezeControllerConfig(BASE);

    expect(Object.isFrozen(frozen)).toBe(true);
    expect(Object.isFrozen(frozen.gains)).toBe(true);
    expect(Object.isFrozen(frozen.outputBounds)).toBe(true);
    expect(Object.isFrozen(BASE)).toBe(false);
  });
});

describe('applyConfigPatch', () => {
  it('should return an equal config for an empty patch', () => {
    expect(applyConfigPatch(BASE, {})).toEqual(BASE);
  });

  it('should merge partial gains and bounds', () => {
    const next = applyConfigPatch(BASE, { gains: { ki: 0.2 }, outputBounds: { max: 80 }, mode: 'MANUAL' });

    expect(next).toEqual({
      setpoint: 1350,
      gains: { kp: 1, ki: 0.2, kd: 0 },
      outputBounds: { min: 0, max: 80 },
      manualOutput: 50,
      mode: 'MANUAL'
    });
  });

  it('should accept zero as a patched value', () => {
    expect(applyConfigPatch(BASE, { gains: { kp: 0 } }).gains.kp).toBe(0);
  });

  it('should not touch the input', () => {
    applyConfigPatch(BASE, { setpoint: 1400 });

    expect(BASE.setpoint).toBe(1350);
  });
});

describe('buildDriverOptions', () => {
  it('should map the flat configuration', () => {
    const options = buildDriverOptions(CONFIG);

    expect(options.controller).toEqual(BASE);
    expect(options.plant).toEqual({ timeConstantSec: 600, ambientTemperature: 20, processGain: 15, maxTemperature: 1600 });
    expect(options.initialTemperature).toBe(20);
    expect(options.historyCapacity).toBe(3600);
    expect(options.maxPendingCommands).toBe(32);
    expect(options.debugStatusEveryTicks).toBe(60);
  });
});

describe('formatSampleStatus', () => {
  it('should format one status line', () => {
    const sample: Sample = {
      tick: 12,
      time: 12,
      temperature: 52.34,
      controlOutput: 100,
      emissionRate: 3487,
      setpoint: 1350,
      mode: 'AUTO',
      saturated: false,
      outputSaturated: true
    };

    expect(formatSampleStatus(sample)).toBe('t=12.0s T=52.3C (sp=1350.0C) out=100.0% co2=3487.0kg/h AUTO');
  });
});
