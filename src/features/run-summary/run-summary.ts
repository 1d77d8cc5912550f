/**
 * End-of-run statistics, from a sample history or accumulated live
 */

import { fuelRateForOutput } from '@core/emissions';
import { EVENT_NAMES } from '@events/types';
import { classifyClinker, QUALITY_LABELS } from '@features/clinker-quality';
import { fmtPct, fmtTemp } from '@logging';
import type { SimulationDriver } from '@system/driver';
import type { Sample } from '@system/state';
import { accumulateHourlyRate, formatDuration } from '@utils/time';

import { leadingStep } from './helpers';
import type { RunAccumulator, RunSummary, RunSummaryOptions } from './types';

/**
 * Accumulate run statistics sample by sample
 *
 * Averages are weighted by the simulated seconds each sample covers. The step
 * of the first sample comes from leadingStep, every later one from the time
 * since the previous sample.
 */
export function createRunAccumulator(options: RunSummaryOptions): RunAccumulator {
  let last: Sample | null = null;
  let sampleCount = 0;
  let durationSec = 0;
  let minTemperature = Infinity;
  let maxTemperature = -Infinity;
  let temperatureSeconds = 0;
  let outputSeconds = 0;
  let fuelSeconds = 0;
  let totalCo2Kg = 0;
  let bandSeconds = 0;
  let saturatedCount = 0;

  function add(sample: Sample): void {
    const dt = last === null ? leadingStep(sample) : sample.time - last.time;
    last = sample;
    sampleCount++;
    durationSec += dt;
    minTemperature = Math.min(minTemperature, sample.temperature);
    maxTemperature = Math.max(maxTemperature, sample.temperature);
    temperatureSeconds += sample.temperature * dt;
    outputSeconds += sample.controlOutput * dt;
    fuelSeconds += fuelRateForOutput(sample.controlOutput, options.emissions) * dt;
    totalCo2Kg += accumulateHourlyRate(sample.emissionRate, dt);
    if (Math.abs(sample.temperature - sample.setpoint) <= options.setpointBandC) {
      bandSeconds += dt;
    }
    if (sample.saturated) {
      saturatedCount++;
    }
  }

  function summary(): RunSummary | null {
    if (last === null) {
      return null;
    }
    const timed = durationSec > 0;

    return {
      sampleCount: sampleCount,
      durationSec: durationSec,
      minTemperature: minTemperature,
      maxTemperature: maxTemperature,
      averageTemperature: timed ? temperatureSeconds / durationSec : last.temperature,
      finalTemperature: last.temperature,
      averageControlOutput: timed ? outputSeconds / durationSec : last.controlOutput,
      averageFuelRateKgH: timed
        ? fuelSeconds / durationSec
        : fuelRateForOutput(last.controlOutput, options.emissions),
      totalCo2Kg: totalCo2Kg,
      withinBandFraction: timed ? bandSeconds / durationSec : 0,
      saturatedCount: saturatedCount,
      finalQuality: classifyClinker(last.temperature, options.quality)
    };
  }

  function reset(): void {
    last = null;
    sampleCount = 0;
    durationSec = 0;
    minTemperature = Infinity;
    maxTemperature = -Infinity;
    temperatureSeconds = 0;
    outputSeconds = 0;
    fuelSeconds = 0;
    totalCo2Kg = 0;
    bandSeconds = 0;
    saturatedCount = 0;
  }

  return {
    add: add,
    summary: summary,
    reset: reset
  };
}

/**
 * Summarise a run from its sample history
 *
 * Only covers what the history still holds; use trackRunSummary to cover
 * runs longer than the history capacity.
 *
 * @param samples - History, oldest first
 * @returns null when there are no samples
 */
export function summarizeRun(samples: readonly Sample[], options: RunSummaryOptions): RunSummary | null {
  const accumulator = createRunAccumulator(options);
  samples.forEach(function(sample) {
    accumulator.add(sample);
  });
  return accumulator.summary();
}

/**
 * Summarise every sample a driver produces from now on
 *
 * Starts over when the driver is reset.
 */
export function trackRunSummary(driver: Pick<SimulationDriver, 'on'>, options: RunSummaryOptions): RunAccumulator {
  const accumulator = createRunAccumulator(options);
  driver.on(EVENT_NAMES.SAMPLE, function(event) {
    accumulator.add(event.sample);
  });
  driver.on(EVENT_NAMES.LIFECYCLE, function(event) {
    if (event.type === 'reset') {
      accumulator.reset();
    }
  });
  return accumulator;
}

/**
 * One-line summary for logs and the CLI
 *
 * @example
 * ```typescript
 * formatRunSummary(summary);
 * // "Run: 3600 ticks over 1h | T 20.0C..1372.4C avg=1101.3C final=1349.8C | out 61.2% | CO2 4321.0kg | in band 40.0% | saturated 0 | ✅ Good clinker formation"
 * ```
 */
export function formatRunSummary(summary: RunSummary): string {
  return "Run: " + summary.sampleCount + " ticks over " + formatDuration(summary.durationSec) +
    " | T " + fmtTemp(summary.minTemperature) + ".." + fmtTemp(summary.maxTemperature) +
    " avg=" + fmtTemp(summary.averageTemperature) + " final=" + fmtTemp(summary.finalTemperature) +
    " | out " + fmtPct(summary.averageControlOutput) +
    " | CO2 " + summary.totalCo2Kg.toFixed(1) + "kg" +
    " | in band " + fmtPct(summary.withinBandFraction * 100) +
    " | saturated " + summary.saturatedCount +
    " | " + QUALITY_LABELS[summary.finalQuality];
}
