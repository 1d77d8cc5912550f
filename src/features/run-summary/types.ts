import type { EmissionsParameters } from '@core/emissions';
import type { Sample } from '@system/state';
import type { ClinkerQuality, QualityThresholds } from '@features/clinker-quality';

export interface RunSummaryOptions {
  /** Half-width of the band around the setpoint counted as "on target" (SETPOINT_BAND_C) */
  setpointBandC: number;
  quality: QualityThresholds;
  /** Used to turn control output back into fuel feed */
  emissions: EmissionsParameters;
}

export interface RunSummary {
  sampleCount: number;
  /** Simulated seconds covered by the samples */
  durationSec: number;
  minTemperature: number;
  maxTemperature: number;
  averageTemperature: number;
  finalTemperature: number;
  /** Time-weighted, in % */
  averageControlOutput: number;
  /** Time-weighted, in kg/h */
  averageFuelRateKgH: number;
  totalCo2Kg: number;
  /** Share of simulated time spent within the setpoint band, 0..1 */
  withinBandFraction: number;
  saturatedCount: number;
  finalQuality: ClinkerQuality;
}

/**
 * Running totals fed one sample at a time, so a summary can cover a whole
 * run even after the bounded history has evicted its start
 */
export interface RunAccumulator {
  add(sample: Sample): void;
  /** null until the first sample */
  summary(): RunSummary | null;
  /** Forget everything, as after a driver reset */
  reset(): void;
}
