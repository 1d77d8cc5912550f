/**
 * Clinker quality from burning-zone temperature
 */

import type { ClinkerQuality, QualityAssessment, QualityThresholds } from './types';

export const QUALITY_LABELS: Readonly<Record<ClinkerQuality, string>> = {
  good: '✅ Good clinker formation',
  partial: '⚠️ Partial sintering',
  poor: '❌ Poor quality'
};

/**
 * Classify a temperature against the quality thresholds
 * @param temperature - Kiln temperature in °C
 */
export function classifyClinker(temperature: number, thresholds: QualityThresholds): ClinkerQuality {
  if (temperature >= thresholds.goodC) {
    return 'good';
  }
  if (temperature >= thresholds.partialC) {
    return 'partial';
  }
  return 'poor';
}

export function assessClinker(temperature: number, thresholds: QualityThresholds): QualityAssessment {
  const quality = classifyClinker(temperature, thresholds);
  return { quality: quality, label: QUALITY_LABELS[quality] };
}
