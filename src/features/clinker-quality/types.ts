export type ClinkerQuality = 'good' | 'partial' | 'poor';

export interface QualityThresholds {
  /** At or above: full clinker formation (QUALITY_GOOD_C) */
  goodC: number;
  /** At or above: partial sintering (QUALITY_PARTIAL_C) */
  partialC: number;
}

export interface QualityAssessment {
  quality: ClinkerQuality;
  label: string;
}
