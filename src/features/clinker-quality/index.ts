export { QUALITY_LABELS, classifyClinker, assessClinker } from './clinker-quality';
export type { ClinkerQuality, QualityThresholds, QualityAssessment } from './types';
