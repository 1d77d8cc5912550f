export { createRunAccumulator, summarizeRun, trackRunSummary, formatRunSummary } from './run-summary';
export { leadingStep, sampleDurations, summaryOptionsFromConfig } from './helpers';
export type { RunAccumulator, RunSummary, RunSummaryOptions } from './types';
