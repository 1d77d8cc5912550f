export {
  initPerformanceState,
  trackTickExecution,
  isSummaryDue,
  formatPerformanceSummary
} from './performance-metrics';
export type { PerformanceState, TickTrackingResult } from './types';
