export { createTickScheduler } from './scheduler';
export type { SchedulerOptions, SchedulerMetricsConfig, TickScheduler } from './types';
