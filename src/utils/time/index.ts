export { now, nowMs } from './time';
export { formatDuration, accumulateHourlyRate } from './helpers';
