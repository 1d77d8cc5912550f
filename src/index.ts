/**
 * Kiln simulator public API
 */

export { default as CONFIG, USER_CONFIG, APP_CONSTANTS } from './boot/config';
export { initialize } from './boot/init';
export type { KilnApp, InitOptions } from './boot/types';

export * from './core';
export { EVENT_NAMES } from './events/types';
export type {
  KilnSampleEvent,
  KilnConditionEvent,
  KilnConditionType,
  KilnLifecycleEvent,
  KilnConfigEvent,
  KilnEventMap,
  KilnEventName,
  KilnEventListener
} from './events/types';

export * from './features/clinker-quality';
export * from './features/efficiency-estimate';
export * from './features/kiln-rotation';
export * from './features/performance-metrics';
export * from './features/run-summary';

export { createLogger, createConsoleSink, fmtTemp, fmtPct } from './logging';
export type { Logger, LogLevel, LogLevels, LogSink, ConsoleAPI, SimClockReading } from './logging';

export * from './system/driver';
export * from './system/scheduler';
export { createInitialState, toSnapshot } from './system/state';
export type { Sample, SimulationState } from './system/state';

export type { Celsius, ControlMode, SimulationPhase, KilnUserConfig, KilnConfig, TimerAPI, TimerHandle } from './types';
export { CONTROL_MODES, isControlMode } from './types';
export * from './types/errors';

export { createNodeTimer } from './utils/timer';
export { validateConfig, assertValidConfig } from './validation';
export type { ConfigIssue, UncheckedUserConfig, ValidationResult } from './validation';
