import type { ConsoleAPI, Logger } from '@logging';
import type { SimulationDriver } from '@system/driver';
import type { KilnConfig, TimerAPI } from '$types';

/**
 * Everything initialize() wires together
 */
export interface KilnApp {
  config: KilnConfig;
  logger: Logger;
  driver: SimulationDriver;
}

/**
 * Overrides for initialize(), mainly for tests and tools
 */
export interface InitOptions {
  /** Defaults to Node timers that do not hold the process open */
  timerApi?: TimerAPI;
  /** Defaults to the global console */
  consoleApi?: ConsoleAPI;
  /** Called once every log sink has initialized and the banner is out */
  onReady?: (app: KilnApp) => void;
}
