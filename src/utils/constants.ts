/**
 * Global constants used throughout the application
 */

export const TIME_CONSTANTS = {
  MS_PER_SECOND: 1000,
  SECONDS_PER_MINUTE: 60,
  SECONDS_PER_HOUR: 3600,
  HOURS_PER_DAY: 24,
} as const;

export const MASS_CONSTANTS = {
  KG_PER_TONNE: 1000,
} as const;
