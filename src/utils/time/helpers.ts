/**
 * Time helper functions
 */

import { TIME_CONSTANTS } from '../constants';

/**
 * Format a duration as a compact human-readable string
 *
 * Used in status lines for both simulated time and process uptime.
 *
 * @param seconds - Duration in seconds
 * @returns e.g. "45s", "12m", "3h"
 */
export function formatDuration(seconds: number): string {
  if (seconds < TIME_CONSTANTS.SECONDS_PER_MINUTE) {
    return Math.round(seconds) + 's';
  } else if (seconds < TIME_CONSTANTS.SECONDS_PER_HOUR) {
    return Math.round(seconds / TIME_CONSTANTS.SECONDS_PER_MINUTE) + 'm';
  }
  return Math.round(seconds / TIME_CONSTANTS.SECONDS_PER_HOUR) + 'h';
}

/**
 * Convert a rate per hour into the amount accumulated over dt seconds
 * @param ratePerHour - Rate in units per hour (e.g. kg/h)
 * @param dtSec - Interval in seconds
 */
export function accumulateHourlyRate(ratePerHour: number, dtSec: number): number {
  return ratePerHour * (dtSec / TIME_CONSTANTS.SECONDS_PER_HOUR);
}
