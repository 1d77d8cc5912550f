/**
 * Wall-clock time sources
 *
 * Simulated time never comes from here: the driver advances its own clock by
 * dt. These are only for logging uptime and tick execution metrics.
 */

/**
 * Get current Unix timestamp in seconds
 * @returns Current time in whole seconds since epoch
 */
export function now(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * Get current timestamp in milliseconds
 * @returns Current time in milliseconds since epoch
 */
export function nowMs(): number {
  return Date.now();
}
