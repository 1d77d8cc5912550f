/**
 * Timer abstraction used by anything that schedules work
 */

export type TimerHandle = number;

export interface TimerAPI {
  /**
   * Set a timer
   * @param intervalMs - Interval in milliseconds
   * @param repeat - Whether to repeat the timer
   * @param callback - Function to call when timer fires
   * @returns Handle accepted by clear()
   */
  set(intervalMs: number, repeat: boolean, callback: () => void): TimerHandle;

  /**
   * Cancel a timer; unknown handles are ignored
   */
  clear(handle: TimerHandle): void;
}
