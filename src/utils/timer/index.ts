/**
 * Node.js implementation of the TimerAPI abstraction
 *
 * Modules that schedule work (console sink drain, tick scheduler) take a
 * TimerAPI instead of calling setInterval directly so tests can drive them
 * by hand.
 */

import type { TimerAPI, TimerHandle } from '$types/timer';

/**
 * Create a TimerAPI backed by Node timers
 *
 * @param unref - Do not keep the event loop alive for these timers
 */
export function createNodeTimer(unref: boolean): TimerAPI {
  const handles = new Map<TimerHandle, NodeJS.Timeout>();
  let nextHandle = 1;

  function set(intervalMs: number, repeat: boolean, callback: () => void): TimerHandle {
    const handle = nextHandle++;
    const timeout = repeat
      ? setInterval(callback, intervalMs)
      : setTimeout(function() {
        handles.delete(handle);
        callback();
      }, intervalMs);
    if (unref) {
      timeout.unref();
    }
    handles.set(handle, timeout);
    return handle;
  }

  function clear(handle: TimerHandle): void {
    const timeout = handles.get(handle);
    if (timeout === undefined) {
      return;
    }
    // clearInterval also cancels timers created by setTimeout
    clearInterval(timeout);
    handles.delete(handle);
  }

  return { set: set, clear: clear };
}
