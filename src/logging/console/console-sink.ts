/**
 * Console output sink with rate-limited buffering
 *
 * Keeps a fast tick loop from flooding stdout:
 * - Buffers messages up to a configurable limit
 * - Drains one message at a time at fixed intervals
 * - Drops messages with a warning when the buffer overflows
 *
 * flush() writes everything still pending; dispose() flushes and cancels the
 * drain timer so a CLI run can exit as soon as it is done.
 */

import type { TimerAPI, TimerHandle } from '$types';
import type { ConsoleSink, ConsoleSinkConfig, ConsoleAPI } from '../types';

/**
 * Create a console sink with buffering
 *
 * @param timerApi - Timer API for scheduling the drain
 * @param consoleApi - Console API for output (usually the global console)
 * @param config - Sink configuration (bufferSize, drainInterval)
 * @returns Console sink instance
 *
 * @example
 * ```typescript
 * const consoleSink = createConsoleSink(createNodeTimer(true), console, {
 *   bufferSize: 200,
 *   drainInterval: 10
 * });
 * consoleSink.initialize(() => {});
 * consoleSink.write("Kiln driver ready");
 * ```
 */
export function createConsoleSink(
  timerApi: TimerAPI,
  consoleApi: ConsoleAPI,
  config: ConsoleSinkConfig
): ConsoleSink {
  const buffer: string[] = [];
  let drainHandle: TimerHandle | null = null;

  function drain(): void {
    const next = buffer.shift();
    if (next !== undefined) {
      consoleApi.log(next);
    }
  }

  function startDrain(): void {
    if (drainHandle === null) {
      drainHandle = timerApi.set(config.drainInterval, true, drain);
    }
  }

  function write(formattedMessage: string): void {
    if (buffer.length < config.bufferSize) {
      buffer.push(formattedMessage);
    } else {
      consoleApi.warn('Console log buffer overflow, dropping message: ' + formattedMessage);
    }
  }

  function flush(): void {
    while (buffer.length > 0) {
      drain();
    }
  }

  function dispose(): void {
    flush();
    if (drainHandle !== null) {
      timerApi.clear(drainHandle);
      drainHandle = null;
    }
  }

  function getBufferSize(): number {
    return buffer.length;
  }

  /**
   * Initialize the sink by starting the drain timer (idempotent)
   * @param callback - Called with (success, message)
   */
  function initialize(callback: (success: boolean, message: string) => void): void {
    startDrain();
    callback(true, 'Console sink initialized');
  }

  return {
    write: write,
    initialize: initialize,
    flush: flush,
    dispose: dispose,
    getBufferSize: getBufferSize
  };
}
