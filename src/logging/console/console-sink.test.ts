/**
 * Unit tests for console sink
 */

import type { Mock } from 'vitest';

import type { TimerAPI } from '$types';
import { createConsoleSink } from './console-sink';

import type { ConsoleAPI, ConsoleSinkConfig } from '../types';

describe('createConsoleSink', () => {
  let timerCallback: (() => void) | null;
  let mockTimer: { set: Mock<TimerAPI['set']>; clear: Mock<TimerAPI['clear']> };
  let mockConsole: { log: Mock<ConsoleAPI['log']>; warn: Mock<ConsoleAPI['warn']> };

  const config: ConsoleSinkConfig = { bufferSize: 10, drainInterval: 100 };

  function runDrain(): void {
    if (timerCallback === null) {
      throw new Error('drain timer was not started');
    }
    timerCallback();
  }

  beforeEach(() => {
    timerCallback = null;
    mockTimer = {
      set: vi.fn<TimerAPI['set']>((_interval, _repeat, callback) => {
        timerCallback = callback;
        return 7;
      }),
      clear: vi.fn<TimerAPI['clear']>()
    };
    mockConsole = {
      log: vi.fn<ConsoleAPI['log']>(),
      warn: vi.fn<ConsoleAPI['warn']>()
    };
  });

  describe('write', () => {
    it('should buffer messages without printing them', () => {
      const sink = createConsoleSink(mockTimer, mockConsole, config);

      sink.write('kiln warming');
      sink.write('kiln at setpoint');

      expect(sink.getBufferSize()).toBe(2);
      expect(mockConsole.log).not.toHaveBeenCalled();
    });

    it('should drop and warn when the buffer is full', () => {
      const sink = createConsoleSink(mockTimer, mockConsole, { bufferSize: 1, drainInterval: 100 });

      sink.write('first');
      sink.write('dropped message');

      expect(sink.getBufferSize()).toBe(1);
      expect(mockConsole.warn).toHaveBeenCalledWith(
        'Console log buffer overflow, dropping message: dropped message'
      );
    });
  });

  describe('initialize', () => {
    it('should start the drain timer once', () => {
      const sink = createConsoleSink(mockTimer, mockConsole, { bufferSize: 10, drainInterval: 150 });

      sink.initialize(() => {});
      sink.initialize(() => {});

      expect(mockTimer.set).toHaveBeenCalledTimes(1);
      expect(mockTimer.set).toHaveBeenCalledWith(150, true, expect.any(Function));
    });

    it('should report success', () => {
      const sink = createConsoleSink(mockTimer, mockConsole, config);
      const callback = vi.fn();

      sink.initialize(callback);

      expect(callback).toHaveBeenCalledWith(true, 'Console sink initialized');
    });

    it('should drain one message per timer tick in FIFO order', () => {
      const sink = createConsoleSink(mockTimer, mockConsole, config);
      sink.write('first');
      sink.write('second');
      sink.initialize(() => {});

      runDrain();
      expect(mockConsole.log).toHaveBeenCalledTimes(1);
      expect(mockConsole.log).toHaveBeenLastCalledWith('first');
      expect(sink.getBufferSize()).toBe(1);

      runDrain();
      expect(mockConsole.log).toHaveBeenLastCalledWith('second');
      expect(sink.getBufferSize()).toBe(0);

      runDrain();
      expect(mockConsole.log).toHaveBeenCalledTimes(2);
    });
  });

  describe('flush', () => {
    it('should print every buffered message in order', () => {
      const sink = createConsoleSink(mockTimer, mockConsole, config);
      sink.write('a');
      sink.write('b');
      sink.write('c');

      sink.flush();

      expect(mockConsole.log.mock.calls).toEqual([['a'], ['b'], ['c']]);
      expect(sink.getBufferSize()).toBe(0);
    });
  });

  describe('dispose', () => {
    it('should flush and clear the drain timer', () => {
      const sink = createConsoleSink(mockTimer, mockConsole, config);
      sink.initialize(() => {});
      sink.write('last words');

      sink.dispose();

      expect(mockConsole.log).toHaveBeenCalledWith('last words');
      expect(mockTimer.clear).toHaveBeenCalledWith(7);
    });

    it('should not clear a timer that was never started', () => {
      const sink = createConsoleSink(mockTimer, mockConsole, config);

      sink.dispose();

      expect(mockTimer.clear).not.toHaveBeenCalled();
    });

    it('should allow restarting the drain after dispose', () => {
      const sink = createConsoleSink(mockTimer, mockConsole, config);
      sink.initialize(() => {});
      sink.dispose();
      sink.initialize(() => {});

      expect(mockTimer.set).toHaveBeenCalledTimes(2);
    });
  });
});
