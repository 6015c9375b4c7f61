/**
 * testClock - Clock helper wrapper with async/await-friendly API
 *
 * Installs a FakeClock in place of the global setTimeout/clearTimeout through
 * node:test mocks.
 */

import { mock } from 'node:test';
import { setImmediate as nextMacrotask } from 'node:timers/promises';

import { FakeClock } from './FakeClock.js';

export interface ClockHelper {
  clock: FakeClock;
  tick: (ms: number) => void;
  settle: () => Promise<void>;
  tickAndSettle: (ms: number) => Promise<void>;
  restore: () => void;
}

/**
 * Create a fake clock for deterministic timer control
 *
 * Usage:
 * ```typescript
 * const { tickAndSettle, restore } = useFakeClock();
 *
 * const call = withDeadline(op, { timeoutMs: 100, signal, onTimeout });
 * await tickAndSettle(100); // Fires the deadline, lets rejections propagate
 * await assert.rejects(call, RecvTimeoutError);
 * restore();
 * ```
 */
export function useFakeClock(): ClockHelper {
  const clock = new FakeClock();

  const setTimeoutMock = mock.method(globalThis, 'setTimeout', (callback: () => void, delay?: number) =>
    clock.setTimeout(callback, delay)
  );
  const clearTimeoutMock = mock.method(globalThis, 'clearTimeout', (id?: number) =>
    clock.clearTimeout(id)
  );

  /**
   * Let pending promise callbacks run. setImmediate is not faked, so one
   * macrotask turn drains every microtask queued so far.
   */
  const settle = async (): Promise<void> => {
    await nextMacrotask();
  };

  return {
    clock,

    /**
     * Advance time and execute due timers synchronously
     */
    tick(ms: number): void {
      clock.tick(ms);
    },

    settle,

    /**
     * Advance time, then let rejections and resolutions propagate
     */
    async tickAndSettle(ms: number): Promise<void> {
      clock.tick(ms);
      await settle();
    },

    /**
     * Restore original timer functions
     * IMPORTANT: Call this in afterEach() to avoid polluting other tests
     */
    restore(): void {
      setTimeoutMock.mock.restore();
      clearTimeoutMock.mock.restore();
      clock.reset();
    },
  };
}
