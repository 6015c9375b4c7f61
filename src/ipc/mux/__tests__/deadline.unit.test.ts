/**
 * withDeadline Unit Tests
 *
 * Uses the fake clock so deadlines are checked to the millisecond.
 */

import assert from 'node:assert/strict';
import { afterEach, beforeEach, describe, it } from 'node:test';

import { useFakeClock, type ClockHelper } from '@/__testutils__/index.js';
import { withDeadline } from '@/ipc/mux/deadline.js';
import { ReplySlot } from '@/ipc/mux/ReplySlot.js';
import type { Reply } from '@/ipc/protocol/index.js';
import { ClientClosedError, RecvTimeoutError } from '@/ipc/transport/IPCError.js';

const reply: Reply = { error: '', data: 'ok', event: '', requestId: 1 };

void describe('withDeadline', () => {
  let fake: ClockHelper;

  beforeEach(() => {
    fake = useFakeClock();
  });

  afterEach(() => {
    fake.restore();
  });

  function waitOnSlot(slot: ReplySlot, signal: AbortSignal, timeoutMs = 100): Promise<Reply> {
    return withDeadline((phase) => slot.wait(phase), {
      timeoutMs,
      signal,
      onTimeout: () => new RecvTimeoutError('get_property', timeoutMs),
    });
  }

  void it('fails after the deadline, not before', async () => {
    const slot = new ReplySlot(1);
    let outcome: unknown = 'pending';
    void waitOnSlot(slot, new AbortController().signal).then(
      () => {
        outcome = 'resolved';
      },
      (error: unknown) => {
        outcome = error;
      }
    );

    await fake.tickAndSettle(99);
    assert.equal<unknown>(outcome, 'pending');

    await fake.tickAndSettle(1);
    assert.ok(outcome instanceof RecvTimeoutError);
    assert.equal(slot.settled, false);
  });

  void it('resolves with the operation result and clears its timer', async () => {
    const slot = new ReplySlot(1);
    const call = waitOnSlot(slot, new AbortController().signal);

    await fake.tickAndSettle(50);
    slot.deliver(reply);

    assert.deepEqual(await call, reply);
    assert.equal(fake.clock.getPendingTimers(), 0);
  });

  void it('lets the parent signal preempt the deadline', async () => {
    const parent = new AbortController();
    const call = waitOnSlot(new ReplySlot(1), parent.signal);

    parent.abort(new ClientClosedError());

    await assert.rejects(call, ClientClosedError);
    assert.equal(fake.clock.getPendingTimers(), 0);
  });

  void it('rejects at once on an aborted parent without arming a timer', async () => {
    const parent = new AbortController();
    parent.abort(new ClientClosedError());

    await assert.rejects(waitOnSlot(new ReplySlot(1), parent.signal), ClientClosedError);
    assert.equal(fake.clock.getPendingTimers(), 0);
  });

  void it('bounds each call independently', async () => {
    const first = new ReplySlot(1);
    const second = new ReplySlot(2);
    const signal = new AbortController().signal;
    const a = waitOnSlot(first, signal, 100);
    await fake.tickAndSettle(60);
    const b = waitOnSlot(second, signal, 100);

    const aFails = assert.rejects(a, RecvTimeoutError);
    await fake.tickAndSettle(40);
    await aFails;

    second.deliver(reply);
    assert.deepEqual(await b, reply);
  });
});
