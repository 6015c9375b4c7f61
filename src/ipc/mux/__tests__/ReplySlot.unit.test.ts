/**
 * ReplySlot Unit Tests
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { ReplySlot } from '@/ipc/mux/ReplySlot.js';
import type { Reply } from '@/ipc/protocol/index.js';
import {
  ChannelClosedError,
  RecvTimeoutError,
  WriteError,
} from '@/ipc/transport/IPCError.js';

const reply: Reply = { error: '', data: 42, event: '', requestId: 3 };

function live(): AbortSignal {
  return new AbortController().signal;
}

void describe('ReplySlot', () => {
  void it('delivers to a waiter', async () => {
    const slot = new ReplySlot(3);
    const waiting = slot.wait(live());

    assert.equal(slot.deliver(reply), true);
    assert.deepEqual(await waiting, reply);
  });

  void it('keeps a value delivered before anyone waits', async () => {
    const slot = new ReplySlot(3);
    slot.deliver(reply);

    assert.equal(slot.settled, true);
    assert.deepEqual(await slot.wait(live()), reply);
  });

  void it('settles only once', async () => {
    const slot = new ReplySlot(3);

    assert.equal(slot.deliver(reply), true);
    assert.equal(slot.deliver({ ...reply, data: 0 }), false);
    assert.equal(slot.fail(new Error('late')), false);
    assert.equal(slot.close(), false);
    assert.equal((await slot.wait(live())).data, 42);
  });

  void it('rejects the waiter with the failure', async () => {
    const slot = new ReplySlot(3);
    const waiting = slot.wait(live());

    slot.fail(new WriteError(3, new Error('EPIPE')));

    await assert.rejects(waiting, WriteError);
  });

  void it('rejects with ChannelClosedError when closed without a value', async () => {
    const slot = new ReplySlot(9);
    const waiting = slot.wait(live());

    slot.close();

    await assert.rejects(
      waiting,
      (error: unknown) => error instanceof ChannelClosedError && error.requestId === 9
    );
  });

  void it('stops waiting on abort but still accepts a late delivery', async () => {
    const slot = new ReplySlot(3);
    const controller = new AbortController();
    const waiting = slot.wait(controller.signal);

    controller.abort(new RecvTimeoutError('get_property', 10));
    await assert.rejects(waiting, RecvTimeoutError);

    assert.equal(slot.settled, false);
    assert.equal(slot.deliver(reply), true);
  });
});
