/**
 * Handoff Unit Tests
 *
 * The intake is a rendezvous: offers complete only when taken.
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { Handoff } from '@/ipc/mux/Handoff.js';
import { ClientClosedError, SendTimeoutError } from '@/ipc/transport/IPCError.js';

function live(): AbortSignal {
  return new AbortController().signal;
}

void describe('Handoff', () => {
  void it('completes an offer only once the item is taken', async () => {
    const handoff = new Handoff<string>();
    let accepted = false;
    const offer = handoff.offer('a', live()).then(() => {
      accepted = true;
    });

    await Promise.resolve();
    assert.equal(accepted, false);
    assert.equal(handoff.waiting, 1);

    assert.equal(await handoff.take(live()), 'a');
    await offer;
    assert.equal(accepted, true);
    assert.equal(handoff.waiting, 0);
  });

  void it('passes an offer straight to a waiting taker', async () => {
    const handoff = new Handoff<number>();
    const taken = handoff.take(live());

    await handoff.offer(7, live());

    assert.equal(await taken, 7);
  });

  void it('serves offers first come, first served', async () => {
    const handoff = new Handoff<number>();
    const offers = [handoff.offer(1, live()), handoff.offer(2, live()), handoff.offer(3, live())];

    const taken = [await handoff.take(live()), await handoff.take(live()), await handoff.take(live())];

    assert.deepEqual(taken, [1, 2, 3]);
    await Promise.all(offers);
  });

  void it('withdraws an aborted offer', async () => {
    const handoff = new Handoff<string>();
    const controller = new AbortController();
    const offer = handoff.offer('stale', controller.signal);

    controller.abort(new SendTimeoutError('stale', 10));
    await assert.rejects(offer, SendTimeoutError);

    const fresh = handoff.offer('fresh', live());
    assert.equal(await handoff.take(live()), 'fresh');
    await fresh;
  });

  void it('rejects offers on an aborted signal immediately', async () => {
    const handoff = new Handoff<string>();
    const controller = new AbortController();
    controller.abort(new ClientClosedError());

    await assert.rejects(handoff.offer('x', controller.signal), ClientClosedError);
    assert.equal(handoff.waiting, 0);
  });

  void it('stops a pending take on abort', async () => {
    const handoff = new Handoff<string>();
    const controller = new AbortController();
    const take = handoff.take(controller.signal);

    controller.abort(new ClientClosedError());
    await assert.rejects(take, ClientClosedError);

    // The taker slot is free again
    const next = handoff.take(live());
    await handoff.offer('after', live());
    assert.equal(await next, 'after');
  });

  void it('allows only one pending take', async () => {
    const handoff = new Handoff<string>();
    const first = handoff.take(live());

    await assert.rejects(handoff.take(live()), /already has a pending take/);

    await handoff.offer('x', live());
    assert.equal(await first, 'x');
  });
});
