/**
 * RequestIdAllocator Unit Tests
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { MAX_REQUEST_ID } from '@/constants.js';
import { RequestIdAllocator } from '@/ipc/mux/requestId.js';

void describe('RequestIdAllocator', () => {
  void it('starts at 1 and counts up', () => {
    const ids = new RequestIdAllocator();
    assert.deepEqual([ids.next(), ids.next(), ids.next()], [1, 2, 3]);
  });

  void it('wraps back to 1 after the maximum', () => {
    const ids = new RequestIdAllocator(3);
    assert.deepEqual([ids.next(), ids.next(), ids.next(), ids.next()], [1, 2, 3, 1]);
  });

  void it('skips ids that are still in use', () => {
    const ids = new RequestIdAllocator(5);
    const inUse = new Set([2, 3]);

    assert.equal(ids.next((id) => inUse.has(id)), 1);
    assert.equal(ids.next((id) => inUse.has(id)), 4);
  });

  void it('skips in-use ids across the wrap', () => {
    const ids = new RequestIdAllocator(3);
    ids.next();
    ids.next();
    ids.next();

    assert.equal(ids.next((id) => id === 1), 2);
  });

  void it('throws when every id is in use', () => {
    const ids = new RequestIdAllocator(2);
    assert.throws(() => ids.next(() => true), { message: 'All 2 request ids are in use' });
  });

  void it('rejects an empty range', () => {
    assert.throws(() => new RequestIdAllocator(0));
  });

  void it('defaults to the positive int32 range', () => {
    assert.equal(MAX_REQUEST_ID, 2147483647);
  });
});
