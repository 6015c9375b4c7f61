/**
 * Correlation Table
 *
 * Maps correlation ids to requests written to the wire and still waiting for a reply.
 *
 * Every operation is synchronous, so on the single-threaded event loop each one
 * runs to completion without interleaving: the map needs no further locking.
 */

import { DuplicateIdError } from '@/ipc/transport/IPCError.js';

import type { PendingRequest } from './PendingRequest.js';

export class CorrelationTable {
  private readonly pending = new Map<number, PendingRequest>();

  /**
   * Register a request under its id.
   *
   * @throws DuplicateIdError if the id is already pending; the existing entry is kept
   */
  register(requestId: number, request: PendingRequest): void {
    if (this.pending.has(requestId)) {
      throw new DuplicateIdError(requestId);
    }
    this.pending.set(requestId, request);
  }

  /**
   * Look up and remove in one step.
   *
   * @returns The request, or undefined for an unknown, expired or already-answered id
   */
  takeAndRemove(requestId: number): PendingRequest | undefined {
    const request = this.pending.get(requestId);
    if (request) {
      this.pending.delete(requestId);
    }
    return request;
  }

  has(requestId: number): boolean {
    return this.pending.has(requestId);
  }

  get size(): number {
    return this.pending.size;
  }

  /**
   * Remove and return every pending request (shutdown only).
   */
  drainAll(): PendingRequest[] {
    const drained = Array.from(this.pending.values());
    this.pending.clear();
    return drained;
  }
}
