/**
 * Request ID Allocation
 *
 * Monotonic correlation ids, wrapping within the positive int32 range.
 */

import { MAX_REQUEST_ID } from '@/constants.js';

/**
 * Hands out correlation ids 1, 2, 3, ... wrapping back to 1 after `max`.
 *
 * Ids still in use (per `isInUse`) are skipped, so an id is never reused while
 * an earlier request holding it can still be answered.
 *
 * @example
 * ```typescript
 * const ids = new RequestIdAllocator();
 * ids.next(); // → 1
 * ids.next((id) => id === 2); // → 3
 * ```
 */
export class RequestIdAllocator {
  private last = 0;

  constructor(private readonly max: number = MAX_REQUEST_ID) {
    if (!Number.isSafeInteger(max) || max < 1) {
      throw new Error('Request id range must contain at least one id');
    }
  }

  next(isInUse: (id: number) => boolean = () => false): number {
    for (let attempts = 0; attempts < this.max; attempts++) {
      this.last = this.last >= this.max ? 1 : this.last + 1;
      if (!isInUse(this.last)) {
        return this.last;
      }
    }
    throw new Error(`All ${this.max} request ids are in use`);
  }
}
