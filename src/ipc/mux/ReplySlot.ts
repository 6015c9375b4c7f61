/**
 * Reply Slot
 *
 * Single-use, single-value destination a pending request waits on.
 */

import type { Reply } from '@/ipc/protocol/index.js';
import { ChannelClosedError } from '@/ipc/transport/IPCError.js';

import { abortReason } from './signals.js';

type SlotState =
  | { kind: 'empty' }
  | { kind: 'replied'; reply: Reply }
  | { kind: 'failed'; error: Error }
  | { kind: 'closed' };

interface Waiter {
  resolve: (reply: Reply) => void;
  reject: (error: Error) => void;
}

/**
 * One-shot reply destination.
 *
 * The first of `deliver`, `fail` or `close` settles the slot; later calls are
 * ignored and report `false`. Settling never blocks, so the reader can deliver
 * into a slot nobody is waiting on any more (the caller timed out) at no cost.
 */
export class ReplySlot {
  private state: SlotState = { kind: 'empty' };
  private waiter: Waiter | null = null;

  constructor(private readonly requestId: number) {}

  get settled(): boolean {
    return this.state.kind !== 'empty';
  }

  deliver(reply: Reply): boolean {
    return this.settle({ kind: 'replied', reply });
  }

  fail(error: Error): boolean {
    return this.settle({ kind: 'failed', error });
  }

  /**
   * Close without a value; a waiter rejects with ChannelClosedError.
   */
  close(): boolean {
    return this.settle({ kind: 'closed' });
  }

  /**
   * Wait for the slot to settle.
   *
   * @param signal - Aborting stops the wait (rejecting with the abort reason) but
   *                 leaves the slot itself untouched
   */
  wait(signal: AbortSignal): Promise<Reply> {
    if (this.state.kind !== 'empty') {
      return this.outcome(this.state);
    }
    if (signal.aborted) {
      return Promise.reject(abortReason(signal));
    }

    return new Promise<Reply>((resolve, reject) => {
      const onAbort = (): void => {
        this.waiter = null;
        reject(abortReason(signal));
      };
      signal.addEventListener('abort', onAbort, { once: true });

      this.waiter = {
        resolve: (reply) => {
          signal.removeEventListener('abort', onAbort);
          resolve(reply);
        },
        reject: (error) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        },
      };
    });
  }

  private settle(next: Exclude<SlotState, { kind: 'empty' }>): boolean {
    if (this.state.kind !== 'empty') {
      return false;
    }
    this.state = next;

    const waiter = this.waiter;
    this.waiter = null;
    if (waiter) {
      this.outcome(next).then(waiter.resolve, waiter.reject);
    }
    return true;
  }

  private outcome(state: Exclude<SlotState, { kind: 'empty' }>): Promise<Reply> {
    switch (state.kind) {
      case 'replied':
        return Promise.resolve(state.reply);
      case 'failed':
        return Promise.reject(state.error);
      case 'closed':
        return Promise.reject(new ChannelClosedError(this.requestId));
    }
  }
}
