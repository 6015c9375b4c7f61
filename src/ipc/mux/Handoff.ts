/**
 * Rendezvous Hand-off
 *
 * Unbuffered channel between many producers and one consumer: an offer
 * completes only when the consumer takes the item. A slow consumer therefore
 * throttles producers instead of letting a queue grow without bound.
 */

import { abortReason } from './signals.js';

interface Offer<T> {
  item: T;
  accept: () => void;
}

interface Taker<T> {
  receive: (item: T) => void;
}

export class Handoff<T> {
  private readonly offers: Offer<T>[] = [];
  private taker: Taker<T> | null = null;

  /**
   * Number of producers currently blocked in `offer`.
   */
  get waiting(): number {
    return this.offers.length;
  }

  /**
   * Offer an item and wait until the consumer takes it.
   *
   * Aborting withdraws the offer: the consumer will never see the item.
   */
  offer(item: T, signal: AbortSignal): Promise<void> {
    if (signal.aborted) {
      return Promise.reject(abortReason(signal));
    }

    const taker = this.taker;
    if (taker) {
      this.taker = null;
      taker.receive(item);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const offer: Offer<T> = {
        item,
        accept: () => {
          signal.removeEventListener('abort', onAbort);
          resolve();
        },
      };
      const onAbort = (): void => {
        const index = this.offers.indexOf(offer);
        if (index !== -1) {
          this.offers.splice(index, 1);
        }
        reject(abortReason(signal));
      };
      signal.addEventListener('abort', onAbort, { once: true });
      this.offers.push(offer);
    });
  }

  /**
   * Take the next offered item, waiting for one if none is pending.
   *
   * Only one `take` may be outstanding at a time.
   */
  take(signal: AbortSignal): Promise<T> {
    if (signal.aborted) {
      return Promise.reject(abortReason(signal));
    }
    if (this.taker) {
      return Promise.reject(new Error('Handoff already has a pending take'));
    }

    const offer = this.offers.shift();
    if (offer) {
      offer.accept();
      return Promise.resolve(offer.item);
    }

    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => {
        this.taker = null;
        reject(abortReason(signal));
      };
      signal.addEventListener('abort', onAbort, { once: true });
      this.taker = {
        receive: (item) => {
          signal.removeEventListener('abort', onAbort);
          resolve(item);
        },
      };
    });
  }
}
