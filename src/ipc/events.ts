/**
 * Notification Handling
 *
 * The reader hands every unsolicited message to a NotificationSink. What happens
 * next (fan-out, filtering, buffering) is the sink's business, not the
 * multiplexer's.
 */

import type { Notification } from '@/ipc/protocol/index.js';
import { createLogger } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';

const log = createLogger('events');

export interface NotificationSink {
  /**
   * Called on the reader loop for each notification; must not block.
   */
  onNotification(notification: Notification): void;
}

/**
 * Sink that discards every notification.
 */
export const noopSink: NotificationSink = {
  onNotification: () => {},
};

export type NotificationHandler = (notification: Notification) => void;

/**
 * Sink that routes notifications to handlers registered per event name.
 *
 * A throwing handler is logged and does not stop the remaining handlers.
 *
 * @example
 * ```typescript
 * const events = new EventRouter();
 * events.on('property-change', (n) => console.log(n.fields['name'], n.data));
 * const client = await IPCClient.open({ socketPath, notificationSink: events });
 * ```
 */
export class EventRouter implements NotificationSink {
  private nextHandlerId = 0;
  private readonly handlers = new Map<string, Map<number, NotificationHandler>>();
  private readonly anyHandlers = new Map<number, NotificationHandler>();

  /**
   * Register a handler for one event name.
   *
   * @returns Handler id for later removal with off()
   */
  on(event: string, handler: NotificationHandler): number {
    let handlersForEvent = this.handlers.get(event);
    if (!handlersForEvent) {
      handlersForEvent = new Map();
      this.handlers.set(event, handlersForEvent);
    }
    const handlerId = ++this.nextHandlerId;
    handlersForEvent.set(handlerId, handler);
    return handlerId;
  }

  /**
   * Register a handler for every event.
   *
   * @returns Handler id for later removal with off('*', id)
   */
  onAny(handler: NotificationHandler): number {
    const handlerId = ++this.nextHandlerId;
    this.anyHandlers.set(handlerId, handler);
    return handlerId;
  }

  off(event: string, handlerId: number): void {
    if (event === '*') {
      this.anyHandlers.delete(handlerId);
      return;
    }
    const handlers = this.handlers.get(event);
    if (handlers) {
      handlers.delete(handlerId);
      if (handlers.size === 0) {
        this.handlers.delete(event);
      }
    }
  }

  /**
   * Remove all handlers for one event, or every handler when no event is given.
   */
  removeAllListeners(event?: string): void {
    if (event === undefined) {
      this.handlers.clear();
      this.anyHandlers.clear();
    } else if (event === '*') {
      this.anyHandlers.clear();
    } else {
      this.handlers.delete(event);
    }
  }

  listenerCount(event: string): number {
    return (this.handlers.get(event)?.size ?? 0) + this.anyHandlers.size;
  }

  onNotification(notification: Notification): void {
    const specific = this.handlers.get(notification.event);
    const targets = [...(specific?.values() ?? []), ...this.anyHandlers.values()];

    for (const handler of targets) {
      try {
        handler(notification);
      } catch (error) {
        log.info(`Handler for "${notification.event}" threw: ${getErrorMessage(error)}`);
      }
    }
  }
}
