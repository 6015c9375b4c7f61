/**
 * Lifecycle Manager
 *
 * Owns the socket and the cancellation signal shared by both loops and every
 * in-flight call. All shutdown paths (explicit close, parent signal, peer
 * hang-up) go through one place.
 */

import type { Socket } from 'node:net';

import type { NotificationSink } from './events.js';
import type { CorrelationTable } from './mux/CorrelationTable.js';
import type { Handoff } from './mux/Handoff.js';
import type { PendingRequest } from './mux/PendingRequest.js';
import { ReaderLoop, type ReaderStats } from './mux/ReaderLoop.js';
import { WriterLoop } from './mux/WriterLoop.js';
import { ClientClosedError, ConnectionClosedError } from './transport/IPCError.js';
import { dialSocket } from './transport/socket.js';

import { createLogger } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';

const log = createLogger('client');

export interface LifecycleConfig {
  socketPath: string;
  dialTimeoutMs: number;
  intake: Handoff<PendingRequest>;
  table: CorrelationTable;
  sink: NotificationSink;
  signal?: AbortSignal;
}

export class Lifecycle {
  private readonly controller = new AbortController();
  private readonly reader: ReaderLoop;
  private readonly loops: Promise<void>[];
  private readonly detachParent: () => void;

  /**
   * Dial the socket, then start the reader and writer loops.
   *
   * @throws ConnectionError if the dial fails or times out
   */
  static async open(config: LifecycleConfig): Promise<Lifecycle> {
    const socket = await dialSocket({
      socketPath: config.socketPath,
      timeoutMs: config.dialTimeoutMs,
      ...(config.signal && { signal: config.signal }),
    });
    return new Lifecycle(socket, config);
  }

  private constructor(
    private readonly socket: Socket,
    private readonly config: LifecycleConfig
  ) {
    socket.on('error', (error) => {
      log.debug(`Socket error: ${getErrorMessage(error)}`);
    });

    const signal = this.controller.signal;
    this.reader = new ReaderLoop({
      input: socket,
      table: config.table,
      sink: config.sink,
      signal,
      onDisconnect: (error) => {
        this.shutdown(new ConnectionClosedError(config.socketPath, error));
      },
    });
    const writer = new WriterLoop({
      intake: config.intake,
      table: config.table,
      output: socket,
      signal,
    });
    this.loops = [this.reader.run(), writer.run()];

    const parent = config.signal;
    const onParentAbort = (): void => {
      this.shutdown(new ClientClosedError());
    };
    parent?.addEventListener('abort', onParentAbort, { once: true });
    this.detachParent = () => parent?.removeEventListener('abort', onParentAbort);
    if (parent?.aborted) {
      onParentAbort();
    }
  }

  /**
   * Shared cancellation signal. Its reason is the error calls fail with once
   * the client has shut down.
   */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get closed(): boolean {
    return this.controller.signal.aborted;
  }

  get readerStats(): Readonly<ReaderStats> {
    return this.reader.stats;
  }

  /**
   * Shut down and wait for both loops to stop. Safe to call more than once.
   */
  async close(): Promise<void> {
    this.shutdown(new ClientClosedError());
    await Promise.all(this.loops);
  }

  /**
   * Abort the shared signal, destroy the socket and close every pending reply slot.
   *
   * Aborting first means callers already waiting fail with `reason`; draining
   * afterwards only reaches slots nobody waits on.
   */
  private shutdown(reason: Error): void {
    if (this.controller.signal.aborted) {
      return;
    }
    log.debug(`Shutting down: ${reason.message}`);
    this.detachParent();
    this.controller.abort(reason);
    this.socket.destroy();
    for (const request of this.config.table.drainAll()) {
      request.slot.close();
    }
  }
}
