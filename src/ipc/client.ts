/**
 * IPC Client
 *
 * Multiplexes concurrent commands over one persistent connection to mpv's
 * JSON IPC socket. Each call gets exactly one reply, matched by request_id,
 * whatever order the replies arrive in.
 */

import { getCallTimeout, getDialTimeout, getSocketPath } from '@/constants.js';
import { createLogger } from '@/ui/logging/index.js';
import { toError } from '@/utils/errors.js';

import { noopSink } from './events.js';
import { Lifecycle } from './lifecycle.js';
import { CorrelationTable } from './mux/CorrelationTable.js';
import { withDeadline } from './mux/deadline.js';
import { Handoff } from './mux/Handoff.js';
import { PendingRequest } from './mux/PendingRequest.js';
import { RequestIdAllocator } from './mux/requestId.js';
import { abortReason } from './mux/signals.js';
import type { Command, Reply } from './protocol/index.js';
import { RecvTimeoutError, SendTimeoutError } from './transport/IPCError.js';
import type { ClientStats, Executor, IPCClientOptions } from './types.js';

const log = createLogger('client');

/**
 * Low-level client for mpv's JSON IPC.
 *
 * @example
 * ```typescript
 * const client = await IPCClient.open({ socketPath: '/tmp/mpvsocket' });
 * try {
 *   const reply = await client.execute(['get_property', 'pause']);
 *   if (reply.error === '') {
 *     console.log('Paused:', reply.data);
 *   }
 * } finally {
 *   await client.close();
 * }
 * ```
 */
export class IPCClient implements Executor {
  private readonly ids = new RequestIdAllocator();

  /**
   * Connect to the socket and start the reader and writer loops.
   *
   * @throws ConnectionError if the socket cannot be dialed within the dial timeout
   */
  static async open(options: IPCClientOptions = {}): Promise<IPCClient> {
    const socketPath = options.socketPath ?? getSocketPath();
    const timeoutMs = options.timeoutMs ?? getCallTimeout();
    const intake = new Handoff<PendingRequest>();
    const table = new CorrelationTable();

    const lifecycle = await Lifecycle.open({
      socketPath,
      dialTimeoutMs: options.dialTimeoutMs ?? getDialTimeout(),
      intake,
      table,
      sink: options.notificationSink ?? noopSink,
      ...(options.signal && { signal: options.signal }),
    });

    return new IPCClient(
      lifecycle,
      intake,
      table,
      options.sendTimeoutMs ?? timeoutMs,
      options.recvTimeoutMs ?? timeoutMs
    );
  }

  private constructor(
    private readonly lifecycle: Lifecycle,
    private readonly intake: Handoff<PendingRequest>,
    private readonly table: CorrelationTable,
    private readonly sendTimeoutMs: number,
    private readonly recvTimeoutMs: number
  ) {}

  /**
   * Send a command and wait for its reply.
   *
   * A reply whose `error` is set is still a successful call: the player received
   * and answered the command. Check `reply.error` before using `reply.data`.
   *
   * @throws SendTimeoutError if the writer did not accept the command in time (never sent)
   * @throws RecvTimeoutError if the command was handed off but not answered in time
   * @throws EncodingError if an argument cannot be written as JSON
   * @throws WriteError if writing to the socket failed
   * @throws ChannelClosedError if the reply slot closed without a value
   * @throws ClientClosedError or ConnectionClosedError once the client has shut down
   */
  async execute(command: Command): Promise<Reply> {
    const signal = this.lifecycle.signal;
    if (signal.aborted) {
      throw abortReason(signal);
    }

    const request = new PendingRequest(
      this.ids.next((id) => this.table.has(id)),
      Object.freeze([...command])
    );
    log.debug(`Request ${request.requestId} (${request.name}) queued`);

    await withDeadline((phase) => this.intake.offer(request, phase), {
      timeoutMs: this.sendTimeoutMs,
      signal,
      onTimeout: () => new SendTimeoutError(request.name, this.sendTimeoutMs),
    });

    let reply: Reply;
    try {
      reply = await withDeadline((phase) => request.slot.wait(phase), {
        timeoutMs: this.recvTimeoutMs,
        signal,
        onTimeout: () => new RecvTimeoutError(request.name, this.recvTimeoutMs),
      });
    } catch (error) {
      // The entry stays registered; settling the slot marks a late reply as abandoned
      request.slot.fail(toError(error));
      throw error;
    }
    log.debug(`Request ${request.requestId} (${request.name}) answered`);
    return reply;
  }

  /**
   * Close the connection. In-flight and later calls fail with ClientClosedError.
   * Resolves once the reader and writer loops have stopped; repeated calls are no-ops.
   */
  close(): Promise<void> {
    return this.lifecycle.close();
  }

  get closed(): boolean {
    return this.lifecycle.closed;
  }

  /**
   * Aborted once the client shuts down; the reason is the error calls now fail with.
   */
  get signal(): AbortSignal {
    return this.lifecycle.signal;
  }

  stats(): ClientStats {
    return { ...this.lifecycle.readerStats, pending: this.table.size };
  }
}
