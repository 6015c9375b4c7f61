/**
 * Reader Loop
 *
 * The only code that reads from the socket. Splits the stream into lines and
 * dispatches each: replies to the pending request with the same id,
 * notifications to the sink. Malformed lines and replies nobody waits for are
 * dropped here; they cannot be attributed to a caller.
 */

import { StringDecoder } from 'node:string_decoder';

import type { NotificationSink } from '@/ipc/events.js';
import type { Reply } from '@/ipc/protocol/index.js';
import { DecodingError } from '@/ipc/transport/IPCError.js';
import { JSONLBuffer, parseJSONLObject, toReply } from '@/ipc/transport/jsonl.js';
import { createLogger } from '@/ui/logging/index.js';
import { getErrorMessage, toError } from '@/utils/errors.js';

import type { CorrelationTable } from './CorrelationTable.js';

const log = createLogger('reader');

/**
 * Counters for inbound traffic.
 */
export interface ReaderStats {
  /** Replies handed to a caller still waiting for them */
  delivered: number;
  /** Replies matched to a request whose caller had already given up */
  late: number;
  /** Notifications handed to the sink */
  notifications: number;
  /** Lines that failed to decode */
  malformed: number;
  /** Replies whose id matched no pending request */
  unmatched: number;
}

export interface ReaderLoopOptions {
  input: AsyncIterable<string | Buffer>;
  table: CorrelationTable;
  sink: NotificationSink;
  signal: AbortSignal;
  /**
   * Called once when the stream ends or fails while `signal` is still live.
   */
  onDisconnect?: (error?: Error) => void;
}

export class ReaderLoop {
  private readonly input: AsyncIterable<string | Buffer>;
  private readonly table: CorrelationTable;
  private readonly sink: NotificationSink;
  private readonly signal: AbortSignal;
  private readonly onDisconnect: ((error?: Error) => void) | undefined;
  private readonly buffer = new JSONLBuffer();
  private readonly decoder = new StringDecoder('utf8');
  private readonly counters: ReaderStats = {
    delivered: 0,
    late: 0,
    notifications: 0,
    malformed: 0,
    unmatched: 0,
  };

  constructor(options: ReaderLoopOptions) {
    this.input = options.input;
    this.table = options.table;
    this.sink = options.sink;
    this.signal = options.signal;
    this.onDisconnect = options.onDisconnect;
  }

  get stats(): Readonly<ReaderStats> {
    return { ...this.counters };
  }

  /**
   * Read until the stream ends, fails or the shared signal aborts. Never rejects.
   */
  async run(): Promise<void> {
    let failure: Error | undefined;
    try {
      for await (const chunk of this.input) {
        if (this.signal.aborted) {
          break;
        }
        const text = typeof chunk === 'string' ? chunk : this.decoder.write(chunk);
        for (const line of this.buffer.process(text)) {
          this.dispatchLine(line);
        }
      }
    } catch (error) {
      failure = toError(error);
    }

    this.buffer.clear();
    if (this.signal.aborted) {
      log.debug('Reader loop stopped');
      return;
    }

    log.info(
      failure ? `Connection failed: ${failure.message}` : 'Connection closed by player'
    );
    this.onDisconnect?.(failure);
  }

  /**
   * Decode and route one line.
   */
  dispatchLine(line: string): void {
    let fields: Record<string, unknown>;
    let reply: Reply;
    try {
      fields = parseJSONLObject(line);
      reply = toReply(fields, line);
    } catch (error) {
      if (!(error instanceof DecodingError)) {
        throw error;
      }
      this.counters.malformed++;
      log.debug(`Discarded malformed line: ${getErrorMessage(error)}`);
      return;
    }

    if (reply.event !== '') {
      this.counters.notifications++;
      try {
        this.sink.onNotification({ event: reply.event, data: reply.data, fields });
      } catch (error) {
        log.info(`Notification sink failed on "${reply.event}": ${getErrorMessage(error)}`);
      }
      return;
    }

    const request = this.table.takeAndRemove(reply.requestId);
    if (!request) {
      this.counters.unmatched++;
      log.debug(`Discarded reply for unknown request_id ${reply.requestId}`);
      return;
    }

    if (request.slot.deliver(reply)) {
      this.counters.delivered++;
    } else {
      this.counters.late++;
      log.debug(`Reply for request ${reply.requestId} arrived after the request completed`);
    }
  }
}
