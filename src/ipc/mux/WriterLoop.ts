/**
 * Writer Loop
 *
 * The only code that writes to the socket. Takes requests from the intake one
 * at a time and fully processes each (encode, register, write) before taking
 * the next, so the wire carries requests in the order the intake accepted them.
 */

import type { Writable } from 'node:stream';

import { EncodingError, WriteError } from '@/ipc/transport/IPCError.js';
import { encodeRequest } from '@/ipc/transport/jsonl.js';
import { createLogger } from '@/ui/logging/index.js';
import { getErrorMessage, toError } from '@/utils/errors.js';

import type { CorrelationTable } from './CorrelationTable.js';
import type { Handoff } from './Handoff.js';
import type { PendingRequest } from './PendingRequest.js';
import { abortReason } from './signals.js';

const log = createLogger('writer');

export interface WriterLoopOptions {
  intake: Handoff<PendingRequest>;
  table: CorrelationTable;
  output: Writable;
  signal: AbortSignal;
}

export class WriterLoop {
  private readonly intake: Handoff<PendingRequest>;
  private readonly table: CorrelationTable;
  private readonly output: Writable;
  private readonly signal: AbortSignal;

  constructor(options: WriterLoopOptions) {
    this.intake = options.intake;
    this.table = options.table;
    this.output = options.output;
    this.signal = options.signal;
  }

  /**
   * Run until the shared signal aborts. Never rejects, and writes nothing once
   * the signal has aborted.
   */
  async run(): Promise<void> {
    while (!this.signal.aborted) {
      const request = await this.nextRequest();
      if (!request) {
        break;
      }
      // A take can resolve in the same tick as shutdown
      if (this.signal.aborted) {
        request.slot.fail(abortReason(this.signal));
        break;
      }
      await this.process(request);
    }
    log.debug('Writer loop stopped');
  }

  private async nextRequest(): Promise<PendingRequest | null> {
    try {
      return await this.intake.take(this.signal);
    } catch (error) {
      if (!this.signal.aborted) {
        log.info(`Intake failed: ${getErrorMessage(error)}`);
      }
      return null;
    }
  }

  /**
   * Encode, register, write. A request that fails any step is completed with
   * that failure and never left registered.
   */
  async process(request: PendingRequest): Promise<void> {
    const { requestId } = request;

    let frame: string;
    try {
      frame = encodeRequest({ command: request.command, requestId });
    } catch (error) {
      const failure =
        error instanceof EncodingError
          ? error
          : new EncodingError(getErrorMessage(error), toError(error));
      log.debug(`Request ${requestId} (${request.name}) not sent: ${failure.message}`);
      request.slot.fail(failure);
      return;
    }

    try {
      this.table.register(requestId, request);
    } catch (error) {
      log.info(`Request ${requestId} (${request.name}) not sent: ${getErrorMessage(error)}`);
      request.slot.fail(toError(error));
      return;
    }

    try {
      await this.write(frame);
      log.debug(`Request ${requestId} sent: ${frame.trimEnd()}`);
    } catch (error) {
      if (this.table.takeAndRemove(requestId) === request) {
        request.slot.fail(new WriteError(requestId, toError(error)));
      }
      log.debug(`Request ${requestId} (${request.name}) write failed: ${getErrorMessage(error)}`);
    }
  }

  private write(frame: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.output.write(frame, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }
}
