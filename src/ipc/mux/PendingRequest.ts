/**
 * Pending Request
 *
 * A command, its correlation id and the slot its reply will land in.
 */

import type { Command } from '@/ipc/protocol/index.js';
import { describeCommand } from '@/ipc/transport/jsonl.js';

import { ReplySlot } from './ReplySlot.js';

export class PendingRequest {
  readonly slot: ReplySlot;
  readonly name: string;

  constructor(
    readonly requestId: number,
    readonly command: Command
  ) {
    this.slot = new ReplySlot(requestId);
    this.name = describeCommand(command);
  }
}
