/**
 * IPC Client Types
 */

import type { NotificationSink } from './events.js';
import type { ReaderStats } from './mux/ReaderLoop.js';
import type { Command, Reply } from './protocol/index.js';

/**
 * Anything that can run a command against the player.
 *
 * Higher-level APIs depend on this interface only, so they work with the socket
 * client and with in-memory fakes alike.
 */
export interface Executor {
  /**
   * Send one command and wait for its reply.
   *
   * Resolves with the reply even when `reply.error` is set (the player refused the
   * command); rejects only when the call itself could not be completed.
   */
  execute(command: Command): Promise<Reply>;
  close(): Promise<void>;
}

/**
 * Construction-time configuration of an IPC client.
 */
export interface IPCClientOptions {
  /** Socket path; defaults to MPVCTL_SOCKET or /tmp/mpvsocket */
  socketPath?: string;
  /** Default bound for each call phase */
  timeoutMs?: number;
  /** Send-phase bound; overrides timeoutMs */
  sendTimeoutMs?: number;
  /** Receive-phase bound; overrides timeoutMs */
  recvTimeoutMs?: number;
  dialTimeoutMs?: number;
  /** Receives every notification; defaults to a no-op sink */
  notificationSink?: NotificationSink;
  /** Aborting cancels the dial, or closes the client once open */
  signal?: AbortSignal;
}

/**
 * Snapshot of client traffic counters.
 */
export interface ClientStats extends ReaderStats {
  /** Requests written and still waiting for a reply */
  pending: number;
}
