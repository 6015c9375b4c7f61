/**
 * Abort signal helpers shared by the multiplexer's waits.
 */

import { ClientClosedError } from '@/ipc/transport/IPCError.js';

/**
 * The error a wait should reject with once `signal` has aborted.
 *
 * Lifecycle code always aborts with an Error reason; anything else is reported
 * as a closed client.
 */
export function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new ClientClosedError();
}
