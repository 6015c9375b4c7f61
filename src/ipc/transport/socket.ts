/**
 * Socket Dialer
 *
 * Opens the Unix domain socket (or Windows named pipe) with a bounded dial time.
 */

import { connect } from 'node:net';
import type { Socket } from 'node:net';

import { abortReason } from '@/ipc/mux/signals.js';
import { createLogger } from '@/ui/logging/index.js';

import { formatConnectionError, formatDialTimeoutError } from './errors.js';

const log = createLogger('client');

export interface DialConfig {
  socketPath: string;
  timeoutMs: number;
  /** Aborting cancels the dial and destroys the half-open socket */
  signal?: AbortSignal;
}

/**
 * Connect to the socket.
 *
 * @returns Connected socket with utf8 encoding and Nagle disabled
 * @throws ConnectionError on OS-level failure or when the dial timeout elapses
 * @throws The signal's reason when aborted first
 */
export function dialSocket(config: DialConfig): Promise<Socket> {
  const { socketPath, timeoutMs, signal } = config;
  if (signal?.aborted) {
    return Promise.reject(abortReason(signal));
  }

  return new Promise((resolve, reject) => {
    const socket = connect(socketPath);
    let settled = false;

    const finish = (error?: Error): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      socket.off('connect', onConnect);
      socket.off('error', onError);
      if (error) {
        socket.destroy();
        reject(error);
      } else {
        resolve(socket);
      }
    };

    const onConnect = (): void => {
      log.debug(`Connected to ${socketPath}`);
      socket.setEncoding('utf8');
      socket.setNoDelay(true);
      finish();
    };
    const onError = (error: Error): void => finish(formatConnectionError(socketPath, error));
    const onAbort = (): void => {
      if (signal) finish(abortReason(signal));
    };

    const timer = setTimeout(() => finish(formatDialTimeoutError(socketPath, timeoutMs)), timeoutMs);
    socket.once('connect', onConnect);
    socket.once('error', onError);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
