/**
 * Transport Error Formatting
 *
 * Builds structured errors with socket context for dial and stream failures.
 */

import { getErrnoCode } from '@/utils/errors.js';

import { ConnectionError } from './IPCError.js';

export function formatConnectionError(socketPath: string, error: Error): ConnectionError {
  const code = getErrnoCode(error);
  const message = [
    'IPC connection error',
    `Socket: ${socketPath}`,
    ...(code ? [`Code: ${code}`] : []),
    `Details: ${error.message}`,
  ].join(' | ');
  return new ConnectionError(message, socketPath, code, error);
}

export function formatDialTimeoutError(socketPath: string, timeoutMs: number): ConnectionError {
  return new ConnectionError(
    `IPC connection error | Socket: ${socketPath} | Details: dial timeout after ${timeoutMs}ms`,
    socketPath,
    'ETIMEDOUT'
  );
}

/**
 * Check whether an error means the socket is absent or nobody is listening on it.
 *
 * @example
 * ```typescript
 * try {
 *   await IPCClient.open({ socketPath });
 * } catch (error) {
 *   if (isPlayerUnavailableError(error)) {
 *     console.error('Is mpv running with --input-ipc-server?');
 *   }
 * }
 * ```
 */
export function isPlayerUnavailableError(error: unknown): boolean {
  return (
    error instanceof ConnectionError && (error.code === 'ENOENT' || error.code === 'ECONNREFUSED')
  );
}
