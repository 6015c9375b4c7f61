/**
 * Error utility functions for the CLI layer.
 */

import { isPlayerUnavailableError } from '@/ipc/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Pick the exit code for an error thrown by a command.
 *
 * Errors from this codebase carry their own semantic `exitCode`; anything else
 * is an unhandled exception.
 */
export function getExitCode(error: unknown): number {
  if (error instanceof Error && 'exitCode' in error && typeof error.exitCode === 'number') {
    return error.exitCode;
  }
  return EXIT_CODES.UNHANDLED_EXCEPTION;
}

/**
 * Detect whether an error means mpv is not listening on the socket.
 */
export function isPlayerNotRunningError(error: unknown): boolean {
  return isPlayerUnavailableError(error);
}
