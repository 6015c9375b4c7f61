/**
 * Common error messages and patterns.
 *
 * Centralized location for reusable error messages with consistent formatting.
 */

import { joinLines } from '@/ui/formatting.js';

/**
 * Generate "player not running" error message.
 *
 * @param socketPath - Socket the CLI tried to reach
 * @returns Formatted error message with suggestions
 *
 * @example
 * ```typescript
 * console.error(playerNotRunningError('/tmp/mpvsocket'));
 * ```
 */
export function playerNotRunningError(socketPath: string): string {
  return joinLines(
    'Error: mpv is not listening on the IPC socket',
    `  Socket: ${socketPath}`,
    '',
    'Start mpv with the IPC server enabled:',
    `  mpv --idle --input-ipc-server=${socketPath}`,
    '',
    'Or point mpvctl at another socket:',
    '  mpvctl --socket <path> <command>'
  );
}

/**
 * Generate generic error message.
 *
 * @param message - Error message
 * @param context - Optional additional context
 */
export function genericError(message: string, context?: string): string {
  if (context) {
    return `Error: ${message}\n${context}`;
  }
  return `Error: ${message}`;
}

/**
 * Generate "unknown error" message.
 */
export function unknownError(): string {
  return 'Error: Unknown error';
}
