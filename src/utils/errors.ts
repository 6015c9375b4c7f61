/**
 * Error handling utilities.
 *
 * Pure helpers for working with values caught as `unknown`.
 */

/**
 * Extract error message from unknown error type.
 *
 * @param error - Error of unknown type
 * @returns `error.message` for Error instances, `String(error)` otherwise
 *
 * @example
 * ```typescript
 * try {
 *   await client.execute(['get_property', 'volume']);
 * } catch (error) {
 *   console.error(`Failed: ${getErrorMessage(error)}`);
 * }
 * ```
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Normalize an unknown thrown value into an Error instance.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Read the errno code (ENOENT, ECONNREFUSED, EPIPE, ...) from a Node.js system error.
 *
 * @returns The code, or undefined when the value carries none
 */
export function getErrnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
