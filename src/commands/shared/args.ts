/**
 * Argument parsing for CLI commands.
 *
 * Commander hands every positional over as a string; mpv wants typed JSON
 * scalars. These helpers do the conversion and report bad input as
 * CommandError with INVALID_ARGUMENTS.
 */

import type { CommandArg } from '@/ipc/index.js';
import { CommandError } from '@/ui/errors/index.js';

const NUMBER_PATTERN = /^-?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;

/**
 * Convert a command-line token to the scalar mpv expects.
 *
 * `true`/`false` become booleans, numeric literals become numbers, and
 * anything else stays a string. With `strings` set, every token stays a string.
 *
 * @example
 * ```typescript
 * parseCommandArg('50');          // → 50
 * parseCommandArg('yes');         // → 'yes'
 * parseCommandArg('50', true);    // → '50'
 * ```
 */
export function parseCommandArg(raw: string, strings = false): CommandArg {
  if (strings) {
    return raw;
  }
  if (raw === 'true') {
    return true;
  }
  if (raw === 'false') {
    return false;
  }
  if (NUMBER_PATTERN.test(raw)) {
    const value = Number(raw);
    if (Number.isFinite(value)) {
      return value;
    }
  }
  return raw;
}

export function parseCommandArgs(raw: readonly string[], strings = false): CommandArg[] {
  return raw.map((token) => parseCommandArg(token, strings));
}

/**
 * Parse a required numeric argument.
 *
 * @param raw - Token from the command line
 * @param label - Argument name used in the error message
 * @throws CommandError when the token is not a finite number
 */
export function parseNumber(raw: string, label: string): number {
  const value = NUMBER_PATTERN.test(raw) ? Number(raw) : NaN;
  if (!Number.isFinite(value)) {
    throw CommandError.invalidArgument(`Invalid ${label}: "${raw}"`, `${label} must be a number`);
  }
  return value;
}

/**
 * Parse a timeout given in milliseconds.
 *
 * @throws CommandError unless the value is a positive integer
 */
export function parseTimeout(raw: string): number {
  const value = /^\d+$/.test(raw) ? parseInt(raw, 10) : NaN;
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw CommandError.invalidArgument(
      `Invalid timeout: "${raw}"`,
      'Pass the timeout in milliseconds, e.g. --timeout 5000'
    );
  }
  return value;
}
