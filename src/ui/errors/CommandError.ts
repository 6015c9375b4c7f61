/**
 * CLI-level errors: bad input or an impossible request, detected before or
 * instead of talking to the player.
 */

import { EXIT_CODES, type ExitCode } from '@/utils/exitCodes.js';

/**
 * Hints printed after the error line (human output) or merged into the JSON
 * error envelope.
 */
export interface ErrorMetadata {
  suggestion?: string;
  note?: string;
}

/**
 * @example
 * ```typescript
 * throw CommandError.invalidArgument('Invalid volume: "loud"', 'volume must be a number');
 * ```
 */
export class CommandError extends Error {
  public override readonly name = 'CommandError';
  public readonly metadata: ErrorMetadata;
  public readonly exitCode: ExitCode;

  constructor(
    message: string,
    metadata: ErrorMetadata = {},
    exitCode: ExitCode = EXIT_CODES.GENERIC_FAILURE
  ) {
    super(message);
    this.metadata = metadata;
    this.exitCode = exitCode;
    Error.captureStackTrace(this, new.target);
  }

  /**
   * A command-line value that cannot be used as given.
   */
  static invalidArgument(message: string, suggestion?: string): CommandError {
    return new CommandError(
      message,
      suggestion === undefined ? {} : { suggestion },
      EXIT_CODES.INVALID_ARGUMENTS
    );
  }
}
