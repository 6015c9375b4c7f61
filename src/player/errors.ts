/**
 * Player-level error classes.
 *
 * These describe what the player answered, as opposed to transport errors
 * (see @/ipc/transport/IPCError.ts), which describe why no answer came back.
 */

import type { Command } from '@/ipc/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Base class for errors derived from a reply the player did send.
 */
export abstract class PlayerError extends Error {
  abstract readonly code: string;
  abstract readonly exitCode: number;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * The player answered the command with an error string.
 *
 * @example
 * ```typescript
 * // mpv: {"request_id":3,"error":"property unavailable"}
 * throw new CommandRejectedError(['get_property', 'duration'], 'property unavailable');
 * ```
 */
export class CommandRejectedError extends PlayerError {
  readonly code = 'COMMAND_REJECTED';
  readonly exitCode = EXIT_CODES.COMMAND_REJECTED;
  readonly command: Command;
  readonly playerError: string;

  constructor(command: Command, playerError: string) {
    super(`mpv rejected ${command.map(String).join(' ')}: ${playerError}`);
    this.command = command;
    this.playerError = playerError;
  }
}

/**
 * The reply data does not have the type the operation documents.
 */
export class InvalidTypeError extends PlayerError {
  readonly code = 'INVALID_TYPE';
  readonly exitCode = EXIT_CODES.SOFTWARE_ERROR;
  readonly property: string;

  constructor(property: string, expected: string, actual: unknown) {
    super(`Property ${property}: expected ${expected}, got ${describe(actual)}`);
    this.property = property;
  }
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'no data';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
