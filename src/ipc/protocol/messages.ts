/**
 * Wire Message Types
 *
 * Shapes of the JSON objects exchanged with mpv over the IPC socket, and the
 * decoded forms the client hands to callers.
 */

/**
 * One argument of a command: mpv accepts strings, numbers and booleans.
 */
export type CommandArg = string | number | boolean;

/**
 * An ordered argument list, command name first.
 *
 * @example
 * ```typescript
 * const command: Command = ['set_property', 'volume', 50];
 * ```
 */
export type Command = readonly CommandArg[];

/**
 * Outbound wire object.
 */
export interface WireRequest {
  command: CommandArg[];
  request_id: number;
}

/**
 * Inbound wire object. Every field is optional on the wire.
 */
export interface WireReply {
  error?: string;
  data?: unknown;
  event?: string;
  request_id?: number;
}

/**
 * A command paired with its correlation id.
 */
export interface EncodableRequest {
  command: Command;
  requestId: number;
}

/**
 * Parsed inbound message.
 *
 * A reply when `event` is empty, a notification otherwise.
 */
export interface Reply {
  /** Empty on success; otherwise mpv's error string (e.g. "property unavailable") */
  error: string;
  /** Opaque payload; its type depends on the command */
  data: unknown;
  /** Event name; non-empty marks a notification */
  event: string;
  /** Correlation id; meaningful only when `event` is empty */
  requestId: number;
}

/**
 * Unsolicited message from the player.
 */
export interface Notification {
  event: string;
  data: unknown;
  /** The complete decoded object, including event-specific keys such as `name` and `id` */
  fields: Readonly<Record<string, unknown>>;
}
