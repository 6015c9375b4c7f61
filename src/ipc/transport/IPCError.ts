/**
 * Structured IPC error classes.
 *
 * Every failure a call to the player can end in has its own class, so callers can
 * tell "the command never left the client" from "the command was sent but never
 * answered" from "the client is shut down".
 */

import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Base class for all IPC-related errors.
 *
 * Extends Error to include exit codes for consistent CLI behavior.
 */
export class IPCError extends Error {
  public readonly exitCode: number;

  constructor(message: string, exitCode: number = EXIT_CODES.SOFTWARE_ERROR, cause?: Error) {
    super(message);
    this.name = 'IPCError';
    this.exitCode = exitCode;
    if (cause !== undefined) {
      this.cause = cause;
    }

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

// ============================================================================
// Transport errors
// ============================================================================

/**
 * Error thrown when the socket cannot be dialed.
 *
 * @example
 * ```typescript
 * throw new ConnectionError('Failed to connect to player socket', '/tmp/mpvsocket', 'ENOENT');
 * ```
 */
export class ConnectionError extends IPCError {
  public override readonly name = 'ConnectionError';
  public readonly socketPath: string;
  public readonly code?: string;

  constructor(message: string, socketPath: string, code?: string, cause?: Error) {
    super(
      message,
      code === 'ENOENT' ? EXIT_CODES.RESOURCE_NOT_FOUND : EXIT_CODES.CONNECTION_FAILURE,
      cause
    );
    this.socketPath = socketPath;
    if (code !== undefined) {
      this.code = code;
    }
  }
}

/**
 * Error raised when the peer closes the stream (or it fails) while the client is open.
 *
 * Becomes the client's cancellation reason: in-flight and later calls fail with it.
 */
export class ConnectionClosedError extends IPCError {
  public override readonly name = 'ConnectionClosedError';

  constructor(socketPath: string, cause?: Error) {
    super(`Connection to ${socketPath} closed by peer`, EXIT_CODES.CONNECTION_FAILURE, cause);
  }
}

/**
 * Error completing a request whose line could not be written to the socket.
 */
export class WriteError extends IPCError {
  public override readonly name = 'WriteError';
  public readonly requestId: number;

  constructor(requestId: number, cause: Error) {
    super(
      `Failed to write request ${requestId}: ${cause.message}`,
      EXIT_CODES.CONNECTION_FAILURE,
      cause
    );
    this.requestId = requestId;
  }
}

// ============================================================================
// Timeout errors
// ============================================================================

/**
 * Phase of a call in which a deadline elapsed.
 */
export type CallPhase = 'send' | 'recv';

/**
 * Base class for per-phase call timeouts.
 */
export class IPCTimeoutError extends IPCError {
  public override readonly name: string = 'IPCTimeoutError';
  public readonly phase: CallPhase;
  public readonly requestName: string;
  public readonly timeoutMs: number;

  constructor(phase: CallPhase, requestName: string, timeoutMs: number, message: string) {
    super(message, EXIT_CODES.IPC_TIMEOUT);
    this.phase = phase;
    this.requestName = requestName;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The writer did not accept the request in time: the command never left the client.
 *
 * @example
 * ```typescript
 * throw new SendTimeoutError('get_property', 2000);
 * ```
 */
export class SendTimeoutError extends IPCTimeoutError {
  public override readonly name = 'SendTimeoutError';

  constructor(requestName: string, timeoutMs: number) {
    super('send', requestName, timeoutMs, `Timeout after ${timeoutMs}ms while sending ${requestName}`);
  }
}

/**
 * The request was handed to the writer but no reply arrived in time.
 *
 * @example
 * ```typescript
 * throw new RecvTimeoutError('get_property', 2000);
 * ```
 */
export class RecvTimeoutError extends IPCTimeoutError {
  public override readonly name = 'RecvTimeoutError';

  constructor(requestName: string, timeoutMs: number) {
    super(
      'recv',
      requestName,
      timeoutMs,
      `Timeout after ${timeoutMs}ms while waiting for ${requestName} response`
    );
  }
}

// ============================================================================
// Lifecycle errors
// ============================================================================

/**
 * Cancellation error: the client was closed before or during the call.
 */
export class ClientClosedError extends IPCError {
  public override readonly name = 'ClientClosedError';

  constructor() {
    super('IPC client is closed', EXIT_CODES.CONNECTION_FAILURE);
  }
}

/**
 * The reply slot was closed without a value (teardown path).
 */
export class ChannelClosedError extends IPCError {
  public override readonly name = 'ChannelClosedError';
  public readonly requestId: number;

  constructor(requestId: number) {
    super(`Response channel for request ${requestId} closed`, EXIT_CODES.CONNECTION_FAILURE);
    this.requestId = requestId;
  }
}

// ============================================================================
// Codec and correlation errors
// ============================================================================

/**
 * A command could not be represented in the wire format.
 */
export class EncodingError extends IPCError {
  public override readonly name = 'EncodingError';

  constructor(message: string, cause?: Error) {
    super(`Failed to encode command: ${message}`, EXIT_CODES.INVALID_ARGUMENTS, cause);
  }
}

/**
 * An inbound line is not a well-formed reply or notification.
 */
export class DecodingError extends IPCError {
  public override readonly name = 'DecodingError';
  public readonly line: string;

  constructor(line: string, message: string, cause?: Error) {
    super(`Failed to decode line: ${message}`, EXIT_CODES.SOFTWARE_ERROR, cause);
    this.line = line;
  }
}

/**
 * A correlation id was registered while still pending.
 *
 * Indicates a local id allocation bug; surfaced to the caller rather than
 * overwriting the pending entry and misrouting its reply.
 */
export class DuplicateIdError extends IPCError {
  public override readonly name = 'DuplicateIdError';
  public readonly requestId: number;

  constructor(requestId: number) {
    super(`Request id ${requestId} is already pending`, EXIT_CODES.SOFTWARE_ERROR);
    this.requestId = requestId;
  }
}
