/**
 * JSONL Wire Codec
 *
 * Newline-delimited JSON framing and the mpv IPC message codec.
 * Stateless apart from JSONLBuffer, which carries partial lines between chunks.
 */

import { MPV_SUCCESS } from '@/constants.js';
import type {
  Command,
  CommandArg,
  EncodableRequest,
  Reply,
  WireReply,
  WireRequest,
} from '@/ipc/protocol/index.js';
import { getErrorMessage, toError } from '@/utils/errors.js';

import { DecodingError, EncodingError } from './IPCError.js';

/**
 * JSONL buffer for accumulating partial frames.
 */
export class JSONLBuffer {
  private buffer = '';

  /**
   * Append a chunk and return every complete, non-blank line it finished.
   */
  process(chunk: string): string[] {
    this.buffer += chunk;
    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';
    return lines.filter((line) => line.trim());
  }

  clear(): void {
    this.buffer = '';
  }

  getBuffer(): string {
    return this.buffer;
  }
}

/**
 * Serialize object to JSONL frame (JSON + newline).
 */
export function toJSONLFrame(obj: unknown): string {
  return JSON.stringify(obj) + '\n';
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCommandArg(value: unknown): value is CommandArg {
  return (
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  );
}

function describeValue(value: unknown): string {
  if (typeof value === 'number') return String(value);
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

// ============================================================================
// Client side: requests out, replies in
// ============================================================================

/**
 * Encode a request as one wire line.
 *
 * @returns `{"command":[...],"request_id":n}` followed by a newline
 * @throws EncodingError if the command is empty, an argument is not a string,
 *         finite number or boolean, or the id is not a non-negative safe integer
 *
 * @example
 * ```typescript
 * encodeRequest({ command: ['get_property', 'pause'], requestId: 7 });
 * // → '{"command":["get_property","pause"],"request_id":7}\n'
 * ```
 */
export function encodeRequest(request: EncodableRequest): string {
  const { command, requestId } = request;

  if (!Number.isSafeInteger(requestId) || requestId < 0) {
    throw new EncodingError(`invalid request_id ${requestId}`);
  }
  if (command.length === 0) {
    throw new EncodingError('command is empty');
  }

  const args: unknown[] = [...command];
  args.forEach((arg, index) => {
    if (!isCommandArg(arg)) {
      throw new EncodingError(`argument ${index} is not representable (${describeValue(arg)})`);
    }
  });

  const wire: WireRequest = { command: [...command], request_id: requestId };
  try {
    return toJSONLFrame(wire);
  } catch (error) {
    throw new EncodingError(getErrorMessage(error), toError(error));
  }
}

/**
 * Parse one line into a JSON object.
 *
 * @throws DecodingError on invalid JSON or a non-object value
 */
export function parseJSONLObject(line: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (error) {
    throw new DecodingError(line, getErrorMessage(error), toError(error));
  }
  if (!isRecord(parsed)) {
    throw new DecodingError(line, `expected an object, got ${describeValue(parsed)}`);
  }
  return parsed;
}

/**
 * Interpret a decoded object as a Reply.
 *
 * mpv reports success as the string "success"; it is normalized to the empty
 * string so that `reply.error === ''` is the only success test callers need.
 *
 * @throws DecodingError if a present field has the wrong JSON type
 */
export function toReply(fields: Record<string, unknown>, line: string): Reply {
  const { error, data, event } = fields;
  const requestId = fields['request_id'];

  if (error !== undefined && typeof error !== 'string') {
    throw new DecodingError(line, `"error" must be a string, got ${describeValue(error)}`);
  }
  if (event !== undefined && typeof event !== 'string') {
    throw new DecodingError(line, `"event" must be a string, got ${describeValue(event)}`);
  }
  if (requestId !== undefined && !Number.isSafeInteger(requestId)) {
    throw new DecodingError(
      line,
      `"request_id" must be an integer, got ${describeValue(requestId)}`
    );
  }

  return {
    error: error === undefined || error === MPV_SUCCESS ? '' : error,
    data,
    event: event ?? '',
    requestId: typeof requestId === 'number' ? requestId : 0,
  };
}

/**
 * Decode one inbound line into a Reply.
 *
 * @throws DecodingError on malformed input
 *
 * @example
 * ```typescript
 * decodeReply('{"error":"success","data":false,"request_id":7}');
 * // → { error: '', data: false, event: '', requestId: 7 }
 * ```
 */
export function decodeReply(line: string): Reply {
  return toReply(parseJSONLObject(line), line);
}

// ============================================================================
// Peer side: requests in, replies out
// ============================================================================

/**
 * Decode a request line as the player would receive it.
 *
 * @throws DecodingError on malformed input
 */
export function decodeRequest(line: string): EncodableRequest {
  const fields = parseJSONLObject(line);
  const command = fields['command'];
  const requestId = fields['request_id'];

  if (!Array.isArray(command)) {
    throw new DecodingError(line, '"command" must be an array');
  }
  const args: unknown[] = command;
  const typedArgs = args.filter(isCommandArg);
  if (typedArgs.length !== args.length) {
    throw new DecodingError(line, '"command" must only contain strings, numbers and booleans');
  }
  if (requestId !== undefined && !Number.isSafeInteger(requestId)) {
    throw new DecodingError(line, '"request_id" must be an integer');
  }

  return { command: typedArgs, requestId: typeof requestId === 'number' ? requestId : 0 };
}

/**
 * Encode a reply or notification as the player would send it.
 */
export function encodeReply(reply: Reply): string {
  if (reply.event !== '') {
    const wire: WireReply = { event: reply.event };
    if (reply.data !== undefined) {
      wire.data = reply.data;
    }
    return toJSONLFrame(wire);
  }

  const wire: WireReply = {
    request_id: reply.requestId,
    error: reply.error === '' ? MPV_SUCCESS : reply.error,
  };
  if (reply.data !== undefined) {
    wire.data = reply.data;
  }
  return toJSONLFrame(wire);
}

/**
 * Short human-readable name for a command, used in log lines and error messages.
 */
export function describeCommand(command: Command): string {
  const [name] = command;
  return name === undefined ? '<empty>' : String(name);
}
