/**
 * JSONL Codec Unit Tests
 *
 * Tests line framing and the request/reply codec.
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { MAX_REQUEST_ID } from '@/constants.js';
import type { EncodableRequest } from '@/ipc/protocol/index.js';
import { DecodingError, EncodingError } from '@/ipc/transport/IPCError.js';
import {
  decodeReply,
  decodeRequest,
  describeCommand,
  encodeReply,
  encodeRequest,
  JSONLBuffer,
  toJSONLFrame,
} from '@/ipc/transport/jsonl.js';

void describe('JSONLBuffer', () => {
  void it('handles partial frames across chunks', () => {
    const buffer = new JSONLBuffer();

    assert.deepEqual(buffer.process('{"request_id":'), []);
    assert.deepEqual(buffer.process('1}\n'), ['{"request_id":1}']);
  });

  void it('processes multiple complete frames in one chunk', () => {
    const buffer = new JSONLBuffer();

    const lines = buffer.process('{"a":1}\n{"b":2}\n{"c":3}\n');
    assert.deepEqual(lines, ['{"a":1}', '{"b":2}', '{"c":3}']);
  });

  void it('filters out blank lines', () => {
    const buffer = new JSONLBuffer();

    const lines = buffer.process('{"a":1}\n\n{"b":2}\n   \n');
    assert.deepEqual(lines, ['{"a":1}', '{"b":2}']);
  });

  void it('keeps the unterminated tail until clear()', () => {
    const buffer = new JSONLBuffer();

    buffer.process('{"a":1}\n{"incomplete":');
    assert.equal(buffer.getBuffer(), '{"incomplete":');

    buffer.clear();
    assert.deepEqual(buffer.process('{"new":true}\n'), ['{"new":true}']);
  });
});

void describe('toJSONLFrame', () => {
  void it('appends a newline to the JSON text', () => {
    assert.equal(toJSONLFrame({ a: 1 }), '{"a":1}\n');
  });
});

void describe('encodeRequest', () => {
  void it('writes the command and request_id as one line', () => {
    const line = encodeRequest({ command: ['get_property', 'pause'], requestId: 7 });
    assert.equal(line, '{"command":["get_property","pause"],"request_id":7}\n');
  });

  void it('keeps number and boolean arguments typed', () => {
    const line = encodeRequest({ command: ['set_property', 'volume', 55.5], requestId: 2 });
    assert.equal(line, '{"command":["set_property","volume",55.5],"request_id":2}\n');

    const flag = encodeRequest({ command: ['set_property', 'pause', true], requestId: 3 });
    assert.equal(flag, '{"command":["set_property","pause",true],"request_id":3}\n');
  });

  void it('rejects an empty command', () => {
    assert.throws(() => encodeRequest({ command: [], requestId: 1 }), {
      name: 'EncodingError',
      message: 'Failed to encode command: command is empty',
    });
  });

  void it('rejects non-finite numbers', () => {
    assert.throws(
      () => encodeRequest({ command: ['seek', Number.NaN], requestId: 1 }),
      (error: unknown) =>
        error instanceof EncodingError &&
        error.message === 'Failed to encode command: argument 1 is not representable (NaN)'
    );
  });

  void it('rejects negative or fractional request ids', () => {
    assert.throws(() => encodeRequest({ command: ['stop'], requestId: -1 }), EncodingError);
    assert.throws(() => encodeRequest({ command: ['stop'], requestId: 1.5 }), EncodingError);
  });
});

void describe('decodeReply', () => {
  void it('normalizes the "success" marker to an empty error', () => {
    assert.deepEqual(decodeReply('{"error":"success","data":false,"request_id":1}'), {
      error: '',
      data: false,
      event: '',
      requestId: 1,
    });
  });

  void it('keeps player error strings', () => {
    const reply = decodeReply('{"error":"property unavailable","request_id":4}');
    assert.equal(reply.error, 'property unavailable');
    assert.equal(reply.data, undefined);
  });

  void it('decodes events with request_id defaulting to 0', () => {
    assert.deepEqual(decodeReply('{"event":"pause"}'), {
      error: '',
      data: undefined,
      event: 'pause',
      requestId: 0,
    });
  });

  void it('keeps structured data as decoded JSON', () => {
    const reply = decodeReply('{"error":"success","data":{"w":1920,"h":1080},"request_id":9}');
    assert.deepEqual(reply.data, { w: 1920, h: 1080 });
  });

  void it('throws DecodingError on invalid JSON', () => {
    assert.throws(
      () => decodeReply('not json'),
      (error: unknown) => error instanceof DecodingError && error.line === 'not json'
    );
  });

  void it('throws DecodingError on non-object values', () => {
    assert.throws(() => decodeReply('[1,2]'), {
      message: 'Failed to decode line: expected an object, got array',
    });
  });

  void it('throws DecodingError when fields have the wrong type', () => {
    assert.throws(() => decodeReply('{"request_id":"1"}'), {
      message: 'Failed to decode line: "request_id" must be an integer, got string',
    });
    assert.throws(() => decodeReply('{"error":42,"request_id":1}'), {
      message: 'Failed to decode line: "error" must be a string, got 42',
    });
  });
});

void describe('peer codec', () => {
  void it('decodes a request line written by encodeRequest', () => {
    const line = encodeRequest({ command: ['loadfile', 'a.mkv', 'append'], requestId: 12 });
    assert.deepEqual(decodeRequest(line.trimEnd()), {
      command: ['loadfile', 'a.mkv', 'append'],
      requestId: 12,
    });
  });

  const requests: Array<[string, EncodableRequest]> = [
    ['negative and fractional numbers', { command: ['seek', -12.75, 'relative'], requestId: 1 }],
    ['tiny and huge numbers', { command: ['set_property', 'speed', 1e-7, 1e21], requestId: 2 }],
    ['booleans', { command: ['set_property', 'pause', true, false], requestId: 3 }],
    ['an empty string', { command: ['show-text', ''], requestId: 4 }],
    ['non-ASCII text', { command: ['loadfile', '/media/Ünïcødé 日本語 🎵.mkv'], requestId: 5 }],
    ['quotes and newlines', { command: ['show-text', 'say "hi"\nbye\\'], requestId: 6 }],
    ['the largest request id', { command: ['get_version'], requestId: MAX_REQUEST_ID }],
  ];

  for (const [label, request] of requests) {
    void it(`round-trips a request with ${label}`, () => {
      const line = encodeRequest(request);

      assert.equal(line.indexOf('\n'), line.length - 1);
      assert.deepEqual(decodeRequest(line.trimEnd()), request);
    });
  }

  void it('encodes successful replies with the "success" marker', () => {
    const line = encodeReply({ error: '', data: 50, event: '', requestId: 3 });
    assert.equal(line, '{"request_id":3,"error":"success","data":50}\n');
  });

  void it('encodes events without request_id or error', () => {
    const line = encodeReply({ error: '', data: undefined, event: 'idle', requestId: 0 });
    assert.equal(line, '{"event":"idle"}\n');
  });
});

void describe('describeCommand', () => {
  void it('names a command by its first argument', () => {
    assert.equal(describeCommand(['get_property', 'pause']), 'get_property');
    assert.equal(describeCommand([]), '<empty>');
  });
});
