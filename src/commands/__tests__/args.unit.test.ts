/**
 * CLI Argument Parsing Unit Tests
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  parseCommandArg,
  parseCommandArgs,
  parseNumber,
  parseTimeout,
} from '@/commands/shared/args.js';
import { toClientOptions } from '@/commands/shared/connection.js';
import { CommandError } from '@/ui/errors/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

void describe('parseCommandArg', () => {
  void it('coerces numbers and booleans', () => {
    assert.deepEqual(parseCommandArgs(['set_property', 'volume', '50']), [
      'set_property',
      'volume',
      50,
    ]);
    assert.equal(parseCommandArg('-2.5'), -2.5);
    assert.equal(parseCommandArg('1e3'), 1000);
    assert.equal(parseCommandArg('true'), true);
    assert.equal(parseCommandArg('false'), false);
  });

  void it('leaves other tokens as strings', () => {
    assert.equal(parseCommandArg('yes'), 'yes');
    assert.equal(parseCommandArg('1.2.3'), '1.2.3');
    assert.equal(parseCommandArg(''), '');
    assert.equal(parseCommandArg('0x10'), '0x10');
  });

  void it('keeps every token a string when asked', () => {
    assert.deepEqual(parseCommandArgs(['show-text', '42', 'true'], true), [
      'show-text',
      '42',
      'true',
    ]);
  });
});

void describe('parseNumber', () => {
  void it('parses signed decimals', () => {
    assert.equal(parseNumber('-10', 'seconds'), -10);
    assert.equal(parseNumber('3.5', 'seconds'), 3.5);
  });

  void it('rejects non-numeric input with INVALID_ARGUMENTS', () => {
    assert.throws(
      () => parseNumber('ten', 'seconds'),
      (error: unknown) =>
        error instanceof CommandError &&
        error.message === 'Invalid seconds: "ten"' &&
        error.exitCode === EXIT_CODES.INVALID_ARGUMENTS
    );
    assert.throws(() => parseNumber('', 'volume'), CommandError);
  });
});

void describe('parseTimeout', () => {
  void it('accepts positive integers', () => {
    assert.equal(parseTimeout('1500'), 1500);
  });

  void it('rejects zero, negatives and fractions', () => {
    for (const raw of ['0', '-5', '2.5', 'soon']) {
      assert.throws(() => parseTimeout(raw), { message: `Invalid timeout: "${raw}"` });
    }
  });
});

void describe('toClientOptions', () => {
  void it('maps global flags onto client options', () => {
    assert.deepEqual(toClientOptions({ socket: '/tmp/other', timeout: '250' }), {
      socketPath: '/tmp/other',
      timeoutMs: 250,
    });
  });

  void it('leaves unset flags to the client defaults', () => {
    assert.deepEqual(toClientOptions({ debug: true }), {});
  });
});
