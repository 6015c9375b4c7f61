/**
 * Output Formatting Unit Tests
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { formatNotification } from '@/commands/watch.js';
import { formatPlaybackStatus } from '@/ui/formatters/status.js';
import { formatTimestamp, formatValue, joinLines } from '@/ui/formatting.js';

void describe('formatTimestamp', () => {
  void it('prints minutes and seconds below an hour', () => {
    assert.equal(formatTimestamp(0), '0:00');
    assert.equal(formatTimestamp(75.9), '1:15');
  });

  void it('adds hours when needed', () => {
    assert.equal(formatTimestamp(3725), '1:02:05');
  });

  void it('clamps negative positions to zero', () => {
    assert.equal(formatTimestamp(-3), '0:00');
  });
});

void describe('formatValue', () => {
  void it('prints strings raw and everything else as JSON', () => {
    assert.equal(formatValue('clip.mkv'), 'clip.mkv');
    assert.equal(formatValue(42), '42');
    assert.equal(formatValue(null), 'null');
    assert.equal(formatValue({ w: 640 }), '{"w":640}');
    assert.equal(formatValue(undefined), '(no data)');
  });
});

void describe('joinLines', () => {
  void it('skips absent lines', () => {
    assert.equal(joinLines('a', undefined, false, null, 'b'), 'a\nb');
  });
});

void describe('formatPlaybackStatus', () => {
  void it('shows an idle player', () => {
    const output = formatPlaybackStatus({
      filename: null,
      paused: false,
      idle: true,
      position: null,
      duration: null,
      volume: 100,
      muted: false,
    });

    assert.equal(
      output,
      ['File:     -', 'State:    idle', 'Position: -', 'Volume:   100'].join('\n')
    );
  });

  void it('shows a paused stream without duration', () => {
    const output = formatPlaybackStatus({
      filename: 'live.ts',
      paused: true,
      idle: false,
      position: 30,
      duration: null,
      volume: 62.6,
      muted: false,
    });

    assert.equal(
      output,
      ['File:     live.ts', 'State:    paused', 'Position: 0:30', 'Volume:   63'].join('\n')
    );
  });
});

void describe('formatNotification', () => {
  void it('prints property changes as name=value', () => {
    assert.equal(
      formatNotification({
        event: 'property-change',
        data: true,
        fields: { event: 'property-change', id: 2, name: 'pause', data: true },
      }),
      'property-change pause=true'
    );
  });

  void it('prints other events with their extra fields', () => {
    assert.equal(
      formatNotification({
        event: 'end-file',
        data: undefined,
        fields: { event: 'end-file', reason: 'eof', playlist_entry_id: 3 },
      }),
      'end-file reason=eof playlist_entry_id=3'
    );
  });
});
