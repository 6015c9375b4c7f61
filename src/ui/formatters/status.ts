/**
 * Playback status formatting.
 */

import { formatTimestamp, OutputFormatter } from '@/ui/formatting.js';
import type { PlaybackStatus } from '@/player/index.js';

/**
 * Format playback status for human-readable output.
 *
 * @example
 * ```
 * File:     movie.mkv
 * State:    playing
 * Position: 1:15 / 1:30:00
 * Volume:   60 (muted)
 * ```
 */
export function formatPlaybackStatus(status: PlaybackStatus): string {
  const state = status.idle ? 'idle' : status.paused ? 'paused' : 'playing';
  const position =
    status.position === null
      ? '-'
      : status.duration === null
        ? formatTimestamp(status.position)
        : `${formatTimestamp(status.position)} / ${formatTimestamp(status.duration)}`;
  const volume = `${Math.round(status.volume)}${status.muted ? ' (muted)' : ''}`;

  return new OutputFormatter()
    .keyValueList([
      ['File', status.filename ?? '-'],
      ['State', state],
      ['Position', position],
      ['Volume', volume],
    ])
    .build();
}
