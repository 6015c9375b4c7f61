/**
 * Track List Decoding
 *
 * Converts mpv's `track-list` property (kebab-case keys) into Track objects.
 */

import { isRecord } from '@/ipc/transport/jsonl.js';

import { InvalidTypeError } from './errors.js';
import type { Track } from './types.js';

function readNumber(entry: Record<string, unknown>, key: string): number | undefined {
  const value = entry[key];
  return typeof value === 'number' ? value : undefined;
}

function readString(entry: Record<string, unknown>, key: string): string | undefined {
  const value = entry[key];
  return typeof value === 'string' ? value : undefined;
}

function readFlag(entry: Record<string, unknown>, key: string): boolean {
  return entry[key] === true;
}

/**
 * Decode one track entry.
 *
 * @throws InvalidTypeError if the entry is not an object with numeric `id` and string `type`
 */
export function parseTrack(entry: unknown): Track {
  if (!isRecord(entry)) {
    throw new InvalidTypeError('track-list', 'object entries', entry);
  }
  const id = readNumber(entry, 'id');
  const type = readString(entry, 'type');
  if (id === undefined || type === undefined) {
    throw new InvalidTypeError('track-list', 'entries with id and type', entry);
  }

  return {
    id,
    type,
    srcId: readNumber(entry, 'src-id'),
    title: readString(entry, 'title'),
    lang: readString(entry, 'lang'),
    albumart: readFlag(entry, 'albumart'),
    default: readFlag(entry, 'default'),
    forced: readFlag(entry, 'forced'),
    external: readFlag(entry, 'external'),
    selected: readFlag(entry, 'selected'),
    ffIndex: readNumber(entry, 'ff-index'),
    decoderDesc: readString(entry, 'decoder-desc'),
    codec: readString(entry, 'codec'),
    externalFilename: readString(entry, 'external-filename'),
    demuxW: readNumber(entry, 'demux-w'),
    demuxH: readNumber(entry, 'demux-h'),
    demuxFps: readNumber(entry, 'demux-fps'),
    audioChannels: readNumber(entry, 'audio-channels'),
    demuxChannelCount: readNumber(entry, 'demux-channel-count'),
    demuxChannels: readString(entry, 'demux-channels'),
    demuxSamplerate: readNumber(entry, 'demux-samplerate'),
  };
}

/**
 * Decode the whole `track-list` value.
 */
export function parseTrackList(data: unknown): Track[] {
  if (!Array.isArray(data)) {
    throw new InvalidTypeError('track-list', 'array', data);
  }
  const entries: unknown[] = data;
  return entries.map(parseTrack);
}
