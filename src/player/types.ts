/**
 * Player API Types
 */

/** How `loadfile` treats the current playlist */
export const LOAD_FILE_MODES = ['replace', 'append', 'append-play'] as const;
export type LoadFileMode = (typeof LOAD_FILE_MODES)[number];

/** How `loadlist` treats the current playlist */
export const LOAD_LIST_MODES = ['replace', 'append'] as const;
export type LoadListMode = (typeof LOAD_LIST_MODES)[number];

/** Reference point for `seek` */
export type SeekMode = 'relative' | 'absolute' | 'absolute-percent' | 'relative-percent';

/**
 * Flags for `sub-add`.
 *
 * - select: select the subtitle immediately
 * - auto: let the default stream selection decide
 * - cached: reuse an already-added subtitle with the same filename
 */
export type SubtitleFlag = 'select' | 'auto' | 'cached';

export type TrackType = 'video' | 'audio' | 'sub';

/**
 * One entry of the `track-list` property.
 */
export interface Track {
  /** Unique within its type */
  id: number;
  type: TrackType | string;
  srcId?: number | undefined;
  title?: string | undefined;
  lang?: string | undefined;
  albumart: boolean;
  default: boolean;
  forced: boolean;
  external: boolean;
  selected: boolean;
  ffIndex?: number | undefined;
  decoderDesc?: string | undefined;
  codec?: string | undefined;
  externalFilename?: string | undefined;
  /** Video tracks */
  demuxW?: number | undefined;
  demuxH?: number | undefined;
  demuxFps?: number | undefined;
  /** Audio tracks */
  audioChannels?: number | undefined;
  demuxChannelCount?: number | undefined;
  demuxChannels?: string | undefined;
  demuxSamplerate?: number | undefined;
}

/**
 * Summary of the current playback state.
 */
export interface PlaybackStatus {
  filename: string | null;
  paused: boolean;
  idle: boolean;
  position: number | null;
  duration: number | null;
  volume: number;
  muted: boolean;
}
