/**
 * Player API
 *
 * Typed mpv operations built on the IPC client's Executor interface.
 */

export { PlayerClient } from './PlayerClient.js';
export { CommandRejectedError, InvalidTypeError, PlayerError } from './errors.js';
export { parseTrack, parseTrackList } from './tracks.js';
export * from './types.js';
