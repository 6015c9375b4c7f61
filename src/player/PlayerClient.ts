/**
 * Player Client
 *
 * Named mpv operations on top of any Executor. Translates each operation into
 * a protocol command and decodes the reply data into the documented type;
 * holds no state of its own.
 */

import type { Command, CommandArg, Executor, Reply } from '@/ipc/index.js';
import { createLogger } from '@/ui/logging/index.js';

import { CommandRejectedError, InvalidTypeError } from './errors.js';
import { parseTrackList } from './tracks.js';
import type {
  LoadFileMode,
  LoadListMode,
  PlaybackStatus,
  SeekMode,
  SubtitleFlag,
  Track,
} from './types.js';

const log = createLogger('player');

export class PlayerClient {
  constructor(private readonly executor: Executor) {}

  /**
   * Run a command and return the reply data.
   *
   * @throws CommandRejectedError if the player answered with an error
   */
  async command(command: Command): Promise<unknown> {
    const reply: Reply = await this.executor.execute(command);
    if (reply.error !== '') {
      log.debug(`${String(command[0])} rejected: ${reply.error}`);
      throw new CommandRejectedError(command, reply.error);
    }
    return reply.data;
  }

  close(): Promise<void> {
    return this.executor.close();
  }

  // ==========================================================================
  // Properties
  // ==========================================================================

  /**
   * Read a property without interpreting its type.
   */
  getProperty(name: string): Promise<unknown> {
    return this.command(['get_property', name]);
  }

  async getStringProperty(name: string): Promise<string> {
    const data = await this.getProperty(name);
    if (typeof data !== 'string') {
      throw new InvalidTypeError(name, 'string', data);
    }
    return data;
  }

  async getNumberProperty(name: string): Promise<number> {
    const data = await this.getProperty(name);
    if (typeof data !== 'number') {
      throw new InvalidTypeError(name, 'number', data);
    }
    return data;
  }

  async getBoolProperty(name: string): Promise<boolean> {
    const data = await this.getProperty(name);
    if (typeof data !== 'boolean') {
      throw new InvalidTypeError(name, 'boolean', data);
    }
    return data;
  }

  async setProperty(name: string, value: CommandArg): Promise<void> {
    await this.command(['set_property', name, value]);
  }

  /**
   * Cycle a property through its values (e.g. `pause`, `fullscreen`).
   */
  async cycle(name: string): Promise<void> {
    await this.command(['cycle', name]);
  }

  /**
   * Show or hide the on-screen controller. Sent to mpv's bundled OSC script,
   * which ignores it when the OSC is disabled.
   */
  async setOsc(visible: boolean): Promise<void> {
    await this.command(['script-message', 'osc-visibility', visible ? 'always' : 'never']);
  }

  /**
   * Ask the player to send `property-change` notifications for a property.
   *
   * @param id - Caller-chosen id echoed in each notification
   */
  async observeProperty(id: number, name: string): Promise<void> {
    await this.command(['observe_property', id, name]);
  }

  async unobserveProperty(id: number): Promise<void> {
    await this.command(['unobserve_property', id]);
  }

  // ==========================================================================
  // Playlist and files
  // ==========================================================================

  /**
   * Load a file, replacing the current one or appending it to the playlist.
   * `append-play` starts playback if nothing is playing.
   */
  async loadFile(path: string, mode: LoadFileMode = 'replace'): Promise<void> {
    await this.command(['loadfile', path, mode]);
  }

  async loadList(path: string, mode: LoadListMode = 'replace'): Promise<void> {
    await this.command(['loadlist', path, mode]);
  }

  /** Play the next entry; does nothing at the end of the playlist. */
  async playlistNext(): Promise<void> {
    await this.command(['playlist-next', 'weak']);
  }

  /** Play the previous entry; does nothing at the start of the playlist. */
  async playlistPrevious(): Promise<void> {
    await this.command(['playlist-prev', 'weak']);
  }

  filename(): Promise<string> {
    return this.getStringProperty('filename');
  }

  path(): Promise<string> {
    return this.getStringProperty('path');
  }

  // ==========================================================================
  // Tracks
  // ==========================================================================

  async trackList(): Promise<Track[]> {
    return parseTrackList(await this.getProperty('track-list'));
  }

  /**
   * Load an external subtitle file.
   */
  async subAdd(file: string, ...flags: SubtitleFlag[]): Promise<void> {
    await this.command(['sub-add', file, ...flags]);
  }

  /**
   * Remove an external subtitle track; the current one when no id is given.
   */
  async subRemove(id?: number): Promise<void> {
    await this.command(id === undefined ? ['sub-remove'] : ['sub-remove', id]);
  }

  setAudioTrack(id: number): Promise<void> {
    return this.setProperty('aid', id);
  }

  setVideoTrack(id: number): Promise<void> {
    return this.setProperty('vid', id);
  }

  setSubtitleTrack(id: number): Promise<void> {
    return this.setProperty('sid', id);
  }

  // ==========================================================================
  // Playback
  // ==========================================================================

  async seek(seconds: number, mode: SeekMode = 'relative'): Promise<void> {
    await this.command(['seek', seconds, mode]);
  }

  isPaused(): Promise<boolean> {
    return this.getBoolProperty('pause');
  }

  setPause(pause: boolean): Promise<void> {
    return this.setProperty('pause', pause);
  }

  isIdle(): Promise<boolean> {
    return this.getBoolProperty('idle-active');
  }

  playbackTime(): Promise<number> {
    return this.getNumberProperty('playback-time');
  }

  speed(): Promise<number> {
    return this.getNumberProperty('speed');
  }

  duration(): Promise<number> {
    return this.getNumberProperty('duration');
  }

  /** Current position in seconds. */
  position(): Promise<number> {
    return this.getNumberProperty('time-pos');
  }

  /** Current position in percent of the file. */
  percentPosition(): Promise<number> {
    return this.getNumberProperty('percent-pos');
  }

  /**
   * Stop playback and clear the playlist without quitting the player.
   */
  async stop(): Promise<void> {
    await this.command(['stop']);
  }

  /**
   * Exit the player, optionally with a process exit code.
   */
  async quit(code?: number): Promise<void> {
    await this.command(code === undefined ? ['quit'] : ['quit', code]);
  }

  // ==========================================================================
  // Audio and video
  // ==========================================================================

  volume(): Promise<number> {
    return this.getNumberProperty('volume');
  }

  setVolume(level: number): Promise<void> {
    return this.setProperty('volume', level);
  }

  /**
   * Change the volume by `delta` relative to its current level.
   *
   * @returns The new volume level
   */
  async adjustVolume(delta: number): Promise<number> {
    const level = (await this.volume()) + delta;
    await this.setVolume(level);
    return level;
  }

  isMuted(): Promise<boolean> {
    return this.getBoolProperty('mute');
  }

  setMute(mute: boolean): Promise<void> {
    return this.setProperty('mute', mute);
  }

  isFullscreen(): Promise<boolean> {
    return this.getBoolProperty('fullscreen');
  }

  setFullscreen(fullscreen: boolean): Promise<void> {
    return this.setProperty('fullscreen', fullscreen);
  }

  // ==========================================================================
  // Aggregates
  // ==========================================================================

  /**
   * Read the main playback properties concurrently.
   *
   * Properties the player reports as unavailable (nothing loaded) become null.
   */
  async status(): Promise<PlaybackStatus> {
    const [filename, paused, idle, position, duration, volume, muted] = await Promise.all([
      unavailableAsNull(this.filename()),
      this.isPaused(),
      this.isIdle(),
      unavailableAsNull(this.position()),
      unavailableAsNull(this.duration()),
      this.volume(),
      this.isMuted(),
    ]);
    return { filename, paused, idle, position, duration, volume, muted };
  }
}

async function unavailableAsNull<T>(pending: Promise<T>): Promise<T | null> {
  try {
    return await pending;
  } catch (error) {
    if (error instanceof CommandRejectedError) {
      return null;
    }
    throw error;
  }
}
