/**
 * Type definitions for command results.
 *
 * Provides type safety for CommandRunner by defining explicit result types
 * for each command. This enables compile-time checking of formatter inputs.
 */

import type { CommandArg } from '@/ipc/index.js';
import type { PlaybackStatus } from '@/player/index.js';

/**
 * exec command result
 */
export interface ExecResult {
  command: CommandArg[];
  data: unknown;
}

/**
 * get command result
 */
export interface PropertyResult {
  property: string;
  value: unknown;
}

/**
 * Result of commands that change one piece of player state.
 */
export interface ActionResult {
  action: string;
  detail?: string;
}

/**
 * volume command result
 */
export interface VolumeResult {
  volume: number;
  muted: boolean;
}

/**
 * status command result
 *
 * Re-exported from the player module to keep a single source of truth
 */
export type StatusResult = PlaybackStatus;
