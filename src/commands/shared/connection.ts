/**
 * Per-invocation player connection for CLI commands.
 */

import type { Command } from 'commander';

import { IPCClient, type IPCClientOptions } from '@/ipc/index.js';
import { PlayerClient } from '@/player/index.js';

import { parseTimeout } from './args.js';

/**
 * Options declared on the root program and shared by every command.
 */
export interface GlobalOptions {
  socket?: string;
  timeout?: string;
  debug?: boolean;
}

/**
 * Read the root program's options from inside a subcommand action.
 */
export function getGlobalOptions(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

/**
 * Translate global CLI options into client options.
 *
 * Unset flags are left out so the client falls back to its environment-aware
 * defaults.
 *
 * @throws CommandError when --timeout is not a positive integer
 */
export function toClientOptions(globals: GlobalOptions): IPCClientOptions {
  return {
    ...(globals.socket !== undefined && { socketPath: globals.socket }),
    ...(globals.timeout !== undefined && { timeoutMs: parseTimeout(globals.timeout) }),
  };
}

/**
 * Open a player connection, run `fn`, and close the connection again.
 *
 * @example
 * ```typescript
 * const paused = await withPlayer(globals, (player) => player.isPaused());
 * ```
 */
export async function withPlayer<T>(
  globals: GlobalOptions,
  fn: (player: PlayerClient) => Promise<T>,
  extra: IPCClientOptions = {}
): Promise<T> {
  const client = await IPCClient.open({ ...toClientOptions(globals), ...extra });
  const player = new PlayerClient(client);
  try {
    return await fn(player);
  } finally {
    await player.close();
  }
}
