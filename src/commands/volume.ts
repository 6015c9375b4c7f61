import type { Command } from 'commander';

import { parseNumber } from '@/commands/shared/args.js';
import { runCommand, type BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import { jsonOption } from '@/commands/shared/commonOptions.js';
import { getGlobalOptions, withPlayer } from '@/commands/shared/connection.js';
import type { VolumeResult } from '@/commands/types.js';
import type { PlayerClient } from '@/player/index.js';

/**
 * Apply a volume argument: `60` sets the level, `+5` / `-5` adjust it.
 */
export async function applyVolume(player: PlayerClient, level: string): Promise<number> {
  if (level.startsWith('+') || level.startsWith('-')) {
    return player.adjustVolume(parseNumber(level.replace(/^\+/, ''), 'volume change'));
  }
  const target = parseNumber(level, 'volume');
  await player.setVolume(target);
  return target;
}

export function formatVolume(result: VolumeResult): string {
  return `Volume: ${Math.round(result.volume)}${result.muted ? ' (muted)' : ''}`;
}

/**
 * Register volume command
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerVolumeCommand(program: Command): void {
  program
    .command('volume')
    .description('Show the volume, set it (60) or change it (+5, -5)')
    .argument('[level]', 'Absolute level or signed change')
    .addOption(jsonOption)
    .action(async (level: string | undefined, options: BaseCommandOptions, command: Command) => {
      const globals = getGlobalOptions(command);
      await runCommand<BaseCommandOptions, VolumeResult>(
        async () => {
          const data = await withPlayer(globals, async (player) => {
            const volume =
              level === undefined ? await player.volume() : await applyVolume(player, level);
            return { volume, muted: await player.isMuted() };
          });
          return { success: true, data };
        },
        options,
        formatVolume
      );
    });
}
