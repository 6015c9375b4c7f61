import type { Command } from 'commander';

import { runCommand, type BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import { jsonOption } from '@/commands/shared/commonOptions.js';
import { getGlobalOptions, withPlayer } from '@/commands/shared/connection.js';
import type { StatusResult } from '@/commands/types.js';
import { formatPlaybackStatus } from '@/ui/formatters/status.js';

/**
 * Register status command
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show the current file, playback state, position and volume')
    .addOption(jsonOption)
    .action(async (options: BaseCommandOptions, command: Command) => {
      const globals = getGlobalOptions(command);
      await runCommand<BaseCommandOptions, StatusResult>(
        async () => ({
          success: true,
          data: await withPlayer(globals, (player) => player.status()),
        }),
        options,
        formatPlaybackStatus
      );
    });
}
