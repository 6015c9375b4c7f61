import type { Command } from 'commander';

import { parseNumber } from '@/commands/shared/args.js';
import { runCommand, type BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import { jsonOption, loadModeOption } from '@/commands/shared/commonOptions.js';
import { getGlobalOptions, withPlayer, type GlobalOptions } from '@/commands/shared/connection.js';
import type { ActionResult } from '@/commands/types.js';
import { LOAD_FILE_MODES, type LoadFileMode, type PlayerClient } from '@/player/index.js';
import { CommandError } from '@/ui/errors/index.js';

interface LoadOptions extends BaseCommandOptions {
  mode?: string;
}

interface SeekOptions extends BaseCommandOptions {
  /** Treat the argument as a position instead of an offset. */
  absolute?: boolean;
}

function isLoadFileMode(value: string): value is LoadFileMode {
  return LOAD_FILE_MODES.some((mode) => mode === value);
}

function formatAction(result: ActionResult): string {
  return result.detail ? `${result.action}: ${result.detail}` : result.action;
}

/**
 * Run a single player action and report it.
 */
async function runAction(
  globals: GlobalOptions,
  options: BaseCommandOptions,
  action: (player: PlayerClient) => Promise<ActionResult>
): Promise<void> {
  await runCommand<BaseCommandOptions, ActionResult>(
    async () => ({ success: true, data: await withPlayer(globals, action) }),
    options,
    formatAction
  );
}

/**
 * Register playback control commands
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerPlaybackCommands(program: Command): void {
  program
    .command('pause')
    .description('Pause playback')
    .addOption(jsonOption)
    .action(async (options: BaseCommandOptions, command: Command) => {
      await runAction(getGlobalOptions(command), options, async (player) => {
        await player.setPause(true);
        return { action: 'Paused' };
      });
    });

  program
    .command('resume')
    .description('Resume playback')
    .addOption(jsonOption)
    .action(async (options: BaseCommandOptions, command: Command) => {
      await runAction(getGlobalOptions(command), options, async (player) => {
        await player.setPause(false);
        return { action: 'Resumed' };
      });
    });

  program
    .command('toggle')
    .description('Toggle between paused and playing')
    .addOption(jsonOption)
    .action(async (options: BaseCommandOptions, command: Command) => {
      await runAction(getGlobalOptions(command), options, async (player) => {
        await player.cycle('pause');
        const paused = await player.isPaused();
        return { action: paused ? 'Paused' : 'Resumed' };
      });
    });

  program
    .command('load')
    .description('Load a file or URL')
    .argument('<path>', 'File path or URL')
    .addOption(loadModeOption)
    .addOption(jsonOption)
    .action(async (path: string, options: LoadOptions, command: Command) => {
      const globals = getGlobalOptions(command);
      await runCommand<LoadOptions, ActionResult>(
        async (opts) => {
          const mode = opts.mode ?? 'replace';
          if (!isLoadFileMode(mode)) {
            throw CommandError.invalidArgument(`Invalid mode: ${mode}`);
          }
          await withPlayer(globals, (player) => player.loadFile(path, mode));
          return { success: true, data: { action: 'Loaded', detail: path } };
        },
        options,
        formatAction
      );
    });

  program
    .command('seek')
    .description('Seek by an offset in seconds, or to a position with --absolute')
    .argument('<seconds>', 'Offset (may be negative) or absolute position')
    .option('--absolute', 'Seek to the given position', false)
    .addOption(jsonOption)
    .action(async (seconds: string, options: SeekOptions, command: Command) => {
      const globals = getGlobalOptions(command);
      await runCommand<SeekOptions, ActionResult>(
        async (opts) => {
          const target = parseNumber(seconds, 'seconds');
          const mode = opts.absolute ? 'absolute' : 'relative';
          await withPlayer(globals, (player) => player.seek(target, mode));
          return { success: true, data: { action: 'Seeked', detail: `${target}s (${mode})` } };
        },
        options,
        formatAction
      );
    });

  program
    .command('next')
    .description('Skip to the next playlist entry')
    .addOption(jsonOption)
    .action(async (options: BaseCommandOptions, command: Command) => {
      await runAction(getGlobalOptions(command), options, async (player) => {
        await player.playlistNext();
        return { action: 'Next' };
      });
    });

  program
    .command('prev')
    .description('Go back to the previous playlist entry')
    .addOption(jsonOption)
    .action(async (options: BaseCommandOptions, command: Command) => {
      await runAction(getGlobalOptions(command), options, async (player) => {
        await player.playlistPrevious();
        return { action: 'Previous' };
      });
    });
}
