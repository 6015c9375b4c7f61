import type { Command } from 'commander';

import { parseCommandArgs } from '@/commands/shared/args.js';
import { runCommand, type BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import { jsonOption } from '@/commands/shared/commonOptions.js';
import { getGlobalOptions, withPlayer } from '@/commands/shared/connection.js';
import type { ExecResult } from '@/commands/types.js';
import { formatValue } from '@/ui/formatting.js';

/**
 * Options for the `mpvctl exec` command.
 */
interface ExecOptions extends BaseCommandOptions {
  /** Send every argument as a string instead of coercing numbers and booleans. */
  strings?: boolean;
}

/**
 * Register exec command
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerExecCommand(program: Command): void {
  program
    .command('exec')
    .description('Send a raw mpv command and print the reply data')
    .argument('<args...>', 'Command name followed by its arguments')
    .option('--strings', 'Send every argument as a string', false)
    .addOption(jsonOption)
    .action(async (args: string[], options: ExecOptions, command: Command) => {
      const globals = getGlobalOptions(command);
      await runCommand<ExecOptions, ExecResult>(
        async (opts) => {
          const commandArgs = parseCommandArgs(args, opts.strings ?? false);
          const data = await withPlayer(globals, (player) => player.command(commandArgs));
          return { success: true, data: { command: commandArgs, data } };
        },
        options,
        (result) => formatValue(result.data)
      );
    });
}
