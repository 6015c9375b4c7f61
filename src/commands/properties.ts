import type { Command } from 'commander';

import { parseCommandArg } from '@/commands/shared/args.js';
import { runCommand, type BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import { jsonOption } from '@/commands/shared/commonOptions.js';
import { getGlobalOptions, withPlayer } from '@/commands/shared/connection.js';
import type { ActionResult, PropertyResult } from '@/commands/types.js';
import { formatValue } from '@/ui/formatting.js';

interface SetOptions extends BaseCommandOptions {
  /** Send the value as a string even if it looks like a number or boolean. */
  string?: boolean;
}

/**
 * Register get/set commands
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerPropertyCommands(program: Command): void {
  program
    .command('get')
    .description('Print the value of a player property')
    .argument('<property>', 'Property name, e.g. volume or media-title')
    .addOption(jsonOption)
    .action(async (property: string, options: BaseCommandOptions, command: Command) => {
      const globals = getGlobalOptions(command);
      await runCommand<BaseCommandOptions, PropertyResult>(
        async () => {
          const value = await withPlayer(globals, (player) => player.getProperty(property));
          return { success: true, data: { property, value } };
        },
        options,
        (result) => formatValue(result.value)
      );
    });

  program
    .command('set')
    .description('Set a player property')
    .argument('<property>', 'Property name')
    .argument('<value>', 'New value; numbers and true/false are sent as JSON scalars')
    .option('--string', 'Send the value as a string', false)
    .addOption(jsonOption)
    .action(async (property: string, value: string, options: SetOptions, command: Command) => {
      const globals = getGlobalOptions(command);
      await runCommand<SetOptions, ActionResult>(
        async (opts) => {
          const parsed = parseCommandArg(value, opts.string ?? false);
          await withPlayer(globals, (player) => player.setProperty(property, parsed));
          return { success: true, data: { action: 'set', detail: `${property}=${String(parsed)}` } };
        },
        options,
        (result) => `Set ${result.detail ?? property}`
      );
    });
}
