import { Command } from 'commander';

import { commandRegistry } from '@/commandRegistry.js';
import { VERSION } from '@/utils/version.js';

const CLI_NAME = 'mpvctl';
const CLI_DESCRIPTION = 'Control a running mpv player over its JSON IPC socket';

/**
 * Build the root command with global options and every registered subcommand.
 */
export function createProgram(): Command {
  const program = new Command()
    .name(CLI_NAME)
    .description(CLI_DESCRIPTION)
    .version(VERSION)
    .option('-s, --socket <path>', 'IPC socket path (default: $MPVCTL_SOCKET or /tmp/mpvsocket)')
    .option('-t, --timeout <ms>', 'Per-phase call timeout in milliseconds')
    .option('--debug', 'Enable debug logging (verbose output)');

  commandRegistry.forEach((register) => register(program));
  return program;
}
