import { Option } from 'commander';

import { LOAD_FILE_MODES } from '@/player/index.js';

/**
 * Shared --json flag for all commands that support JSON output.
 * Standard option for machine-readable output.
 *
 * @example
 * ```typescript
 * program
 *   .command('status')
 *   .addOption(jsonOption)
 *   .action((options) => {
 *     if (options.json) {
 *       console.log(JSON.stringify(data));
 *     }
 *   });
 * ```
 */
export const jsonOption = new Option('-j, --json', 'Output as JSON').default(false);

/**
 * --mode for `load`, restricted to the modes mpv's loadfile accepts.
 */
export const loadModeOption = new Option('--mode <mode>', 'How to insert the file')
  .choices(LOAD_FILE_MODES)
  .default('replace');
