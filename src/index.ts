#!/usr/bin/env node

import { createProgram } from '@/program.js';
import { createLogger, enableDebugLogging } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

const log = createLogger('mpvctl');

/**
 * Main entry point.
 *
 * Every command opens its own connection to the player, runs, and closes it
 * again; the exit code is left in process.exitCode so the process ends once
 * the socket is gone.
 */
async function main(): Promise<void> {
  // Check for --debug early so option parsing is traced too
  if (process.argv.includes('--debug')) {
    enableDebugLogging();
  }

  await createProgram().parseAsync();
}

main().catch((error: unknown) => {
  log.info(`Fatal: ${getErrorMessage(error)}`);
  process.exitCode = EXIT_CODES.SOFTWARE_ERROR;
});
