import { ConnectionError } from '@/ipc/index.js';
import { OutputBuilder } from '@/ui/OutputBuilder.js';
import {
  CommandError,
  getErrorMessage,
  getExitCode,
  isPlayerNotRunningError,
} from '@/ui/errors/index.js';
import { genericError, playerNotRunningError, unknownError } from '@/ui/messages/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Standard options supported by CommandRunner.
 * All commands that use CommandRunner must extend this interface.
 */
export interface BaseCommandOptions {
  /** Output as JSON instead of human-readable format */
  json?: boolean;
}

/**
 * Result from a command handler.
 */
export type CommandResult<T = unknown> =
  | { success: true; data: T }
  | { success: false; error?: string; exitCode?: number };

/**
 * Handler function type.
 * Command logic should be implemented as a function matching this signature.
 */
export type CommandHandler<TOptions extends BaseCommandOptions, TResult = unknown> = (
  options: TOptions
) => Promise<CommandResult<TResult>>;

/**
 * Formatter function type for human-readable output.
 */
export type CommandFormatter<TResult = unknown> = (data: TResult) => string;

/**
 * Run a command with consistent error handling, output formatting, and exit codes.
 *
 * This helper:
 * - Wraps command logic in try-catch
 * - Reports an unreachable player socket (ENOENT, ECONNREFUSED) with start-up hints
 * - Formats output as JSON or human-readable based on --json flag
 * - Sets process.exitCode so open handles can close before the process ends
 *
 * @param handler - Command logic that returns CommandResult or throws
 * @param options - Command options (must include json flag)
 * @param formatter - Optional human-readable formatter (if not provided, outputs raw JSON)
 * @returns The exit code that was set
 *
 * @example
 * ```typescript
 * await runCommand(
 *   async () => {
 *     const volume = await withPlayer(globals, (player) => player.volume());
 *     return { success: true, data: { volume } };
 *   },
 *   options,
 *   (data) => `Volume: ${data.volume}`
 * );
 * ```
 */
export async function runCommand<TOptions extends BaseCommandOptions, TResult = unknown>(
  handler: CommandHandler<TOptions, TResult>,
  options: TOptions,
  formatter?: CommandFormatter<TResult>
): Promise<number> {
  try {
    const result = await handler(options);

    if (!result.success) {
      if (options.json) {
        printJson(OutputBuilder.buildJsonError(result.error ?? 'Unknown error'));
      } else {
        console.error(result.error ? genericError(result.error) : unknownError());
      }
      return finish(result.exitCode ?? EXIT_CODES.UNHANDLED_EXCEPTION);
    }

    if (options.json) {
      printJson(OutputBuilder.buildJsonSuccess(result.data));
    } else if (formatter) {
      console.log(formatter(result.data));
    } else {
      console.log(JSON.stringify(result.data, null, 2));
    }

    return finish(EXIT_CODES.SUCCESS);
  } catch (error) {
    if (error instanceof CommandError) {
      if (options.json) {
        printJson(OutputBuilder.buildJsonError(error.message, error.metadata));
      } else {
        console.error(genericError(error.message));
        for (const value of Object.values(error.metadata)) {
          console.error(value);
        }
      }
      return finish(error.exitCode);
    }

    if (error instanceof ConnectionError && isPlayerNotRunningError(error)) {
      if (options.json) {
        printJson(
          OutputBuilder.buildJsonError('mpv is not running', {
            suggestion: `Start it with: mpv --idle --input-ipc-server=${error.socketPath}`,
          })
        );
      } else {
        console.error(playerNotRunningError(error.socketPath));
      }
      return finish(EXIT_CODES.RESOURCE_NOT_FOUND);
    }

    const errorMessage = getErrorMessage(error);
    if (options.json) {
      printJson(OutputBuilder.buildJsonError(errorMessage));
    } else {
      console.error(genericError(errorMessage));
    }
    return finish(getExitCode(error));
  }
}

function printJson(value: Record<string, unknown>): void {
  console.log(JSON.stringify(value, null, 2));
}

function finish(code: number): number {
  process.exitCode = code;
  return code;
}
