/**
 * Semantic exit codes for script-friendly error handling.
 *
 * **STABILITY: These exit codes are part of mpvctl's stable public API.**
 *
 * Exit codes follow semantic ranges for predictable automation:
 * - **0**: Success (command completed successfully)
 * - **1**: Generic failure (avoid in new code)
 * - **80-99**: User errors (invalid input, missing socket, rejected commands)
 * - **100-119**: Software errors (connection failures, timeouts, bugs)
 *
 * Use ranges for category detection (80-99 = user error, 100-119 = software error).
 */

/**
 * Exit code constants following semantic ranges.
 */
export const EXIT_CODES = {
  /** Command completed successfully */
  SUCCESS: 0,

  /** Generic failure (use specific codes when possible) */
  GENERIC_FAILURE: 1,

  // User Errors (80-99): Issues caused by user input or environment

  /** Invalid command-line arguments or options */
  INVALID_ARGUMENTS: 81,

  /** Insufficient permissions to open the socket */
  PERMISSION_DENIED: 82,

  /** IPC socket not found (mpv not running with --input-ipc-server) */
  RESOURCE_NOT_FOUND: 83,

  // Software Errors (100-119): Internal failures or integration issues

  /** Connection to the player failed or was lost */
  CONNECTION_FAILURE: 101,

  /** A command was not sent or not answered in time */
  IPC_TIMEOUT: 102,

  /** The player answered with an error for the command */
  COMMAND_REJECTED: 103,

  /** Unhandled exception in code */
  UNHANDLED_EXCEPTION: 104,

  /** Generic software error (use specific codes when possible) */
  SOFTWARE_ERROR: 110,
} as const;

/**
 * Union of all exit code values.
 */
export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
