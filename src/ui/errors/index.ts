/**
 * Error handling for the mpvctl CLI.
 */

// CLI-level errors (user-facing command errors)
export { CommandError, type ErrorMetadata } from './CommandError.js';

// Utility functions
export { getExitCode, isPlayerNotRunningError } from './utils.js';
export { getErrorMessage } from '@/utils/errors.js';
