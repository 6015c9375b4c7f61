/**
 * Logging utilities for consistent formatted output with log level support.
 *
 * By default only 'info' level logs are shown. Set MPVCTL_DEBUG=1 or pass the
 * --debug flag to enable verbose 'debug' level logs. All logs go to stderr so
 * stdout stays clean for command output.
 */

// ============================================================================
// Global Debug State
// ============================================================================

let debugEnabled = false;

/**
 * Enable debug logging globally.
 *
 * Called during CLI initialization when --debug flag is detected.
 */
export function enableDebugLogging(): void {
  debugEnabled = true;
}

/**
 * Check if debug logging is currently enabled.
 *
 * @returns True if debug mode is active
 */
export function isDebugEnabled(): boolean {
  return debugEnabled || process.env['MPVCTL_DEBUG'] === '1';
}

// ============================================================================
// Log Levels
// ============================================================================

/**
 * Log level determines visibility of log messages.
 *
 * - 'info': Always shown (important user-facing messages, errors, key milestones)
 * - 'debug': Only shown in debug mode (wire traces, dispatch decisions, loop state)
 */
export type LogLevel = 'info' | 'debug';

/**
 * Log contexts for different components.
 * Used to prefix log messages with component name.
 */
export type LogContext = 'mpvctl' | 'client' | 'writer' | 'reader' | 'events' | 'player';

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Logger instance with support for different log levels.
 */
export interface Logger {
  /**
   * Log an info message (always shown).
   */
  info: (message: string) => void;

  /**
   * Log a debug message (only shown in debug mode).
   */
  debug: (message: string) => void;

  /**
   * Log a message at debug level.
   */
  (message: string): void;
}

// ============================================================================
// Logger Implementation
// ============================================================================

function write(context: LogContext, message: string, level: LogLevel): void {
  if (level === 'debug' && !isDebugEnabled()) {
    return;
  }
  console.error(`[${context}] ${message}`);
}

/**
 * Create a logger instance for a specific context.
 *
 * @param context - Component context for log prefix
 * @returns Logger instance with info/debug methods
 *
 * @example
 * ```typescript
 * const log = createLogger('reader');
 *
 * // Always shown
 * log.info('Connection to player lost');
 *
 * // Only shown in debug mode (--debug or MPVCTL_DEBUG=1)
 * log.debug('Discarded reply for unknown request_id 42');
 * ```
 */
export function createLogger(context: LogContext): Logger {
  const debug = (message: string): void => write(context, message, 'debug');
  return Object.assign(debug, {
    info: (message: string) => write(context, message, 'info'),
    debug,
  });
}
