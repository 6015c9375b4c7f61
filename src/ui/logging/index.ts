/**
 * Logging utilities for mpvctl.
 */

export {
  createLogger,
  enableDebugLogging,
  isDebugEnabled,
  type LogContext,
  type LogLevel,
  type Logger,
} from './logger.js';
