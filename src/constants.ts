/**
 * Centralized configuration constants for mpvctl
 *
 * Timing and connection defaults used by the IPC client and the CLI. Values that
 * operators commonly need to change can be overridden through environment variables;
 * CLI flags take precedence over both.
 */

// ============================================================================
// SOCKET CONFIGURATION
// ============================================================================

/**
 * Default IPC socket path, matching `mpv --input-ipc-server=/tmp/mpvsocket`
 */
export const DEFAULT_SOCKET_PATH = '/tmp/mpvsocket';

/**
 * Resolve the IPC socket path.
 *
 * Can be overridden via MPVCTL_SOCKET environment variable.
 *
 * @returns Socket path (Unix domain socket or Windows named pipe)
 */
export function getSocketPath(): string {
  const fromEnv = process.env['MPVCTL_SOCKET'];
  return fromEnv !== undefined && fromEnv !== '' ? fromEnv : DEFAULT_SOCKET_PATH;
}

// ============================================================================
// TIMEOUTS
// ============================================================================

/**
 * Default per-phase call timeout in milliseconds.
 * Bounds both the send phase (hand-off to the writer) and the receive phase
 * (waiting for the reply), each independently.
 */
export const DEFAULT_CALL_TIMEOUT_MS = 2000;

/**
 * Default dial timeout in milliseconds
 */
export const DEFAULT_DIAL_TIMEOUT_MS = 2000;

/**
 * Per-phase call timeout.
 *
 * Can be overridden via MPVCTL_TIMEOUT_MS environment variable.
 */
export function getCallTimeout(): number {
  return readTimeoutEnv('MPVCTL_TIMEOUT_MS', DEFAULT_CALL_TIMEOUT_MS);
}

/**
 * Dial timeout.
 *
 * Can be overridden via MPVCTL_DIAL_TIMEOUT_MS environment variable.
 */
export function getDialTimeout(): number {
  return readTimeoutEnv('MPVCTL_DIAL_TIMEOUT_MS', DEFAULT_DIAL_TIMEOUT_MS);
}

function readTimeoutEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined) {
    return fallback;
  }
  const parsed = parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

// ============================================================================
// PROTOCOL
// ============================================================================

/**
 * Largest correlation id handed out before the allocator wraps back to 1.
 * mpv echoes request_id as a 64-bit integer; staying in the positive int32
 * range keeps ids exact on every peer.
 */
export const MAX_REQUEST_ID = 0x7fffffff;

/**
 * Error string mpv sends for a successful command
 */
export const MPV_SUCCESS = 'success';
