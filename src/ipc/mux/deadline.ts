/**
 * Deadline helper for the two phases of a call.
 */

import { abortReason } from './signals.js';

export interface DeadlineOptions {
  /** Milliseconds before the operation is aborted with `onTimeout()` */
  timeoutMs: number;
  /** Shared cancellation signal; preempts the deadline */
  signal: AbortSignal;
  /** Builds the error the operation is aborted with when time runs out */
  onTimeout: () => Error;
}

/**
 * Run an abortable operation bounded by a deadline and a parent signal.
 *
 * The operation receives a signal that aborts when either the deadline passes
 * or the parent signal aborts; it must reject with that signal's reason. The
 * operation alone decides the outcome, so an operation that completes at the
 * same moment the deadline fires still counts as completed.
 *
 * @example
 * ```typescript
 * await withDeadline((signal) => handoff.offer(request, signal), {
 *   timeoutMs: 2000,
 *   signal: lifecycle.signal,
 *   onTimeout: () => new SendTimeoutError('loadfile', 2000),
 * });
 * ```
 */
export async function withDeadline<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  options: DeadlineOptions
): Promise<T> {
  const { timeoutMs, signal, onTimeout } = options;
  if (signal.aborted) {
    throw abortReason(signal);
  }

  const controller = new AbortController();
  const onParentAbort = (): void => controller.abort(abortReason(signal));
  signal.addEventListener('abort', onParentAbort, { once: true });
  const timer = setTimeout(() => controller.abort(onTimeout()), timeoutMs);

  try {
    return await operation(controller.signal);
  } finally {
    clearTimeout(timer);
    signal.removeEventListener('abort', onParentAbort);
  }
}
