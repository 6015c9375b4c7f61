/**
 * IPC Module
 *
 * Public API of the mpv JSON IPC client.
 *
 * Organized into layers:
 * - Client (connection lifecycle and the concurrent call facade)
 * - Events (notification sinks)
 * - Protocol (wire message types)
 * - Transport (codec and error classes)
 */

export { IPCClient } from './client.js';
export { EventRouter, noopSink } from './events.js';
export type { NotificationHandler, NotificationSink } from './events.js';
export type { ClientStats, Executor, IPCClientOptions } from './types.js';

export * from './protocol/index.js';
export * from './transport/IPCError.js';
export { isPlayerUnavailableError } from './transport/errors.js';
export { decodeReply, encodeRequest } from './transport/jsonl.js';
