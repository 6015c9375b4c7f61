/**
 * IPC Protocol
 *
 * Wire message shapes and command argument types.
 */

export type {
  Command,
  CommandArg,
  EncodableRequest,
  Notification,
  Reply,
  WireReply,
  WireRequest,
} from './messages.js';
