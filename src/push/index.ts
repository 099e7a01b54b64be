export { PushConnectionManager, buildPushUrl, wsSocketFactory } from './connection.js';
export type {
  PushConnectionOptions,
  PushEndpoint,
  PushSocket,
  PushSocketFactory,
  PushSocketHandlers,
} from './connection.js';
export { BackoffPolicy, computeBackoffDelay, DEFAULT_BACKOFF } from './backoff.js';
export type { BackoffOptions, ResolvedBackoffOptions } from './backoff.js';
export { decodeFrame, encodeCommand, sessionsStartCommand, KEEP_ALIVE_COMMAND } from './messages.js';
export type {
  ConnectionState,
  LibraryChange,
  PushCommand,
  PushConnection,
  PushEventSink,
  PushMessage,
  RejectionListener,
  ServerLifecyclePhase,
  ServerNotification,
  StateListener,
  SyncMessage,
  UserDataItem,
} from './types.js';
