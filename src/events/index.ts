/**
 * Events: coordinator event types and the per-subscriber dispatcher.
 */

export { EventDispatcher } from './dispatcher.js';
export type { DispatcherStats } from './dispatcher.js';
export type {
  ChangeSource,
  SyncEvent,
  SyncEventType,
  SyncEventOf,
  SyncEventHandler,
  SubscribeOptions,
  Unsubscribe,
} from './types.js';
