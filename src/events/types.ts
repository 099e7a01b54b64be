/**
 * Events published by the coordinator.
 */

import type { AuthenticationRejectedError } from '../errors/sync-error.js';
import type { PlaybackTransition, RemoteSession } from '../models/types.js';
import type {
  ConnectionState,
  LibraryChange,
  ServerLifecyclePhase,
  ServerNotification,
  UserDataItem,
} from '../push/types.js';

export type ChangeSource = 'poll' | 'push';

export type SyncEvent =
  | { type: 'added'; deviceKey: string; session: RemoteSession }
  | {
      type: 'removed';
      deviceKey: string;
      /** `poll`: missing from the latest list; `session-ended`: server said so */
      reason: 'poll' | 'session-ended';
      lastKnown: RemoteSession;
    }
  | {
      type: 'playbackChanged';
      deviceKey: string;
      session: RemoteSession;
      previous: RemoteSession;
      transition: PlaybackTransition;
      source: ChangeSource;
    }
  | { type: 'libraryChanged'; change: LibraryChange; invalidatedEntries: number }
  | { type: 'notification'; notification: ServerNotification }
  | { type: 'userDataChanged'; userId?: string; items: UserDataItem[] }
  | { type: 'userChanged'; userId: string; userName?: string; change: 'updated' | 'deleted' }
  | { type: 'serverLifecycle'; phase: ServerLifecyclePhase }
  | { type: 'connectionChanged'; state: ConnectionState; previous: ConnectionState }
  | { type: 'availabilityChanged'; available: boolean; consecutiveFailures: number }
  /** Interval polling stopped because the push stream is steady, or started again */
  | { type: 'pollingChanged'; suspended: boolean }
  | { type: 'authenticationFailed'; error: AuthenticationRejectedError; source: ChangeSource };

export type SyncEventType = SyncEvent['type'];

export type SyncEventOf<K extends SyncEventType> = Extract<SyncEvent, { type: K }>;

export type SyncEventHandler<E extends SyncEvent = SyncEvent> = (event: E) => void | Promise<void>;

export interface SubscribeOptions {
  /** Events held for this subscriber before the oldest is dropped. Default 100 */
  maxQueueSize?: number;
}

export type Unsubscribe = () => void;
