/**
 * Push channel types: connection states, decoded server messages and the
 * commands the client can send back.
 */

import type { PlaybackPatch } from '../models/types.js';
import type { AuthenticationRejectedError } from '../errors/sync-error.js';

export type ConnectionState =
  | 'disconnected'
  | 'backoff'
  | 'connecting'
  | 'authenticating'
  | 'connected'
  | 'rejected';

export interface LibraryChange {
  itemsAdded: string[];
  itemsUpdated: string[];
  itemsRemoved: string[];
  foldersAddedTo: string[];
  foldersRemovedFrom: string[];
}

export interface UserDataItem {
  itemId?: string;
  isFavorite?: boolean;
  played?: boolean;
  playbackPositionSeconds?: number;
  playCount?: number;
}

export interface ServerNotification {
  name: string;
  description?: string;
  level: string;
  notificationType?: string;
  url?: string;
  date?: Date;
}

export type ServerLifecyclePhase = 'restarting' | 'shutting-down';

/** Messages forwarded to the event sink. */
export type SyncMessage =
  | { kind: 'sessions'; sessions: unknown[]; receivedAt: Date }
  | { kind: 'playback-progress'; patch: PlaybackPatch }
  | { kind: 'playback-started'; patch: PlaybackPatch }
  | { kind: 'playback-stopped'; patch: PlaybackPatch }
  | { kind: 'session-ended'; deviceKey: string; sessionToken?: string }
  | { kind: 'library-changed'; change: LibraryChange }
  | { kind: 'user-data-changed'; userId?: string; items: UserDataItem[] }
  | { kind: 'notification'; notification: ServerNotification }
  | { kind: 'user-changed'; userId: string; userName?: string; change: 'updated' | 'deleted' }
  | { kind: 'server-lifecycle'; phase: ServerLifecyclePhase };

/** Everything a frame can decode to; keep-alive and unknown stay inside the manager. */
export type PushMessage =
  | SyncMessage
  | { kind: 'keep-alive'; intervalSeconds?: number }
  | { kind: 'unknown'; messageType: string };

export type PushEventSink = (message: SyncMessage) => void;

/** Outgoing frame envelope */
export interface PushCommand {
  MessageType: string;
  Data?: string | number | Record<string, unknown>;
}

export type StateListener = (state: ConnectionState, previous: ConnectionState) => void;
export type RejectionListener = (error: AuthenticationRejectedError) => void;

/** What the coordinator needs from a push connection. */
export interface PushConnection {
  readonly state: ConnectionState;
  start(sink: PushEventSink): void;
  stop(): void;
  send(command: PushCommand): void;
  forceReconnect(): void;
  onStateChange(listener: StateListener): () => void;
  onAuthenticationRejected(listener: RejectionListener): () => void;
}
