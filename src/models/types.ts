/**
 * Session data model shared by the poll path, the push path and observers.
 */

export type MediaKind =
  | 'Movie'
  | 'Episode'
  | 'Audio'
  | 'MusicVideo'
  | 'Trailer'
  | 'Photo'
  | 'TvChannel'
  | 'Unknown';

export interface MediaItem {
  id: string;
  title: string;
  kind: MediaKind;
  durationSeconds?: number;
  /** Episodes */
  seriesName?: string;
  seasonName?: string;
  seasonNumber?: number;
  episodeNumber?: number;
  /** Audio */
  album?: string;
  albumArtist?: string;
  artists: readonly string[];
  year?: number;
}

export interface PlaybackState {
  positionSeconds: number;
  paused: boolean;
  muted: boolean;
  /** 0.0–1.0, undefined when the client does not report it */
  volume?: number;
  canSeek: boolean;
  /** Item ids in play order */
  queue: readonly string[];
  /** Index of the now-playing item in `queue`, 0 when unknown */
  queueCursor: number;
}

/**
 * One connected client on the media server.
 *
 * `deviceKey` survives reconnects and is the only valid storage key;
 * `sessionToken` changes with every connection.
 */
export interface RemoteSession {
  sessionToken: string;
  deviceKey: string;
  displayName: string;
  clientApplication: string;
  applicationVersion?: string;
  userId?: string;
  userName?: string;
  supportsRemoteControl: boolean;
  capabilities: ReadonlySet<string>;
  nowPlaying?: MediaItem;
  playback?: PlaybackState;
  lastActivityAt?: Date;
}

/** Partial playback update carried by a push event. */
export interface PlaybackPatch {
  deviceKey: string;
  sessionToken?: string;
  positionSeconds?: number;
  paused?: boolean;
  muted?: boolean;
  volume?: number;
  nowPlaying?: MediaItem;
  receivedAt: Date;
}

export type PlaybackTransition =
  | 'started'
  | 'stopped'
  | 'paused'
  | 'resumed'
  | 'media-changed'
  | 'progress';

/** Decides whether a parsed session belongs in the canonical map. */
export type ControllablePredicate = (session: RemoteSession) => boolean;
