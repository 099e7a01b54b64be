/**
 * Raw payload → model conversion, plus the pure helpers the coordinator
 * uses to patch and compare sessions.
 *
 * The server reports positions and durations in ticks (100 ns) and volume
 * as 0–100; the model uses seconds and 0.0–1.0.
 */

import type { z } from 'zod';
import { MalformedResponseError } from '../errors/sync-error.js';
import {
  RawSessionSchema,
  RawPlaybackEventSchema,
  type RawMediaItem,
  type RawPlayState,
} from './schemas.js';
import type {
  MediaItem,
  MediaKind,
  PlaybackPatch,
  PlaybackState,
  PlaybackTransition,
  RemoteSession,
  ControllablePredicate,
} from './types.js';

export const TICKS_PER_SECOND = 10_000_000;

const MEDIA_KINDS: ReadonlySet<string> = new Set<MediaKind>([
  'Movie',
  'Episode',
  'Audio',
  'MusicVideo',
  'Trailer',
  'Photo',
  'TvChannel',
]);

// Client names reported by browser-based players
const WEB_PLAYER_CLIENTS: ReadonlySet<string> = new Set([
  'emby web',
  'emby mobile',
  'jellyfin web',
  'chrome',
  'firefox',
  'safari',
  'edge',
  'opera',
]);

export function ticksToSeconds(ticks: number): number {
  return ticks / TICKS_PER_SECOND;
}

function isMediaKind(value: string): value is MediaKind {
  return MEDIA_KINDS.has(value);
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ');
}

export function parseDate(value: string | null | undefined): Date | undefined {
  if (!value) return undefined;
  // The server emits 7 fractional digits; Date only parses milliseconds
  const date = new Date(value.replace(/(\.\d{3})\d+/, '$1'));
  return Number.isNaN(date.getTime()) ? undefined : date;
}

export function parseMediaItem(raw: RawMediaItem): MediaItem {
  const kind = raw.Type ?? 'Unknown';
  return {
    id: raw.Id,
    title: raw.Name,
    kind: isMediaKind(kind) ? kind : 'Unknown',
    durationSeconds: raw.RunTimeTicks ? ticksToSeconds(raw.RunTimeTicks) : undefined,
    seriesName: raw.SeriesName ?? undefined,
    seasonName: raw.SeasonName ?? undefined,
    seasonNumber: raw.ParentIndexNumber ?? undefined,
    episodeNumber: raw.IndexNumber ?? undefined,
    album: raw.Album ?? undefined,
    albumArtist: raw.AlbumArtist ?? undefined,
    artists: raw.Artists ?? [],
    year: raw.ProductionYear ?? undefined,
  };
}

export function parsePlayState(
  raw: RawPlayState,
  queue: readonly string[] = [],
  nowPlayingId?: string
): PlaybackState {
  const cursor = nowPlayingId ? queue.indexOf(nowPlayingId) : -1;
  return {
    positionSeconds: ticksToSeconds(raw.PositionTicks ?? 0),
    paused: raw.IsPaused ?? false,
    muted: raw.IsMuted ?? false,
    volume: raw.VolumeLevel != null ? raw.VolumeLevel / 100 : undefined,
    canSeek: raw.CanSeek ?? false,
    queue,
    queueCursor: cursor >= 0 ? cursor : 0,
  };
}

/**
 * Parse one entry of the session list.
 *
 * @throws MalformedResponseError when the payload does not match the schema
 */
export function parseSession(raw: unknown): RemoteSession {
  const result = RawSessionSchema.safeParse(raw);
  if (!result.success) {
    throw new MalformedResponseError(`Invalid session payload: ${describeIssues(result.error)}`);
  }
  const data = result.data;

  const nowPlaying = data.NowPlayingItem ? parseMediaItem(data.NowPlayingItem) : undefined;
  const queue = (data.NowPlayingQueue ?? []).flatMap((entry) => (entry.Id ? [entry.Id] : []));
  const playback = data.PlayState ? parsePlayState(data.PlayState, queue, nowPlaying?.id) : undefined;

  return {
    sessionToken: data.Id,
    deviceKey: data.DeviceId,
    displayName: data.DeviceName,
    clientApplication: data.Client,
    applicationVersion: data.ApplicationVersion ?? undefined,
    userId: data.UserId ?? undefined,
    userName: data.UserName ?? undefined,
    supportsRemoteControl: data.SupportsRemoteControl ?? false,
    capabilities: new Set(data.SupportedCommands ?? []),
    nowPlaying,
    playback,
    lastActivityAt: parseDate(data.LastActivityDate),
  };
}

/**
 * Parse a PlaybackProgress / PlaybackStart / PlaybackStopped payload. Both
 * top-level `PositionTicks`/`IsPaused` and a nested `PlayState` are accepted.
 *
 * @throws MalformedResponseError when the payload has no usable device id
 */
export function parsePlaybackPatch(raw: unknown, receivedAt: Date): PlaybackPatch {
  const result = RawPlaybackEventSchema.safeParse(raw);
  if (!result.success) {
    throw new MalformedResponseError(`Invalid playback payload: ${describeIssues(result.error)}`);
  }
  const data = result.data;
  const positionTicks = data.PositionTicks ?? data.PlayState?.PositionTicks ?? undefined;
  const volume = data.PlayState?.VolumeLevel;

  return {
    deviceKey: data.DeviceId,
    sessionToken: data.PlaySessionId ?? undefined,
    positionSeconds: positionTicks != null ? ticksToSeconds(positionTicks) : undefined,
    paused: data.IsPaused ?? data.PlayState?.IsPaused ?? undefined,
    muted: data.PlayState?.IsMuted ?? undefined,
    volume: volume != null ? volume / 100 : undefined,
    nowPlaying: data.NowPlayingItem ? parseMediaItem(data.NowPlayingItem) : undefined,
    receivedAt,
  };
}

/** Return a new session with the patch applied. The input is not modified. */
export function applyPlaybackPatch(session: RemoteSession, patch: PlaybackPatch): RemoteSession {
  const base: PlaybackState = session.playback ?? {
    positionSeconds: 0,
    paused: false,
    muted: false,
    canSeek: false,
    queue: [],
    queueCursor: 0,
  };

  return {
    ...session,
    nowPlaying: patch.nowPlaying ?? session.nowPlaying,
    playback: {
      ...base,
      positionSeconds: patch.positionSeconds ?? base.positionSeconds,
      paused: patch.paused ?? base.paused,
      muted: patch.muted ?? base.muted,
      volume: patch.volume ?? base.volume,
    },
    lastActivityAt: patch.receivedAt,
  };
}

/** Mark a session as no longer playing anything. */
export function clearPlayback(session: RemoteSession, at: Date): RemoteSession {
  return { ...session, nowPlaying: undefined, playback: undefined, lastActivityAt: at };
}

/**
 * Classify how playback moved between two snapshots of the same device.
 * Returns null when nothing observable changed.
 */
export function describePlaybackTransition(
  previous: RemoteSession,
  next: RemoteSession
): PlaybackTransition | null {
  const before = previous.nowPlaying;
  const after = next.nowPlaying;

  if (!before && after) return 'started';
  if (before && !after) return 'stopped';
  if (!before || !after) return null;
  if (before.id !== after.id) return 'media-changed';

  const wasPaused = previous.playback?.paused ?? false;
  const isPaused = next.playback?.paused ?? false;
  if (!wasPaused && isPaused) return 'paused';
  if (wasPaused && !isPaused) return 'resumed';

  const a = previous.playback;
  const b = next.playback;
  if (
    a?.positionSeconds !== b?.positionSeconds ||
    a?.muted !== b?.muted ||
    a?.volume !== b?.volume ||
    a?.queueCursor !== b?.queueCursor
  ) {
    return 'progress';
  }
  return null;
}

/** Default policy: the server's own remote-control flag. */
export const isRemoteControllable: ControllablePredicate = (session) =>
  session.supportsRemoteControl;

/** Alternative policy: every listed command must be supported. */
export function requiresCapabilities(commands: readonly string[]): ControllablePredicate {
  return (session) => commands.every((command) => session.capabilities.has(command));
}

export function isWebPlayer(session: RemoteSession): boolean {
  return WEB_PLAYER_CLIENTS.has(session.clientApplication.toLowerCase());
}
