/**
 * Unit tests for session parsing and the pure patch/diff helpers.
 */

import { describe, it, expect } from 'vitest';
import {
  parseSession,
  parsePlaybackPatch,
  applyPlaybackPatch,
  clearPlayback,
  describePlaybackTransition,
  isRemoteControllable,
  requiresCapabilities,
  isWebPlayer,
  ticksToSeconds,
} from './session-parser.js';
import { MalformedResponseError } from '../errors/index.js';
import type { RemoteSession } from './types.js';

// ─── Fixtures ─────────────────────────────────────────────────────────────────

function rawSession(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    Id: 'sess-1',
    DeviceId: 'device-living-room',
    DeviceName: 'Living Room TV',
    Client: 'Emby Theater',
    ApplicationVersion: '3.0.20',
    UserId: 'user-1',
    UserName: 'alex',
    SupportsRemoteControl: true,
    SupportedCommands: ['Play', 'Pause', 'SetVolume'],
    LastActivityDate: '2026-03-01T10:00:00.0000000Z',
    ...overrides,
  };
}

const EPISODE = {
  Id: 'item-42',
  Name: 'Pilot',
  Type: 'Episode',
  RunTimeTicks: 30_000_000_000,
  SeriesName: 'Test Series',
  SeasonName: 'Season 1',
  IndexNumber: 1,
  ParentIndexNumber: 1,
};

// ─── parseSession ─────────────────────────────────────────────────────────────

describe('parseSession', () => {
  it('maps identity fields and keys by DeviceId', () => {
    const session = parseSession(rawSession());
    expect(session.deviceKey).toBe('device-living-room');
    expect(session.sessionToken).toBe('sess-1');
    expect(session.displayName).toBe('Living Room TV');
    expect(session.clientApplication).toBe('Emby Theater');
    expect(session.applicationVersion).toBe('3.0.20');
    expect(session.supportsRemoteControl).toBe(true);
    expect([...session.capabilities]).toEqual(['Play', 'Pause', 'SetVolume']);
    expect(session.lastActivityAt?.toISOString()).toBe('2026-03-01T10:00:00.000Z');
  });

  it('converts ticks and volume for the now-playing item', () => {
    const session = parseSession(
      rawSession({
        NowPlayingItem: EPISODE,
        PlayState: { PositionTicks: 600_000_000, IsPaused: true, IsMuted: false, VolumeLevel: 45, CanSeek: true },
        NowPlayingQueue: [{ Id: 'item-41' }, { Id: 'item-42' }, { Id: 'item-43' }],
      })
    );

    expect(session.nowPlaying).toMatchObject({
      id: 'item-42',
      title: 'Pilot',
      kind: 'Episode',
      durationSeconds: 3000,
      seriesName: 'Test Series',
      seasonNumber: 1,
      episodeNumber: 1,
    });
    expect(session.playback).toEqual({
      positionSeconds: 60,
      paused: true,
      muted: false,
      volume: 0.45,
      canSeek: true,
      queue: ['item-41', 'item-42', 'item-43'],
      queueCursor: 1,
    });
  });

  it('maps unrecognised media types to Unknown', () => {
    const session = parseSession(rawSession({ NowPlayingItem: { Id: 'x', Name: 'X', Type: 'Hologram' } }));
    expect(session.nowPlaying?.kind).toBe('Unknown');
  });

  it('defaults missing optional fields', () => {
    const session = parseSession(
      rawSession({ SupportsRemoteControl: undefined, SupportedCommands: null, LastActivityDate: 'not a date' })
    );
    expect(session.supportsRemoteControl).toBe(false);
    expect(session.capabilities.size).toBe(0);
    expect(session.lastActivityAt).toBeUndefined();
    expect(session.playback).toBeUndefined();
  });

  it('throws MalformedResponseError when DeviceId is missing', () => {
    expect(() => parseSession(rawSession({ DeviceId: undefined }))).toThrow(MalformedResponseError);
  });

  it('throws MalformedResponseError for non-object input', () => {
    expect(() => parseSession('nope')).toThrow(/Invalid session payload/);
  });
});

// ─── parsePlaybackPatch ──────────────────────────────────────────────────────

describe('parsePlaybackPatch', () => {
  const at = new Date('2026-03-01T10:05:00Z');

  it('reads top-level PositionTicks', () => {
    const patch = parsePlaybackPatch({ DeviceId: 'd1', PositionTicks: 1_200_000_000, IsPaused: false }, at);
    expect(patch).toEqual({
      deviceKey: 'd1',
      sessionToken: undefined,
      positionSeconds: 120,
      paused: false,
      muted: undefined,
      volume: undefined,
      nowPlaying: undefined,
      receivedAt: at,
    });
  });

  it('falls back to nested PlayState', () => {
    const patch = parsePlaybackPatch(
      { DeviceId: 'd1', PlaySessionId: 'ps-9', PlayState: { PositionTicks: 50_000_000, IsPaused: true, VolumeLevel: 80 } },
      at
    );
    expect(patch.positionSeconds).toBe(5);
    expect(patch.paused).toBe(true);
    expect(patch.volume).toBe(0.8);
    expect(patch.sessionToken).toBe('ps-9');
  });

  it('rejects payloads without a device id', () => {
    expect(() => parsePlaybackPatch({ PositionTicks: 1 }, at)).toThrow(MalformedResponseError);
  });
});

// ─── applyPlaybackPatch / clearPlayback ──────────────────────────────────────

describe('applyPlaybackPatch', () => {
  const session = parseSession(
    rawSession({ NowPlayingItem: EPISODE, PlayState: { PositionTicks: 0, VolumeLevel: 50 } })
  );

  it('updates only the patched fields and leaves the input untouched', () => {
    const at = new Date('2026-03-01T10:06:00Z');
    const patched = applyPlaybackPatch(session, { deviceKey: session.deviceKey, positionSeconds: 90, receivedAt: at });

    expect(patched.playback?.positionSeconds).toBe(90);
    expect(patched.playback?.volume).toBe(0.5);
    expect(patched.nowPlaying?.id).toBe('item-42');
    expect(patched.lastActivityAt).toBe(at);
    expect(session.playback?.positionSeconds).toBe(0);
  });

  it('creates a playback state when the session had none', () => {
    const idle = parseSession(rawSession());
    const patched = applyPlaybackPatch(idle, {
      deviceKey: idle.deviceKey,
      paused: true,
      receivedAt: new Date(0),
    });
    expect(patched.playback).toEqual({
      positionSeconds: 0,
      paused: true,
      muted: false,
      volume: undefined,
      canSeek: false,
      queue: [],
      queueCursor: 0,
    });
  });

  it('clearPlayback drops now-playing and playback', () => {
    const cleared = clearPlayback(session, new Date(0));
    expect(cleared.nowPlaying).toBeUndefined();
    expect(cleared.playback).toBeUndefined();
    expect(cleared.deviceKey).toBe(session.deviceKey);
  });
});

// ─── describePlaybackTransition ──────────────────────────────────────────────

describe('describePlaybackTransition', () => {
  const idle = parseSession(rawSession());
  const playing = parseSession(rawSession({ NowPlayingItem: EPISODE, PlayState: { PositionTicks: 0 } }));

  function withPlayback(session: RemoteSession, changes: Partial<NonNullable<RemoteSession['playback']>>): RemoteSession {
    if (!session.playback) throw new Error('fixture has no playback');
    return { ...session, playback: { ...session.playback, ...changes } };
  }

  it('detects start and stop', () => {
    expect(describePlaybackTransition(idle, playing)).toBe('started');
    expect(describePlaybackTransition(playing, idle)).toBe('stopped');
  });

  it('detects media change', () => {
    const other = parseSession(rawSession({ NowPlayingItem: { ...EPISODE, Id: 'item-43' }, PlayState: {} }));
    expect(describePlaybackTransition(playing, other)).toBe('media-changed');
  });

  it('detects pause, resume and progress', () => {
    const paused = withPlayback(playing, { paused: true });
    expect(describePlaybackTransition(playing, paused)).toBe('paused');
    expect(describePlaybackTransition(paused, playing)).toBe('resumed');
    expect(describePlaybackTransition(playing, withPlayback(playing, { positionSeconds: 12 }))).toBe('progress');
  });

  it('returns null for identical content', () => {
    expect(describePlaybackTransition(playing, parseSession(rawSession({ NowPlayingItem: EPISODE, PlayState: { PositionTicks: 0 } })))).toBeNull();
    expect(describePlaybackTransition(idle, idle)).toBeNull();
  });
});

// ─── Predicates ──────────────────────────────────────────────────────────────

describe('controllable predicates', () => {
  it('isRemoteControllable follows SupportsRemoteControl', () => {
    expect(isRemoteControllable(parseSession(rawSession()))).toBe(true);
    expect(isRemoteControllable(parseSession(rawSession({ SupportsRemoteControl: false })))).toBe(false);
  });

  it('requiresCapabilities checks every listed command', () => {
    const session = parseSession(rawSession());
    expect(requiresCapabilities(['Play', 'Pause'])(session)).toBe(true);
    expect(requiresCapabilities(['Play', 'Seek'])(session)).toBe(false);
  });

  it('isWebPlayer matches browser clients case-insensitively', () => {
    expect(isWebPlayer(parseSession(rawSession({ Client: 'Emby Web' })))).toBe(true);
    expect(isWebPlayer(parseSession(rawSession()))).toBe(false);
  });

  it('ticksToSeconds divides by ten million', () => {
    expect(ticksToSeconds(25_000_000)).toBe(2.5);
  });
});
