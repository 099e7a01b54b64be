/**
 * CLI tests
 *
 * Tests for: parseCommandArgs, OutputFormatter, MediaSyncCLI command wiring
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import os from 'os';
import fs from 'fs';
import path from 'path';
import pino from 'pino';
import { MediaSyncCLI, parseCommandArgs } from './cli.js';
import { OutputFormatter, formatDuration } from './formatter.js';
import { ConfigManager } from '../config/config.js';
import { createSyncEngine } from '../sync/engine.js';
import type { Logger } from '../logging/logger.js';
import type { RemoteSession } from '../models/types.js';
import type { TransportClient } from '../transport/types.js';
import type { SyncEvent } from '../events/types.js';
import {
  AuthenticationRejectedError,
  ConfigurationError,
  TransportUnavailableError,
} from '../errors/sync-error.js';

const silent = pino({ level: 'silent' });

// ─── Fixtures ─────────────────────────────────────────────────────────────────

function makeSession(overrides: Partial<RemoteSession> = {}): RemoteSession {
  return {
    sessionToken: 'tok-a',
    deviceKey: 'dev-a',
    displayName: 'Living Room',
    clientApplication: 'Emby Theater',
    applicationVersion: '3.0.20',
    userName: 'alex',
    supportsRemoteControl: true,
    capabilities: new Set(['Play', 'Pause']),
    ...overrides,
  };
}

const EPISODE_SESSION = makeSession({
  nowPlaying: {
    id: 'item-42',
    title: 'Pilot',
    kind: 'Episode',
    durationSeconds: 3000,
    seriesName: 'Test Series',
    seasonNumber: 1,
    episodeNumber: 2,
    artists: [],
  },
  playback: {
    positionSeconds: 75,
    paused: true,
    muted: false,
    canSeek: true,
    queue: [],
    queueCursor: 0,
  },
});

// ─── parseCommandArgs ────────────────────────────────────────────────────────

describe('parseCommandArgs', () => {
  it('parses numbers, booleans and strings', () => {
    expect(parseCommandArgs(['Volume=40', 'Muted=false', 'Message=hello world'])).toEqual({
      Volume: 40,
      Muted: false,
      Message: 'hello world',
    });
  });

  it('keeps an empty value as a string', () => {
    expect(parseCommandArgs(['Text='])).toEqual({ Text: '' });
  });

  it('rejects a pair without a name', () => {
    expect(() => parseCommandArgs(['=40'])).toThrow(ConfigurationError);
    expect(() => parseCommandArgs(['Volume'])).toThrow('Command argument must look like name=value, got: Volume');
  });
});

// ─── OutputFormatter ─────────────────────────────────────────────────────────

describe('formatDuration', () => {
  it('formats minutes and hours', () => {
    expect(formatDuration(0)).toBe('0:00');
    expect(formatDuration(75)).toBe('1:15');
    expect(formatDuration(3725)).toBe('1:02:05');
  });
});

describe('OutputFormatter', () => {
  const formatter = new OutputFormatter();

  it('reports an empty session list', () => {
    expect(formatter.formatSessionList([])).toContain('No controllable sessions found.');
  });

  it('lists sessions with their now-playing item', () => {
    const out = formatter.formatSessionList([EPISODE_SESSION, makeSession({ deviceKey: 'dev-b', displayName: 'Bedroom' })]);
    expect(out).toContain('Sessions (2)');
    expect(out).toContain('Living Room');
    expect(out).toContain('Device: dev-a | User: alex');
    expect(out).toContain('Test Series S01E02 · Pilot');
    expect(out).toContain('[1:15 / 50:00]');
    expect(out).toContain('⏸');
    expect(out).toContain('Bedroom');
  });

  it('formats each event kind on one line', () => {
    const events: SyncEvent[] = [
      { type: 'added', deviceKey: 'dev-a', session: makeSession() },
      { type: 'removed', deviceKey: 'dev-a', reason: 'session-ended', lastKnown: makeSession() },
      {
        type: 'playbackChanged',
        deviceKey: 'dev-a',
        session: EPISODE_SESSION,
        previous: makeSession(),
        transition: 'started',
        source: 'push',
      },
      {
        type: 'libraryChanged',
        change: { itemsAdded: ['a', 'b'], itemsUpdated: [], itemsRemoved: ['c'], foldersAddedTo: [], foldersRemovedFrom: [] },
        invalidatedEntries: 3,
      },
      { type: 'availabilityChanged', available: false, consecutiveFailures: 5 },
      { type: 'connectionChanged', state: 'connected', previous: 'authenticating' },
    ];
    const lines = events.map((event) => formatter.formatEvent(event));

    expect(lines.every((line) => !line.includes('\n'))).toBe(true);
    expect(lines[0]).toContain('Living Room (dev-a)');
    expect(lines[1]).toContain('session-ended');
    expect(lines[2]).toContain('Living Room: started Test Series S01E02 · Pilot');
    expect(lines[3]).toContain('Library changed: +2 ~0 -1 (3 cached page(s) dropped)');
    expect(lines[4]).toContain('Server unreachable after 5 failed polls');
    expect(lines[5]).toContain('Push authenticating → connected');
  });

  it('serializes sets and errors in JSON events', () => {
    const added = JSON.parse(formatter.formatEventJson({ type: 'added', deviceKey: 'dev-a', session: makeSession() }));
    expect(added.session.capabilities).toEqual(['Play', 'Pause']);

    const failed = JSON.parse(
      formatter.formatEventJson({
        type: 'authenticationFailed',
        error: new AuthenticationRejectedError('Authentication rejected (HTTP 401)'),
        source: 'poll',
      })
    );
    expect(failed.error).toEqual({
      name: 'AuthenticationRejectedError',
      code: 'AUTH_REJECTED',
      message: 'Authentication rejected (HTTP 401)',
    });
  });

  it('adds a hint for typed errors', () => {
    expect(formatter.formatError(new AuthenticationRejectedError('rejected'))).toContain(
      'Run `mediasync config set server.apiKey <key>`.'
    );
    expect(formatter.formatError(new TransportUnavailableError('ECONNREFUSED'))).toContain(
      'Check server.host and server.port.'
    );
    expect(formatter.formatError('plain failure')).toContain('plain failure');
  });

  it('lists validation problems', () => {
    expect(formatter.formatValidation({ valid: true, errors: [] })).toContain('Configuration is valid');
    const out = formatter.formatValidation({ valid: false, errors: ['server.host is required'] });
    expect(out).toContain('Configuration has 1 problem(s):');
    expect(out).toContain('  • server.host is required');
  });
});

// ─── MediaSyncCLI ────────────────────────────────────────────────────────────

class TestCLI extends MediaSyncCLI {
  protected createLogger(): Logger {
    return silent;
  }

  protected waitForShutdown(): Promise<void> {
    return Promise.resolve();
  }
}

function fakeTransport(): TransportClient & {
  listSessions: Mock<TransportClient['listSessions']>;
  sendCommand: Mock<TransportClient['sendCommand']>;
} {
  return {
    listSessions: vi.fn<TransportClient['listSessions']>(async () => [
      {
        Id: 'tok-a',
        DeviceId: 'dev-a',
        DeviceName: 'Living Room',
        Client: 'Emby Theater',
        SupportsRemoteControl: true,
      },
    ]),
    getLibraryItems: vi.fn<TransportClient['getLibraryItems']>(async (containerId) => ({
      containerId,
      items: [],
      totalCount: 0,
      startIndex: 0,
    })),
    sendCommand: vi.fn<TransportClient['sendCommand']>(async () => undefined),
    probe: vi.fn<TransportClient['probe']>(async () => ({ id: 'srv-1', name: 'Test Server', version: '4.8.0' })),
  };
}

describe('MediaSyncCLI', () => {
  let configPath: string;
  let transport: ReturnType<typeof fakeTransport>;
  let cli: TestCLI;
  let logSpy: Mock<(...args: unknown[]) => void>;
  let errorSpy: Mock<(...args: unknown[]) => void>;

  function output(spy: Mock<(...args: unknown[]) => void>): string {
    return spy.mock.calls.map((call) => String(call[0])).join('\n');
  }

  beforeEach(() => {
    configPath = path.join(os.tmpdir(), `mediasync-cli-${process.pid}-${Date.now()}.json`);
    const manager = new ConfigManager(configPath);
    const config = ConfigManager.defaults();
    config.server.host = 'media.local';
    config.server.apiKey = 'test-secret';
    manager.save(config);

    transport = fakeTransport();
    cli = new TestCLI(manager, new OutputFormatter(), (cfg, overrides) =>
      createSyncEngine(cfg, {
        ...overrides,
        transport,
        socketFactory: () => ({ send: () => undefined, close: () => undefined }),
      })
    );
    logSpy = vi.fn<(...args: unknown[]) => void>();
    errorSpy = vi.fn<(...args: unknown[]) => void>();
    vi.spyOn(console, 'log').mockImplementation(logSpy);
    vi.spyOn(console, 'error').mockImplementation(errorSpy);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    if (fs.existsSync(configPath)) fs.unlinkSync(configPath);
  });

  it('sessions prints the polled sessions', async () => {
    await cli.run(['node', 'mediasync', 'sessions']);

    expect(output(logSpy)).toContain('Living Room');
    expect(process.exitCode).toBeUndefined();
  });

  it('sessions reports a configuration problem', async () => {
    const broken = new TestCLI(new ConfigManager(`${configPath}.missing`));
    await broken.run(['node', 'mediasync', 'sessions']);

    expect(output(errorSpy)).toContain('server.host is required');
    expect(process.exitCode).toBe(1);
  });

  it('sessions fails when the server rejects the API key', async () => {
    transport.listSessions.mockRejectedValue(new AuthenticationRejectedError('Authentication rejected (HTTP 401)'));
    await cli.run(['node', 'mediasync', 'sessions']);

    const errors = output(errorSpy);
    expect(errors).toContain('Authentication rejected (HTTP 401)');
    expect(errors).toContain('Run `mediasync config set server.apiKey <key>`.');
    expect(output(logSpy)).not.toContain('No controllable sessions found.');
    expect(process.exitCode).toBe(1);
  });

  it('sessions fails when the first poll cannot reach the server', async () => {
    transport.listSessions.mockRejectedValue(new TransportUnavailableError('connect ECONNREFUSED'));
    await cli.run(['node', 'mediasync', 'sessions']);

    expect(output(errorSpy)).toContain('connect ECONNREFUSED');
    expect(logSpy).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(1);
  });

  it('send does not send when the first poll fails', async () => {
    transport.listSessions.mockRejectedValue(new TransportUnavailableError('connect ECONNREFUSED'));
    await cli.run(['node', 'mediasync', 'send', 'dev-a', 'Pause']);

    expect(transport.sendCommand).not.toHaveBeenCalled();
    expect(output(errorSpy)).toContain('Check server.host and server.port.');
    expect(process.exitCode).toBe(1);
  });

  it('send resolves the device and passes parsed arguments', async () => {
    await cli.run(['node', 'mediasync', 'send', 'dev-a', 'SetVolume', 'Volume=40']);

    expect(transport.sendCommand).toHaveBeenCalledWith(
      { deviceKey: 'dev-a', sessionToken: 'tok-a' },
      'SetVolume',
      { Volume: 40 }
    );
    expect(output(logSpy)).toContain('Sent SetVolume to dev-a');
  });

  it('send fails for an unknown device', async () => {
    await cli.run(['node', 'mediasync', 'send', 'dev-missing', 'Pause']);

    expect(output(errorSpy)).toContain('No session for device dev-missing');
    expect(process.exitCode).toBe(1);
  });

  it('watch prints events until shutdown', async () => {
    await cli.run(['node', 'mediasync', 'watch']);

    expect(output(logSpy)).toContain('Living Room (dev-a)');
  });

  it('watch stops with an error when the first poll fails', async () => {
    transport.listSessions.mockRejectedValue(new AuthenticationRejectedError('Authentication rejected (HTTP 403)'));
    await cli.run(['node', 'mediasync', 'watch']);

    expect(output(errorSpy)).toContain('Authentication rejected (HTTP 403)');
    expect(process.exitCode).toBe(1);
  });

  it('status reports the server and session counts', async () => {
    await cli.run(['node', 'mediasync', 'status']);

    const out = output(logSpy);
    expect(out).toContain('Test Server');
    expect(out).toContain('http://media.local:8096/emby');
  });

  it('config set stores the value and config show masks the key', async () => {
    await cli.run(['node', 'mediasync', 'config', 'set', 'sync.pollIntervalSeconds', '30']);
    expect(new ConfigManager(configPath).load().sync.pollIntervalSeconds).toBe(30);

    await cli.run(['node', 'mediasync', 'config', 'show']);
    const out = output(logSpy);
    expect(out).toContain('30s');
    expect(out).toContain('********');
    expect(out).not.toContain('test-secret');
  });

  it('config validate sets a failing exit code', async () => {
    const broken = new TestCLI(new ConfigManager(`${configPath}.missing`));
    await broken.run(['node', 'mediasync', 'config', 'validate']);

    expect(output(logSpy)).toContain('Configuration has 2 problem(s):');
    expect(process.exitCode).toBe(1);
  });
});
