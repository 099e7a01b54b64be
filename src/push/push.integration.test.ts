/**
 * Integration tests for PushConnectionManager over a real socket.
 *
 * Runs a minimal event endpoint in-process with the `ws` package: it checks
 * the api_key on upgrade, answers SessionsStart with a session list and can
 * drop every client on demand.
 */

import { createServer } from 'http';
import type { Server as HttpServer } from 'http';
import { WebSocketServer } from 'ws';
import type { WebSocket as WsSocket } from 'ws';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import pino from 'pino';
import { PushConnectionManager, buildPushUrl } from './connection.js';
import type { SyncMessage } from './types.js';

// ─── Mini event server ───────────────────────────────────────────────────────

interface MiniEventServer {
  port: number;
  received: string[];
  dropAll: () => void;
  broadcast: (frame: unknown) => void;
  teardown: () => Promise<void>;
}

async function createMiniEventServer(apiKey: string): Promise<MiniEventServer> {
  const httpServer: HttpServer = createServer();
  const wss = new WebSocketServer({ noServer: true });
  const clients = new Set<WsSocket>();
  const received: string[] = [];

  httpServer.on('upgrade', (request, socket, head) => {
    const url = new URL(request.url ?? '/', 'http://localhost');
    if (url.pathname !== '/embywebsocket' || url.searchParams.get('api_key') !== apiKey) {
      socket.write('HTTP/1.1 401 Unauthorized\r\nConnection: close\r\n\r\n');
      socket.destroy();
      return;
    }
    wss.handleUpgrade(request, socket, head, (ws) => wss.emit('connection', ws, request));
  });

  wss.on('connection', (ws: WsSocket) => {
    clients.add(ws);
    ws.on('message', (raw) => {
      const text = raw.toString();
      received.push(text);
      if (text.includes('"SessionsStart"')) {
        ws.send(JSON.stringify({ MessageType: 'Sessions', Data: [{ Id: 's1', DeviceId: 'dev-1' }] }));
      }
    });
    ws.on('close', () => clients.delete(ws));
  });

  await new Promise<void>((resolve) => httpServer.listen(0, '127.0.0.1', resolve));
  const address = httpServer.address();
  if (address === null || typeof address === 'string') {
    throw new Error('server did not bind a TCP port');
  }

  return {
    port: address.port,
    received,
    dropAll: () => {
      for (const ws of clients) ws.terminate();
    },
    broadcast: (frame) => {
      for (const ws of clients) ws.send(JSON.stringify(frame));
    },
    teardown: async () => {
      for (const ws of clients) ws.terminate();
      await new Promise<void>((resolve) => wss.close(() => resolve()));
      await new Promise<void>((resolve) => httpServer.close(() => resolve()));
    },
  };
}

// ─── Tests ───────────────────────────────────────────────────────────────────

describe('PushConnectionManager over ws', () => {
  let server: MiniEventServer;
  let manager: PushConnectionManager | null = null;

  beforeEach(async () => {
    server = await createMiniEventServer('test-secret');
  });

  afterEach(async () => {
    manager?.stop();
    manager = null;
    await server.teardown();
  });

  function createManager(apiKey: string): PushConnectionManager {
    return new PushConnectionManager({
      url: buildPushUrl({ host: '127.0.0.1', port: server.port, apiKey, deviceId: 'test-device' }),
      backoff: { baseDelayMs: 20, maxDelayMs: 100, jitter: 0 },
      logger: pino({ level: 'silent' }),
    });
  }

  it('connects, subscribes and receives the session list', async () => {
    const received: SyncMessage[] = [];
    const push = createManager('test-secret');
    manager = push;
    push.start((message) => received.push(message));

    await vi.waitFor(() => expect(push.state).toBe('connected'));
    expect(server.received[0]).toBe('{"MessageType":"SessionsStart","Data":"0,1500"}');
    expect(received[0]).toMatchObject({ kind: 'sessions', sessions: [{ Id: 's1', DeviceId: 'dev-1' }] });
  });

  it('forwards later server frames', async () => {
    const received: SyncMessage[] = [];
    const push = createManager('test-secret');
    manager = push;
    push.start((message) => received.push(message));
    await vi.waitFor(() => expect(push.state).toBe('connected'));

    server.broadcast({ MessageType: 'LibraryChanged', Data: { ItemsAdded: ['i1'] } });

    await vi.waitFor(() => expect(received.map((message) => message.kind)).toContain('library-changed'));
  });

  it('reconnects after the server drops the connection', async () => {
    const push = createManager('test-secret');
    manager = push;
    const states: string[] = [];
    push.onStateChange((state) => states.push(state));
    push.start(() => undefined);
    await vi.waitFor(() => expect(push.state).toBe('connected'));

    server.dropAll();
    await vi.waitFor(() => expect(states.filter((state) => state === 'connected')).toHaveLength(2));

    expect(states).toContain('backoff');
    const subscriptions = server.received.filter((text) => text.includes('SessionsStart'));
    expect(subscriptions).toHaveLength(2);
  });

  it('stops for good when the server refuses the key', async () => {
    const onRejected = vi.fn();
    const push = createManager('wrong-key');
    manager = push;
    push.onAuthenticationRejected(onRejected);
    push.start(() => undefined);

    await vi.waitFor(() => expect(push.state).toBe('rejected'));
    expect(onRejected).toHaveBeenCalledTimes(1);
  });
});
