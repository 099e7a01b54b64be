/**
 * Push Connection Manager
 *
 * Keeps one WebSocket to the server's event endpoint open while started:
 *
 *   disconnected → connecting → authenticating → connected
 *        ↑                                          │
 *        └──────────── backoff ←────────────────────┘
 *
 * The server has no explicit auth handshake: the token travels in the URL,
 * a bad token shows up as an HTTP 401/403 on upgrade or an early close, and
 * the first decodable frame after `SessionsStart` proves the session is
 * accepted. An auth rejection parks the manager in `rejected` until start()
 * is called again.
 */

import { EventEmitter } from 'events';
import { WebSocket, type RawData } from 'ws';
import { AuthenticationRejectedError, MalformedResponseError, NotConnectedError } from '../errors/sync-error.js';
import { getLogger, type Logger } from '../logging/logger.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { BackoffPolicy, type BackoffOptions } from './backoff.js';
import { KEEP_ALIVE_COMMAND, decodeFrame, encodeCommand, sessionsStartCommand } from './messages.js';
import type {
  ConnectionState,
  PushCommand,
  PushConnection,
  PushEventSink,
  PushMessage,
  RejectionListener,
  StateListener,
  SyncMessage,
} from './types.js';

// ─── Socket abstraction ───────────────────────────────────────────────────────

export interface PushSocketHandlers {
  onOpen(): void;
  onMessage(text: string): void;
  onClose(code: number, reason: string): void;
  onError(error: Error): void;
  /** Upgrade refused with an HTTP status */
  onUnexpectedResponse(statusCode: number): void;
}

export interface PushSocket {
  send(text: string): void;
  close(code?: number, reason?: string): void;
}

export type PushSocketFactory = (url: string, handlers: PushSocketHandlers) => PushSocket;

function rawDataToText(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}

/** Default factory backed by the `ws` package. */
export const wsSocketFactory: PushSocketFactory = (url, handlers) => {
  const ws = new WebSocket(url, { handshakeTimeout: 10_000 });

  ws.on('open', () => handlers.onOpen());
  ws.on('message', (data, isBinary) => {
    if (!isBinary) handlers.onMessage(rawDataToText(data));
  });
  ws.on('close', (code, reason) => handlers.onClose(code, reason.toString('utf8')));
  ws.on('error', (error) => handlers.onError(error));
  ws.on('unexpected-response', (_request, response) => {
    handlers.onUnexpectedResponse(response.statusCode ?? 0);
    // Aborts the handshake; ws follows up with 'error' and 'close'
    ws.terminate();
  });

  return {
    send: (text) => ws.send(text),
    close: (code, reason) => {
      if (ws.readyState === WebSocket.CONNECTING) {
        ws.terminate();
      } else {
        ws.close(code, reason);
      }
    },
  };
};

// ─── URL ─────────────────────────────────────────────────────────────────────

export interface PushEndpoint {
  host: string;
  port: number;
  ssl?: boolean;
  apiKey: string;
  deviceId: string;
}

export function buildPushUrl(endpoint: PushEndpoint): string {
  const protocol = endpoint.ssl ? 'wss' : 'ws';
  const query = `api_key=${encodeURIComponent(endpoint.apiKey)}&deviceId=${encodeURIComponent(endpoint.deviceId)}`;
  return `${protocol}://${endpoint.host}:${endpoint.port}/embywebsocket?${query}`;
}

function redactUrl(url: string): string {
  return url.replace(/api_key=[^&]*/, 'api_key=***');
}

// ─── Manager ─────────────────────────────────────────────────────────────────

/** Close codes that mean the server refused our credentials */
const AUTH_CLOSE_CODES: ReadonlySet<number> = new Set([1008, 4401]);

export interface PushConnectionOptions {
  url: string;
  socketFactory?: PushSocketFactory;
  backoff?: BackoffOptions;
  /** Wait for the first frame after open. Default 10 000 ms */
  authTimeoutMs?: number;
  /** Interval requested in SessionsStart. Default 1 500 ms */
  sessionsIntervalMs?: number;
  clock?: Clock;
  random?: () => number;
  logger?: Logger;
}

export class PushConnectionManager extends EventEmitter implements PushConnection {
  private readonly url: string;
  private readonly socketFactory: PushSocketFactory;
  private readonly authTimeoutMs: number;
  private readonly sessionsIntervalMs: number;
  private readonly backoff: BackoffPolicy;
  private readonly clock: Clock;
  private readonly logger: Logger;

  private currentState: ConnectionState = 'disconnected';
  private socket: PushSocket | null = null;
  private sink: PushEventSink | null = null;
  private started = false;
  /** Bumped whenever a socket is abandoned so its late callbacks are ignored */
  private generation = 0;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private authTimer: ReturnType<typeof setTimeout> | null = null;
  private keepAliveTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: PushConnectionOptions) {
    super();
    this.url = options.url;
    this.socketFactory = options.socketFactory ?? wsSocketFactory;
    this.authTimeoutMs = options.authTimeoutMs ?? 10_000;
    this.sessionsIntervalMs = options.sessionsIntervalMs ?? 1_500;
    this.clock = options.clock ?? systemClock;
    this.backoff = new BackoffPolicy(options.backoff, this.clock, options.random);
    this.logger = (options.logger ?? getLogger()).child({ component: 'push' });
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  get reconnectAttempts(): number {
    return this.backoff.attempts;
  }

  /**
   * Begin connecting; decoded messages go to `sink` in arrival order.
   * Never throws for network or auth problems: those surface as state changes.
   */
  start(sink: PushEventSink): void {
    this.sink = sink;
    if (this.started) return;
    this.started = true;
    this.backoff.reset();
    this.connect();
  }

  stop(): void {
    this.started = false;
    this.abandonSocket(1000, 'client stopping');
    this.clearTimer('reconnect');
    this.setState('disconnected');
  }

  /**
   * Send a command frame.
   *
   * @throws NotConnectedError unless the connection is established
   */
  send(command: PushCommand): void {
    if (this.currentState !== 'connected' || !this.socket) {
      throw new NotConnectedError(undefined, { state: this.currentState, messageType: command.MessageType });
    }
    this.socket.send(encodeCommand(command));
  }

  /** Drop the current socket (if any) and dial again without waiting for backoff. */
  forceReconnect(): void {
    if (!this.started || this.currentState === 'rejected') return;
    this.logger.info({ state: this.currentState }, 'Forcing push reconnect');
    this.abandonSocket(1000, 'reconnecting');
    this.clearTimer('reconnect');
    this.backoff.reset();
    this.connect();
  }

  onStateChange(listener: StateListener): () => void {
    this.on('state', listener);
    return () => {
      this.off('state', listener);
    };
  }

  onAuthenticationRejected(listener: RejectionListener): () => void {
    this.on('rejected', listener);
    return () => {
      this.off('rejected', listener);
    };
  }

  // ─── Lifecycle ───────────────────────────────────────────────────────────────

  private connect(): void {
    const generation = ++this.generation;
    this.setState('connecting');
    this.logger.debug({ url: redactUrl(this.url) }, 'Opening push connection');

    const guard = <A extends unknown[]>(fn: (...args: A) => void) =>
      (...args: A): void => {
        if (generation === this.generation) fn(...args);
      };

    try {
      this.socket = this.socketFactory(this.url, {
        onOpen: guard(() => this.handleOpen()),
        onMessage: guard((text: string) => this.handleMessage(text)),
        onClose: guard((code: number, reason: string) => this.handleClose(code, reason)),
        onError: guard((error: Error) => this.logger.debug({ err: error }, 'Push socket error')),
        onUnexpectedResponse: guard((status: number) => this.handleUnexpectedResponse(status)),
      });
    } catch (err) {
      // e.g. an invalid URL; treated like any other failed attempt
      this.logger.warn({ err }, 'Could not create push socket');
      this.socket = null;
      this.scheduleReconnect();
    }
  }

  private handleOpen(): void {
    this.setState('authenticating');
    this.socket?.send(encodeCommand(sessionsStartCommand(this.sessionsIntervalMs)));

    this.clearTimer('auth');
    this.authTimer = setTimeout(() => {
      this.authTimer = null;
      this.logger.warn({ timeoutMs: this.authTimeoutMs }, 'No frame received after connecting');
      this.abandonSocket(4000, 'authentication timeout');
      this.scheduleReconnect();
    }, this.authTimeoutMs);
  }

  private handleMessage(text: string): void {
    let message: PushMessage;
    try {
      message = decodeFrame(text, new Date(this.clock.now()));
    } catch (err) {
      if (err instanceof MalformedResponseError) {
        this.logger.warn({ err }, 'Dropping undecodable push frame');
        return;
      }
      throw err;
    }

    if (this.currentState === 'authenticating') {
      this.clearTimer('auth');
      this.backoff.markConnected();
      this.setState('connected');
      this.logger.info('Push connection established');
    }

    switch (message.kind) {
      case 'keep-alive':
        if (message.intervalSeconds !== undefined) this.startKeepAlive(message.intervalSeconds);
        return;
      case 'unknown':
        this.logger.debug({ messageType: message.messageType }, 'Ignoring unknown push message');
        return;
      default:
        this.deliver(message);
    }
  }

  private handleUnexpectedResponse(status: number): void {
    if (status === 401 || status === 403) {
      this.reject(new AuthenticationRejectedError(`Push connection refused (HTTP ${status})`, { status }));
      return;
    }
    // The close that follows drives the reconnect
    this.logger.warn({ status }, 'Push upgrade refused');
  }

  private handleClose(code: number, reason: string): void {
    const wasState = this.currentState;
    this.socket = null;
    this.clearTimer('auth');
    this.clearTimer('keepAlive');

    if (!this.started || wasState === 'rejected') return;

    if (wasState === 'authenticating' && AUTH_CLOSE_CODES.has(code)) {
      this.reject(new AuthenticationRejectedError(`Push connection closed during authentication (${code})`, {
        code,
        reason,
      }));
      return;
    }

    this.logger.info({ code, reason, state: wasState }, 'Push connection closed');
    this.scheduleReconnect();
  }

  private reject(error: AuthenticationRejectedError): void {
    this.logger.error({ err: error }, 'Push authentication rejected; not reconnecting');
    this.abandonSocket(1000, 'authentication rejected');
    this.clearTimer('reconnect');
    this.started = false;
    this.setState('rejected');
    this.emit('rejected', error);
  }

  private scheduleReconnect(): void {
    if (!this.started) return;
    this.backoff.markDisconnected();
    if (this.currentState !== 'disconnected') this.setState('disconnected');

    const delay = this.backoff.nextDelay();
    this.setState('backoff');
    this.logger.info({ delayMs: delay, attempt: this.backoff.attempts }, 'Scheduling push reconnect');

    this.clearTimer('reconnect');
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.started) this.connect();
    }, delay);
  }

  // ─── Helpers ─────────────────────────────────────────────────────────────────

  private deliver(message: SyncMessage): void {
    if (!this.sink) return;
    try {
      this.sink(message);
    } catch (err) {
      this.logger.error({ err, kind: message.kind }, 'Push event sink threw');
    }
  }

  private startKeepAlive(intervalSeconds: number): void {
    this.clearTimer('keepAlive');
    const periodMs = Math.max(1_000, (intervalSeconds * 1000) / 2);
    this.keepAliveTimer = setInterval(() => {
      if (this.currentState === 'connected' && this.socket) {
        this.socket.send(encodeCommand(KEEP_ALIVE_COMMAND));
      }
    }, periodMs);
    this.logger.debug({ periodMs }, 'Keep-alive enabled');
  }

  /** Close the current socket and ignore anything it reports afterwards. */
  private abandonSocket(code: number, reason: string): void {
    this.generation++;
    this.clearTimer('auth');
    this.clearTimer('keepAlive');
    const socket = this.socket;
    this.socket = null;
    if (socket) {
      try {
        socket.close(code, reason);
      } catch (err) {
        this.logger.debug({ err }, 'Error closing push socket');
      }
    }
  }

  private clearTimer(which: 'reconnect' | 'auth' | 'keepAlive'): void {
    if (which === 'reconnect' && this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    } else if (which === 'auth' && this.authTimer) {
      clearTimeout(this.authTimer);
      this.authTimer = null;
    } else if (which === 'keepAlive' && this.keepAliveTimer) {
      clearInterval(this.keepAliveTimer);
      this.keepAliveTimer = null;
    }
  }

  private setState(next: ConnectionState): void {
    const previous = this.currentState;
    if (previous === next) return;
    this.currentState = next;
    this.emit('state', next, previous);
  }
}
