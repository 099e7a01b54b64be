/**
 * Session Sync Coordinator
 *
 * Owns the canonical `deviceKey → RemoteSession` map and reconciles it from
 * two sources:
 *
 *   poll path   listSessions() on a timer; the result replaces the map
 *   event path  push messages patch single entries between polls
 *
 * Once the push stream has delivered `pushStableThreshold` messages in a row
 * the poll timer stops and a slower health check watches the server instead.
 * Losing the push connection or failing a health check restarts polling.
 *
 * Both paths mutate the map only while holding one AsyncMutex, so updates
 * for a device apply in arrival order and observers never see a half-applied
 * poll. Observers receive events through the EventDispatcher and read
 * snapshots through currentState().
 */

import { EventDispatcher } from '../events/dispatcher.js';
import type {
  ChangeSource,
  SubscribeOptions,
  SyncEvent,
  SyncEventHandler,
  SyncEventOf,
  SyncEventType,
  Unsubscribe,
} from '../events/types.js';
import { ErrorHandler } from '../errors/error-handler.js';
import {
  AuthenticationRejectedError,
  ConfigurationError,
  NotFoundError,
  type MediaSyncError,
} from '../errors/sync-error.js';
import { getLogger, type Logger } from '../logging/logger.js';
import {
  applyPlaybackPatch,
  clearPlayback,
  describePlaybackTransition,
  isRemoteControllable,
  isWebPlayer,
  parseSession,
} from '../models/session-parser.js';
import type { ControllablePredicate, RemoteSession } from '../models/types.js';
import type {
  ConnectionState,
  LibraryChange,
  PushConnection,
  PushEventSink,
  SyncMessage,
} from '../push/types.js';
import type { CommandArgs, TransportClient } from '../transport/types.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { AsyncMutex } from '../utils/mutex.js';
import { withTimeout } from '../utils/timeout.js';
import { CoalescingWindow, Throttle } from './debouncer.js';
import { WatchTimeTracker, type WatchTimeOptions } from './watch-time.js';

/** The part of the content cache the coordinator invalidates. */
export interface InvalidatableCache {
  invalidateAll(): number;
  invalidateContainers(containerIds: Iterable<string>): number;
}

export interface SessionSyncOptions {
  transport: TransportClient;
  /** Omit to run on polling alone */
  push?: PushConnection;
  cache?: InvalidatableCache;
  dispatcher?: EventDispatcher;
  /** 5 000–300 000 ms. Default 10 000 */
  pollIntervalMs?: number;
  /** Poll interval while the push connection is up. Default 60 000 */
  pushPollIntervalMs?: number;
  /** Bound on each poll-path request; at most pollIntervalMs. Default min(10 000, pollIntervalMs) */
  requestTimeoutMs?: number;
  /** Consecutive poll failures before recovery. Default 5 */
  failureThreshold?: number;
  excludedDevices?: Iterable<string>;
  ignoreWebPlayers?: boolean;
  /** Which sessions enter the map. Default: the server's remote-control flag */
  isControllable?: ControllablePredicate;
  /** Window for coalescing library changes. Default 5 000 */
  libraryWindowMs?: number;
  /** Minimum gap between push-triggered refresh polls. Default 2 000 */
  refreshThrottleMs?: number;
  /** Push events held for devices the map does not know yet. Default 100 */
  maxPendingEvents?: number;
  /** Consecutive push messages before interval polling is suspended; 0 never suspends. Default 5 */
  pushStableThreshold?: number;
  /** Health check interval while polling is suspended. Default 300 000 */
  healthCheckIntervalMs?: number;
  watchTime?: WatchTimeOptions;
  clock?: Clock;
  logger?: Logger;
}

export const MIN_POLL_INTERVAL_MS = 5_000;
export const MAX_POLL_INTERVAL_MS = 300_000;

type PollReason = 'startup' | 'interval' | 'resync' | 'push-refresh' | 'manual' | 'resume';

interface PendingEvent {
  deviceKey: string;
  kind: SyncMessage['kind'];
  receivedAt: number;
}

interface LibraryBatch {
  change: LibraryChange;
  invalidated: number;
}

function union(a: readonly string[], b: readonly string[]): string[] {
  return [...new Set([...a, ...b])];
}

export function mergeLibraryChanges(a: LibraryChange, b: LibraryChange): LibraryChange {
  return {
    itemsAdded: union(a.itemsAdded, b.itemsAdded),
    itemsUpdated: union(a.itemsUpdated, b.itemsUpdated),
    itemsRemoved: union(a.itemsRemoved, b.itemsRemoved),
    foldersAddedTo: union(a.foldersAddedTo, b.foldersAddedTo),
    foldersRemovedFrom: union(a.foldersRemovedFrom, b.foldersRemovedFrom),
  };
}

export class SessionSyncCoordinator {
  private readonly transport: TransportClient;
  private readonly push: PushConnection | undefined;
  private readonly cache: InvalidatableCache | undefined;
  private readonly dispatcher: EventDispatcher;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly mutex = new AsyncMutex();

  private readonly pollIntervalMs: number;
  private readonly pushPollIntervalMs: number;
  private readonly requestTimeoutMs: number;
  private readonly failureThreshold: number;
  private readonly excludedDevices: ReadonlySet<string>;
  private readonly ignoreWebPlayers: boolean;
  private readonly isControllable: ControllablePredicate;
  private readonly maxPendingEvents: number;
  private readonly libraryWindow: CoalescingWindow<LibraryBatch>;
  private readonly refreshThrottle: Throttle;
  private readonly pushStableThreshold: number;
  private readonly healthCheckIntervalMs: number;
  private readonly watchTime: WatchTimeTracker;
  /** Aborted by stop() */
  private readonly requests = new Set<AbortController>();

  private sessions = new Map<string, RemoteSession>();
  private pending: PendingEvent[] = [];
  private lifecycle: 'idle' | 'running' | 'stopped' = 'idle';
  private paused = false;
  private available = true;
  private pushBacked = false;
  private consecutiveFailures = 0;
  private recoveries = 0;
  private lastPollAt: number | null = null;
  private lastFailure: MediaSyncError | null = null;
  private pollingSuspended = false;
  private steadyPushMessages = 0;
  private pollTimer: ReturnType<typeof setTimeout> | null = null;
  private healthTimer: ReturnType<typeof setTimeout> | null = null;
  private pollInFlight: Promise<void> | null = null;
  private detachPush: Array<() => void> = [];
  private readonly sink: PushEventSink = (message) => this.handlePushMessage(message);

  constructor(options: SessionSyncOptions) {
    this.transport = options.transport;
    this.push = options.push;
    this.cache = options.cache;
    this.logger = (options.logger ?? getLogger()).child({ component: 'coordinator' });
    this.dispatcher = options.dispatcher ?? new EventDispatcher({ logger: options.logger });
    this.clock = options.clock ?? systemClock;

    this.pollIntervalMs = options.pollIntervalMs ?? 10_000;
    if (this.pollIntervalMs < MIN_POLL_INTERVAL_MS || this.pollIntervalMs > MAX_POLL_INTERVAL_MS) {
      throw new ConfigurationError(
        `Poll interval must be between ${MIN_POLL_INTERVAL_MS} and ${MAX_POLL_INTERVAL_MS} ms`,
        { pollIntervalMs: this.pollIntervalMs }
      );
    }
    this.pushPollIntervalMs = Math.max(options.pushPollIntervalMs ?? 60_000, this.pollIntervalMs);
    this.requestTimeoutMs = options.requestTimeoutMs ?? Math.min(10_000, this.pollIntervalMs);
    if (this.requestTimeoutMs <= 0 || this.requestTimeoutMs > this.pollIntervalMs) {
      throw new ConfigurationError('Request timeout must be positive and no longer than the poll interval', {
        requestTimeoutMs: this.requestTimeoutMs,
        pollIntervalMs: this.pollIntervalMs,
      });
    }
    this.failureThreshold = options.failureThreshold ?? 5;
    if (this.failureThreshold < 1) {
      throw new ConfigurationError('Failure threshold must be at least 1', {
        failureThreshold: this.failureThreshold,
      });
    }

    this.excludedDevices = new Set(options.excludedDevices ?? []);
    this.ignoreWebPlayers = options.ignoreWebPlayers ?? false;
    this.isControllable = options.isControllable ?? isRemoteControllable;
    this.maxPendingEvents = options.maxPendingEvents ?? 100;
    this.libraryWindow = new CoalescingWindow<LibraryBatch>(
      options.libraryWindowMs ?? 5_000,
      (a, b) => ({ change: mergeLibraryChanges(a.change, b.change), invalidated: a.invalidated + b.invalidated }),
      (batch) =>
        this.publish({ type: 'libraryChanged', change: batch.change, invalidatedEntries: batch.invalidated })
    );
    this.refreshThrottle = new Throttle(options.refreshThrottleMs ?? 2_000, this.clock);

    this.pushStableThreshold = options.pushStableThreshold ?? 5;
    if (!Number.isInteger(this.pushStableThreshold) || this.pushStableThreshold < 0) {
      throw new ConfigurationError('Push stable threshold must be a whole number, 0 to never suspend polling', {
        pushStableThreshold: this.pushStableThreshold,
      });
    }
    this.healthCheckIntervalMs = options.healthCheckIntervalMs ?? 300_000;
    if (this.healthCheckIntervalMs <= 0) {
      throw new ConfigurationError('Health check interval must be positive', {
        healthCheckIntervalMs: this.healthCheckIntervalMs,
      });
    }
    this.watchTime = new WatchTimeTracker({ clock: this.clock, ...options.watchTime });
  }

  // ─── Lifecycle ───────────────────────────────────────────────────────────────

  /** Connect the push channel, run the first poll and start the poll timer. */
  async start(): Promise<void> {
    if (this.lifecycle !== 'idle') return;
    this.lifecycle = 'running';
    this.logger.info(
      { pollIntervalMs: this.pollIntervalMs, push: this.push !== undefined },
      'Starting session sync'
    );

    if (this.push) {
      const push = this.push;
      this.detachPush = [
        push.onStateChange((state, previous) => this.handleConnectionState(state, previous)),
        push.onAuthenticationRejected((error) => this.pauseForAuthentication(error, 'push')),
      ];
      push.start(this.sink);
    }

    await this.poll('startup');
    this.scheduleNextPoll();
  }

  /** Idempotent; safe to call while start() is still running. */
  async stop(): Promise<void> {
    if (this.lifecycle === 'stopped') return;
    this.lifecycle = 'stopped';
    this.clearPollTimer();
    this.clearHealthTimer();
    for (const controller of this.requests) controller.abort();
    this.requests.clear();
    this.libraryWindow.cancel();
    for (const detach of this.detachPush) detach();
    this.detachPush = [];
    this.push?.stop();
    this.pending = [];
    this.logger.info('Session sync stopped');
    await this.dispatcher.close();
  }

  /** Leave the paused state entered after an authentication failure. */
  async resume(): Promise<void> {
    if (this.lifecycle !== 'running' || !this.paused) return;
    this.paused = false;
    this.consecutiveFailures = 0;
    this.lastFailure = null;
    this.logger.info('Resuming session sync');
    this.push?.start(this.sink);
    await this.poll('resume');
    this.scheduleNextPoll();
  }

  /** Poll now, outside the timer. Shares an in-flight poll if there is one. */
  refresh(): Promise<void> {
    if (this.lifecycle !== 'running' || this.paused) return Promise.resolve();
    return this.poll('manual');
  }

  // ─── Outbound API ────────────────────────────────────────────────────────────

  /** Read-only copy of the canonical map. */
  currentState(): ReadonlyMap<string, RemoteSession> {
    return new Map(this.sessions);
  }

  getSession(deviceKey: string): RemoteSession | undefined {
    return this.sessions.get(deviceKey);
  }

  subscribe<K extends SyncEventType>(
    type: K,
    handler: SyncEventHandler<SyncEventOf<K>>,
    options?: SubscribeOptions
  ): Unsubscribe {
    return this.dispatcher.subscribe(type, handler, options);
  }

  subscribeAll(handler: SyncEventHandler, options?: SubscribeOptions): Unsubscribe {
    return this.dispatcher.subscribeAll(handler, options);
  }

  /** Drop cached library pages: all of them, or those of the given containers. */
  invalidateCache(containerIds?: Iterable<string>): number {
    if (!this.cache) return 0;
    return containerIds === undefined ? this.cache.invalidateAll() : this.cache.invalidateContainers(containerIds);
  }

  /**
   * Send a remote-control command to the device's current session.
   *
   * @throws NotFoundError when the device is not in the map
   */
  async sendCommand(deviceKey: string, command: string, args?: CommandArgs): Promise<void> {
    const session = this.sessions.get(deviceKey);
    if (!session) {
      throw new NotFoundError(`No session for device ${deviceKey}`, { deviceKey, command });
    }
    await this.transport.sendCommand({ deviceKey, sessionToken: session.sessionToken }, command, args);
  }

  get isAvailable(): boolean {
    return this.available;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  get failureCount(): number {
    return this.consecutiveFailures;
  }

  get recoveryAttempts(): number {
    return this.recoveries;
  }

  get pendingEventCount(): number {
    return this.pending.length;
  }

  get connectionState(): ConnectionState {
    return this.push?.state ?? 'disconnected';
  }

  /** Interval the poll timer currently uses */
  get activePollIntervalMs(): number {
    return this.pushBacked ? this.pushPollIntervalMs : this.pollIntervalMs;
  }

  get lastSuccessfulPollAt(): Date | undefined {
    return this.lastPollAt === null ? undefined : new Date(this.lastPollAt);
  }

  /** Why the latest poll failed or sync paused; cleared by the next applied poll */
  get lastError(): MediaSyncError | undefined {
    return this.lastFailure ?? undefined;
  }

  get isPollingSuspended(): boolean {
    return this.pollingSuspended;
  }

  /** Seconds `userId` has watched today */
  getUserWatchTime(userId: string): number {
    return this.watchTime.getUserWatchTime(userId);
  }

  /** Today's watch time per user id, in seconds */
  userWatchTimes(): ReadonlyMap<string, number> {
    return this.watchTime.userWatchTimes();
  }

  get dailyWatchTimeSeconds(): number {
    return this.watchTime.dailyTotalSeconds;
  }

  // ─── Poll path ───────────────────────────────────────────────────────────────

  private poll(reason: PollReason): Promise<void> {
    if (!this.pollInFlight) {
      this.pollInFlight = this.runPoll(reason).finally(() => {
        this.pollInFlight = null;
      });
    }
    return this.pollInFlight;
  }

  private async runPoll(reason: PollReason): Promise<void> {
    if (this.lifecycle !== 'running' || this.paused) return;

    let records: unknown[];
    try {
      records = await this.request((signal) => this.transport.listSessions({ signal }), 'listSessions');
    } catch (err) {
      if (this.lifecycle !== 'running') return;
      this.handlePollFailure(ErrorHandler.fromTransport(err, { operation: 'listSessions', reason }));
      return;
    }

    if (this.lifecycle !== 'running' || this.paused) return;

    try {
      await this.mutex.withLock(() => this.applySnapshot(records, reason));
    } catch (err) {
      this.logger.error({ err, reason }, 'Failed to apply session snapshot');
    }
  }

  private applySnapshot(records: unknown[], reason: PollReason): void {
    const next = new Map<string, RemoteSession>();
    for (const record of records) {
      let session: RemoteSession;
      try {
        session = parseSession(record);
      } catch (err) {
        this.logger.warn({ err }, 'Skipping malformed session record');
        continue;
      }
      if (this.accepts(session)) next.set(session.deviceKey, session);
    }

    const previous = this.sessions;
    this.sessions = next;

    for (const [deviceKey, lastKnown] of previous) {
      if (!next.has(deviceKey)) {
        this.watchTime.forget(deviceKey);
        this.publish({ type: 'removed', deviceKey, reason: 'poll', lastKnown });
      }
    }
    for (const [deviceKey, session] of next) {
      this.watchTime.record(session);
      const before = previous.get(deviceKey);
      if (!before) {
        this.publish({ type: 'added', deviceKey, session });
      } else {
        this.publishTransition(before, session, 'poll');
      }
    }

    if (this.pending.length > 0) {
      this.logger.debug({ dropped: this.pending.length }, 'Discarding buffered push events after poll');
      this.pending = [];
    }

    this.watchTime.pruneStale();
    this.lastPollAt = this.clock.now();
    this.lastFailure = null;
    this.consecutiveFailures = 0;
    if (!this.available) {
      this.available = true;
      this.logger.info('Media server reachable again');
      this.publish({ type: 'availabilityChanged', available: true, consecutiveFailures: 0 });
    }
    this.logger.debug({ reason, sessions: next.size }, 'Session poll applied');
  }

  private handlePollFailure(error: MediaSyncError): void {
    this.lastFailure = error;
    if (error instanceof AuthenticationRejectedError) {
      this.pauseForAuthentication(error, 'poll');
      return;
    }

    this.consecutiveFailures++;
    this.logger.warn(
      { err: error, consecutiveFailures: this.consecutiveFailures },
      'Session poll failed; keeping last known state'
    );

    if (this.consecutiveFailures === this.failureThreshold) {
      if (this.available) {
        this.available = false;
        this.publish({
          type: 'availabilityChanged',
          available: false,
          consecutiveFailures: this.consecutiveFailures,
        });
      }
      void this.attemptRecovery();
    }
  }

  /** Reconnect push and probe the server once. Never awaited by the poll. */
  private async attemptRecovery(): Promise<void> {
    this.recoveries++;
    this.logger.warn({ consecutiveFailures: this.consecutiveFailures }, 'Attempting connection recovery');
    this.push?.forceReconnect();

    try {
      const info = await this.request((signal) => this.transport.probe({ signal }), 'probe');
      this.logger.info({ server: info.name, version: info.version }, 'Recovery probe reached the server');
    } catch (err) {
      if (this.lifecycle !== 'running') return;
      const error = ErrorHandler.fromTransport(err, { operation: 'probe' });
      if (error instanceof AuthenticationRejectedError) {
        this.pauseForAuthentication(error, 'poll');
      } else {
        this.logger.warn({ err: error }, 'Recovery probe failed');
      }
    }
  }

  private pauseForAuthentication(error: AuthenticationRejectedError, source: ChangeSource): void {
    if (this.paused || this.lifecycle !== 'running') return;
    this.paused = true;
    this.lastFailure = error;
    this.clearPollTimer();
    this.clearHealthTimer();
    this.pollingSuspended = false;
    this.steadyPushMessages = 0;
    this.libraryWindow.cancel();
    // A rejecting push connection has already stopped itself
    if (source === 'poll') this.push?.stop();
    this.logger.error({ err: error, source }, 'Authentication rejected; sync paused until resumed');
    this.publish({ type: 'authenticationFailed', error, source });
  }

  private scheduleNextPoll(): void {
    if (this.lifecycle !== 'running' || this.paused || this.pollingSuspended) return;
    this.clearPollTimer();
    this.pollTimer = setTimeout(() => {
      this.pollTimer = null;
      void this.poll('interval').then(() => this.scheduleNextPoll());
    }, this.activePollIntervalMs);
  }

  /** Re-arm a waiting timer with the current interval. */
  private reschedulePoll(): void {
    if (this.pollTimer) this.scheduleNextPoll();
  }

  private clearPollTimer(): void {
    if (this.pollTimer) {
      clearTimeout(this.pollTimer);
      this.pollTimer = null;
    }
  }

  /** Run a poll-path request under the request timeout and stop()'s abort. */
  private request<T>(task: (signal: AbortSignal) => Promise<T>, operation: string): Promise<T> {
    const controller = new AbortController();
    this.requests.add(controller);
    return withTimeout(task, this.requestTimeoutMs, operation, controller.signal).finally(() => {
      this.requests.delete(controller);
    });
  }

  // ─── Polling suspension ──────────────────────────────────────────────────────

  private noteSteadyPush(): void {
    if (this.lifecycle !== 'running' || this.paused || this.connectionState !== 'connected') return;
    this.steadyPushMessages++;
    if (
      this.pushStableThreshold > 0 &&
      !this.pollingSuspended &&
      this.steadyPushMessages >= this.pushStableThreshold
    ) {
      this.suspendPolling();
    }
  }

  private suspendPolling(): void {
    this.pollingSuspended = true;
    this.clearPollTimer();
    this.logger.info({ messages: this.steadyPushMessages }, 'Push stream steady; suspending interval polling');
    this.publish({ type: 'pollingChanged', suspended: true });
    this.scheduleHealthCheck();
  }

  /** @returns false when polling was not suspended */
  private resumePolling(): boolean {
    this.steadyPushMessages = 0;
    if (!this.pollingSuspended) return false;
    this.pollingSuspended = false;
    this.clearHealthTimer();
    this.logger.info('Resuming interval polling');
    this.publish({ type: 'pollingChanged', suspended: false });
    this.scheduleNextPoll();
    return true;
  }

  private scheduleHealthCheck(): void {
    this.clearHealthTimer();
    this.healthTimer = setTimeout(() => {
      this.healthTimer = null;
      void this.checkHealth().then(() => {
        if (this.lifecycle === 'running' && this.pollingSuspended) this.scheduleHealthCheck();
      });
    }, this.healthCheckIntervalMs);
  }

  private async checkHealth(): Promise<void> {
    try {
      await this.request((signal) => this.transport.probe({ signal }), 'probe');
      this.logger.debug('Health check passed');
    } catch (err) {
      if (this.lifecycle !== 'running' || !this.pollingSuspended) return;
      const error = ErrorHandler.fromTransport(err, { operation: 'probe' });
      if (error instanceof AuthenticationRejectedError) {
        this.pauseForAuthentication(error, 'poll');
      } else {
        this.logger.warn({ err: error }, 'Health check failed; resuming polling');
        this.resumePolling();
      }
    }
  }

  private clearHealthTimer(): void {
    if (this.healthTimer) {
      clearTimeout(this.healthTimer);
      this.healthTimer = null;
    }
  }

  // ─── Event path ──────────────────────────────────────────────────────────────

  private handleConnectionState(state: ConnectionState, previous: ConnectionState): void {
    this.publish({ type: 'connectionChanged', state, previous });

    if (state === 'connected') {
      this.pushBacked = true;
      this.steadyPushMessages = 0;
      this.reschedulePoll();
      void this.poll('resync');
    } else if (previous === 'connected') {
      this.pushBacked = false;
      if (!this.resumePolling()) this.reschedulePoll();
    }
  }

  private handlePushMessage(message: SyncMessage): void {
    this.noteSteadyPush();
    void this.mutex
      .withLock(() => this.applyPushMessage(message))
      .catch((err: unknown) => {
        this.logger.error({ err, kind: message.kind }, 'Failed to apply push message');
      });
  }

  private applyPushMessage(message: SyncMessage): void {
    if (this.lifecycle !== 'running' || this.paused) return;

    switch (message.kind) {
      case 'sessions':
        for (const record of message.sessions) {
          let session: RemoteSession;
          try {
            session = parseSession(record);
          } catch (err) {
            this.logger.warn({ err }, 'Skipping malformed pushed session');
            continue;
          }
          const existing = this.sessions.get(session.deviceKey);
          if (!existing) {
            this.buffer(session.deviceKey, message.kind);
          } else if (this.accepts(session)) {
            this.sessions.set(session.deviceKey, session);
            this.watchTime.record(session);
            this.publishTransition(existing, session, 'push');
          }
        }
        return;

      case 'playback-progress':
      case 'playback-started':
      case 'playback-stopped': {
        const { patch } = message;
        const existing = this.sessions.get(patch.deviceKey);
        if (!existing) {
          this.buffer(patch.deviceKey, message.kind);
        } else {
          const next =
            message.kind === 'playback-stopped'
              ? clearPlayback(existing, patch.receivedAt)
              : applyPlaybackPatch(existing, patch);
          this.sessions.set(patch.deviceKey, next);
          if (message.kind === 'playback-stopped') {
            this.watchTime.forget(patch.deviceKey);
          } else {
            this.watchTime.record(next);
          }
          this.publishTransition(existing, next, 'push');
        }
        if (message.kind !== 'playback-progress') this.requestRefresh();
        return;
      }

      case 'session-ended': {
        const existing = this.sessions.get(message.deviceKey);
        this.pending = this.pending.filter((event) => event.deviceKey !== message.deviceKey);
        this.watchTime.forget(message.deviceKey);
        if (existing) {
          this.sessions.delete(message.deviceKey);
          this.publish({
            type: 'removed',
            deviceKey: message.deviceKey,
            reason: 'session-ended',
            lastKnown: existing,
          });
        }
        return;
      }

      case 'library-changed': {
        const invalidated = this.invalidateForLibraryChange(message.change);
        this.logger.debug({ invalidated }, 'Library changed');
        this.libraryWindow.push({ change: message.change, invalidated });
        return;
      }

      case 'user-data-changed':
        this.publish({ type: 'userDataChanged', userId: message.userId, items: message.items });
        return;

      case 'notification':
        this.publish({ type: 'notification', notification: message.notification });
        return;

      case 'user-changed':
        this.publish({
          type: 'userChanged',
          userId: message.userId,
          userName: message.userName,
          change: message.change,
        });
        return;

      case 'server-lifecycle':
        this.logger.info({ phase: message.phase }, 'Media server lifecycle event');
        this.publish({ type: 'serverLifecycle', phase: message.phase });
        return;
    }
  }

  private invalidateForLibraryChange(change: LibraryChange): number {
    if (!this.cache) return 0;
    const folders = [...change.foldersAddedTo, ...change.foldersRemovedFrom];
    if (folders.length === 0) return this.cache.invalidateAll();
    // Changed items can themselves be containers with cached pages
    return this.cache.invalidateContainers([
      ...folders,
      ...change.itemsAdded,
      ...change.itemsUpdated,
      ...change.itemsRemoved,
    ]);
  }

  private requestRefresh(): void {
    if (!this.refreshThrottle.tryAcquire()) return;
    void this.poll('push-refresh');
  }

  private buffer(deviceKey: string, kind: SyncMessage['kind']): void {
    if (this.pending.length >= this.maxPendingEvents) this.pending.shift();
    this.pending.push({ deviceKey, kind, receivedAt: this.clock.now() });
    this.logger.debug({ deviceKey, kind }, 'Buffered push event for unknown device');
  }

  // ─── Helpers ─────────────────────────────────────────────────────────────────

  private accepts(session: RemoteSession): boolean {
    if (this.excludedDevices.has(session.deviceKey)) return false;
    if (this.ignoreWebPlayers && isWebPlayer(session)) return false;
    return this.isControllable(session);
  }

  private publishTransition(previous: RemoteSession, session: RemoteSession, source: ChangeSource): void {
    const transition = describePlaybackTransition(previous, session);
    if (transition) {
      this.publish({
        type: 'playbackChanged',
        deviceKey: session.deviceKey,
        session,
        previous,
        transition,
        source,
      });
    }
  }

  private publish(event: SyncEvent): void {
    this.dispatcher.publish(event);
  }
}
