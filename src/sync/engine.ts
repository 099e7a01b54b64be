/**
 * Wires the sync engine together from a validated MediaSyncConfig:
 * REST client, push connection, content cache, dispatcher and coordinator.
 */

import type { MediaSyncConfig } from '../config/config.js';
import { EventDispatcher } from '../events/dispatcher.js';
import { getLogger, type Logger } from '../logging/logger.js';
import { isRemoteControllable, requiresCapabilities } from '../models/session-parser.js';
import { PushConnectionManager, buildPushUrl, type PushSocketFactory } from '../push/connection.js';
import { ContentCache } from '../storage/content-cache.js';
import { CachedLibraryBrowser } from '../storage/library-browser.js';
import { MediaServerClient } from '../transport/client.js';
import type { LibraryPage, TransportClient } from '../transport/types.js';
import { SessionSyncCoordinator } from './coordinator.js';

export interface SyncEngineOverrides {
  logger?: Logger;
  /** Replaces the axios client */
  transport?: TransportClient;
  /** Replaces the `ws` socket */
  socketFactory?: PushSocketFactory;
}

export interface SyncEngine {
  coordinator: SessionSyncCoordinator;
  transport: TransportClient;
  push: PushConnectionManager | undefined;
  cache: ContentCache<LibraryPage>;
  library: CachedLibraryBrowser;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export function createSyncEngine(config: MediaSyncConfig, overrides: SyncEngineOverrides = {}): SyncEngine {
  const logger = overrides.logger ?? getLogger();
  const { server, sync, cache: cacheConfig } = config;

  const transport =
    overrides.transport ??
    new MediaServerClient({
      host: server.host,
      port: server.port,
      ssl: server.ssl,
      apiKey: server.apiKey,
      deviceId: server.deviceId,
      timeoutMs: sync.requestTimeoutSeconds * 1000,
    });

  const push = sync.pushEnabled
    ? new PushConnectionManager({
        url: buildPushUrl(server),
        socketFactory: overrides.socketFactory,
        sessionsIntervalMs: sync.sessionsIntervalMs,
        logger,
      })
    : undefined;

  const cache = new ContentCache<LibraryPage>({
    maxEntries: cacheConfig.maxEntries,
    defaultTtlMs: cacheConfig.ttlSeconds * 1000,
  });

  const coordinator = new SessionSyncCoordinator({
    transport,
    push,
    cache,
    dispatcher: new EventDispatcher({ logger }),
    pollIntervalMs: sync.pollIntervalSeconds * 1000,
    pushPollIntervalMs: sync.pushPollIntervalSeconds * 1000,
    requestTimeoutMs: sync.requestTimeoutSeconds * 1000,
    failureThreshold: sync.failureThreshold,
    pushStableThreshold: sync.pushStableThreshold,
    healthCheckIntervalMs: sync.healthCheckIntervalSeconds * 1000,
    excludedDevices: sync.excludedDevices,
    ignoreWebPlayers: sync.ignoreWebPlayers,
    isControllable:
      sync.requiredCapabilities.length > 0 ? requiresCapabilities(sync.requiredCapabilities) : isRemoteControllable,
    logger,
  });

  return {
    coordinator,
    transport,
    push,
    cache,
    library: new CachedLibraryBrowser(transport, cache),
    async start() {
      cache.startSweeping(cacheConfig.sweepIntervalSeconds * 1000);
      await coordinator.start();
    },
    async stop() {
      cache.stopSweeping();
      await coordinator.stop();
    },
  };
}
