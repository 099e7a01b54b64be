/**
 * Sync: the coordinator, its timing helpers and the engine factory.
 */

export {
  SessionSyncCoordinator,
  mergeLibraryChanges,
  MIN_POLL_INTERVAL_MS,
  MAX_POLL_INTERVAL_MS,
} from './coordinator.js';
export type { SessionSyncOptions, InvalidatableCache } from './coordinator.js';
export { CoalescingWindow, Throttle } from './debouncer.js';
export { WatchTimeTracker } from './watch-time.js';
export type { WatchTimeOptions } from './watch-time.js';
export { createSyncEngine } from './engine.js';
export type { SyncEngine, SyncEngineOverrides } from './engine.js';
