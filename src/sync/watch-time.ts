/**
 * Per-user watch time
 *
 * Credits forward playback between successive position reports for the same
 * user on the same device. A backward move or a jump longer than
 * `maxDeltaSeconds` is a seek and credits nothing. Totals restart each local
 * calendar day.
 */

import type { RemoteSession } from '../models/types.js';
import { systemClock, type Clock } from '../utils/clock.js';

export interface WatchTimeOptions {
  /** Largest gap between two reports that still counts as watching. Default 60 */
  maxDeltaSeconds?: number;
  /** Playbacks without a report for this long are forgotten. Default 3 600 000 */
  staleAfterMs?: number;
  clock?: Clock;
}

interface TrackedPlayback {
  userId: string;
  deviceKey: string;
  itemId: string;
  positionSeconds: number;
  reportedAt: number;
}

function dayOf(timestamp: number): string {
  return new Date(timestamp).toDateString();
}

export class WatchTimeTracker {
  private readonly maxDeltaSeconds: number;
  private readonly staleAfterMs: number;
  private readonly clock: Clock;

  /** `userId:deviceKey` → last report */
  private playbacks = new Map<string, TrackedPlayback>();
  private totals = new Map<string, number>();
  private day: string;

  constructor(options: WatchTimeOptions = {}) {
    this.maxDeltaSeconds = options.maxDeltaSeconds ?? 60;
    this.staleAfterMs = options.staleAfterMs ?? 3_600_000;
    this.clock = options.clock ?? systemClock;
    this.day = dayOf(this.clock.now());
  }

  /**
   * Take a position report from a session snapshot.
   *
   * @returns seconds credited to the session's user
   */
  record(session: RemoteSession): number {
    const now = this.clock.now();
    this.rollOver(now);

    const { userId, nowPlaying, playback } = session;
    if (!userId || !nowPlaying || !playback) return 0;

    const key = `${userId}:${session.deviceKey}`;
    const previous = this.playbacks.get(key);
    this.playbacks.set(key, {
      userId,
      deviceKey: session.deviceKey,
      itemId: nowPlaying.id,
      positionSeconds: playback.positionSeconds,
      reportedAt: now,
    });

    // Paused reports move the baseline only
    if (!previous || playback.paused || previous.itemId !== nowPlaying.id) return 0;

    const delta = playback.positionSeconds - previous.positionSeconds;
    if (delta <= 0 || delta > this.maxDeltaSeconds) return 0;

    this.totals.set(userId, (this.totals.get(userId) ?? 0) + delta);
    return delta;
  }

  /** Stop tracking playback on a device, for one user or all of them. */
  forget(deviceKey: string, userId?: string): number {
    let removed = 0;
    for (const [key, playback] of this.playbacks) {
      if (playback.deviceKey === deviceKey && (userId === undefined || playback.userId === userId)) {
        this.playbacks.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /** Drop playbacks without a report for `staleAfterMs`. */
  pruneStale(): number {
    const cutoff = this.clock.now() - this.staleAfterMs;
    let removed = 0;
    for (const [key, playback] of this.playbacks) {
      if (playback.reportedAt < cutoff) {
        this.playbacks.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /** Seconds watched today by `userId` */
  getUserWatchTime(userId: string): number {
    this.rollOver(this.clock.now());
    return this.totals.get(userId) ?? 0;
  }

  userWatchTimes(): ReadonlyMap<string, number> {
    this.rollOver(this.clock.now());
    return new Map(this.totals);
  }

  get dailyTotalSeconds(): number {
    let total = 0;
    for (const seconds of this.userWatchTimes().values()) total += seconds;
    return total;
  }

  get trackedCount(): number {
    return this.playbacks.size;
  }

  private rollOver(now: number): void {
    const today = dayOf(now);
    if (today !== this.day) {
      this.day = today;
      this.totals.clear();
    }
  }
}
