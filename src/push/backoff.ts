/**
 * Reconnect backoff
 *
 *   delay(n) = min(base · 2^n, max) · (1 + jitter · (2r − 1))
 *
 * where n counts consecutive failed attempts from 0 and r is uniform in [0, 1).
 */

import { systemClock, type Clock } from '../utils/clock.js';

export interface BackoffOptions {
  /** Default 1 000 ms */
  baseDelayMs?: number;
  /** Default 60 000 ms */
  maxDelayMs?: number;
  /** Fraction of the delay to randomise, 0–1. Default 0.2 */
  jitter?: number;
  /** A connection that lasted this long resets the attempt counter. Default 30 000 ms */
  resetAfterMs?: number;
}

export type ResolvedBackoffOptions = Required<BackoffOptions>;

export const DEFAULT_BACKOFF: ResolvedBackoffOptions = {
  baseDelayMs: 1_000,
  maxDelayMs: 60_000,
  jitter: 0.2,
  resetAfterMs: 30_000,
};

export function computeBackoffDelay(
  attempt: number,
  options: Pick<ResolvedBackoffOptions, 'baseDelayMs' | 'maxDelayMs' | 'jitter'> = DEFAULT_BACKOFF,
  random: () => number = Math.random
): number {
  const exponential = Math.min(options.baseDelayMs * 2 ** Math.max(0, attempt), options.maxDelayMs);
  const factor = 1 + options.jitter * (random() * 2 - 1);
  return Math.max(0, Math.round(exponential * factor));
}

/** Attempt counter around computeBackoffDelay. */
export class BackoffPolicy {
  private readonly options: ResolvedBackoffOptions;
  private attempt = 0;
  private connectedAt: number | null = null;

  constructor(
    options: BackoffOptions = {},
    private readonly clock: Clock = systemClock,
    private readonly random: () => number = Math.random
  ) {
    this.options = {
      baseDelayMs: options.baseDelayMs ?? DEFAULT_BACKOFF.baseDelayMs,
      maxDelayMs: options.maxDelayMs ?? DEFAULT_BACKOFF.maxDelayMs,
      jitter: options.jitter ?? DEFAULT_BACKOFF.jitter,
      resetAfterMs: options.resetAfterMs ?? DEFAULT_BACKOFF.resetAfterMs,
    };
  }

  get attempts(): number {
    return this.attempt;
  }

  /** Delay before the next attempt; advances the counter. */
  nextDelay(): number {
    const delay = computeBackoffDelay(this.attempt, this.options, this.random);
    this.attempt++;
    return delay;
  }

  markConnected(): void {
    this.connectedAt = this.clock.now();
  }

  /** Call when a connection ends; a long enough session clears the counter. */
  markDisconnected(): void {
    if (this.connectedAt !== null && this.clock.now() - this.connectedAt >= this.options.resetAfterMs) {
      this.attempt = 0;
    }
    this.connectedAt = null;
  }

  reset(): void {
    this.attempt = 0;
    this.connectedAt = null;
  }
}
