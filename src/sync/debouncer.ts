/**
 * Timing helpers for the coordinator's event path.
 */

import { systemClock, type Clock } from '../utils/clock.js';

/**
 * Collects values over a fixed window that opens with the first push and
 * flushes the merged value when it closes. Later pushes do not extend the
 * window, so a steady stream still flushes every `windowMs`.
 */
export class CoalescingWindow<T> {
  private pending: { value: T } | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(
    private readonly windowMs: number,
    private readonly merge: (accumulated: T, next: T) => T,
    private readonly flush: (value: T) => void
  ) {}

  push(value: T): void {
    this.pending = { value: this.pending ? this.merge(this.pending.value, value) : value };
    if (!this.timer) {
      this.timer = setTimeout(() => this.flushNow(), this.windowMs);
    }
  }

  /** Flush immediately if anything is pending. */
  flushNow(): void {
    this.clearTimer();
    const pending = this.pending;
    this.pending = null;
    if (pending) this.flush(pending.value);
  }

  cancel(): void {
    this.clearTimer();
    this.pending = null;
  }

  get isPending(): boolean {
    return this.pending !== null;
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}

/** Lets a call through at most once per `intervalMs`. */
export class Throttle {
  private lastAllowedAt: number | null = null;

  constructor(
    private readonly intervalMs: number,
    private readonly clock: Clock = systemClock
  ) {}

  /** True when the caller may proceed; records the attempt. */
  tryAcquire(): boolean {
    const now = this.clock.now();
    if (this.lastAllowedAt !== null && now - this.lastAllowedAt < this.intervalMs) {
      return false;
    }
    this.lastAllowedAt = now;
    return true;
  }

  reset(): void {
    this.lastAllowedAt = null;
  }
}
