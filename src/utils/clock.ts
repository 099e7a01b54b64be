/** Time source, injectable so backoff and TTL logic can be tested without real timers. */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};
