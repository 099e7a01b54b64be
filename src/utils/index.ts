export { systemClock } from './clock.js';
export type { Clock } from './clock.js';
export { AsyncMutex } from './mutex.js';
export { withTimeout } from './timeout.js';
