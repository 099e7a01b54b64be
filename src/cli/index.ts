/**
 * mediasync CLI: command program and output formatting.
 */

export { MediaSyncCLI, parseCommandArgs } from './cli.js';
export type { EngineFactory } from './cli.js';
export { OutputFormatter, formatDuration } from './formatter.js';
export type { ServerStatus } from './formatter.js';
