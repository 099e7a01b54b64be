export { ConfigManager, CONFIG_KEYS, LOG_LEVELS } from './config.js';
export type { MediaSyncConfig } from './config.js';
