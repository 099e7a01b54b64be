export { createLogger, getLogger, setLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';
