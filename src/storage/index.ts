/**
 * Storage: library content cache and the cached browse path.
 */

export { ContentCache, buildCacheKey } from './content-cache.js';
export type { CacheEntry, CacheStats, ContentCacheOptions, CacheKeyParts } from './content-cache.js';

export { CachedLibraryBrowser } from './library-browser.js';
export type { BrowseOptions } from './library-browser.js';
