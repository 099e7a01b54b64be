/**
 * Cached library browsing
 *
 * Pages of a container are served from the ContentCache when fresh;
 * concurrent misses for the same page share one transport call. A fetch that
 * straddles an invalidation of its container is returned to its callers but
 * never cached, and later callers start a new fetch instead of joining it.
 */

import { RequestCoalescer } from '../transport/coalescer.js';
import type { LibraryCursor, LibraryFilters, LibraryPage, TransportClient } from '../transport/types.js';
import { ContentCache, buildCacheKey } from './content-cache.js';

export interface BrowseOptions {
  /** Skip the cache lookup and refresh the entry from the server */
  bypassCache?: boolean;
  /** Overrides the cache's default TTL for this page */
  ttlMs?: number;
}

export class CachedLibraryBrowser {
  private coalescer = new RequestCoalescer<LibraryPage>();

  constructor(
    private readonly transport: Pick<TransportClient, 'getLibraryItems'>,
    private readonly cache: ContentCache<LibraryPage>
  ) {}

  async getLibraryItems(
    containerId: string,
    cursor: LibraryCursor = { startIndex: 0, limit: 100 },
    filters: LibraryFilters = {},
    options: BrowseOptions = {}
  ): Promise<LibraryPage> {
    const key = buildCacheKey({
      containerId,
      cursor: `${cursor.startIndex}:${cursor.limit}`,
      filters,
    });

    if (!options.bypassCache) {
      const cached = this.cache.get(key);
      if (cached) return cached;
    }

    const generation = this.cache.generationOf(containerId);
    return this.coalescer.run(`${generation}#${key}`, async () => {
      const page = await this.transport.getLibraryItems(containerId, cursor, filters);
      if (this.cache.generationOf(containerId) === generation) {
        this.cache.put(key, page, options.ttlMs, containerId);
      }
      return page;
    });
  }
}
