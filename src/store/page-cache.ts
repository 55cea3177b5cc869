/**
 * Bounded cache of fetched page windows.
 *
 * Entries are keyed by every field of the page request. Eviction is least
 * recently used; both `get` hits and `put` count as a use. The cache is a
 * latency optimization only, any entry may be dropped at any time.
 */

import { PAGE_CACHE } from '../config/constants';
import { PageRequest, PageResult, SourceId } from '../models/tabular-source';
import { pageRequestKey } from '../utils/page-planner';

export interface PageCacheEntry {
  request: PageRequest;
  result: PageResult;
  /**
   * Monotonic recency token, greater means more recently used.
   */
  recency: number;
}

export class PageCache {
  private readonly entries = new Map<string, PageCacheEntry>();
  private readonly capacity: number;
  private clock = 0;

  constructor(capacity: number = PAGE_CACHE.DEFAULT_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Page cache capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.entries.size;
  }

  get maxSize(): number {
    return this.capacity;
  }

  /**
   * @returns The cached result or `undefined` on a miss
   */
  get(request: PageRequest): PageResult | undefined {
    const key = pageRequestKey(request);
    const entry = this.entries.get(key);

    if (!entry) {
      return undefined;
    }

    this.touch(key, entry);
    return entry.result;
  }

  has(request: PageRequest): boolean {
    return this.entries.has(pageRequestKey(request));
  }

  put(request: PageRequest, result: PageResult): void {
    const key = pageRequestKey(request);
    this.touch(key, { request, result, recency: 0 });
    this.enforceCapacity();
  }

  /**
   * Drops every entry of a source. Called on refresh, close and detected mutation.
   *
   * @returns The number of dropped entries
   */
  invalidateSource(sourceId: SourceId): number {
    let dropped = 0;

    for (const [key, entry] of this.entries) {
      if (entry.request.sourceId === sourceId) {
        this.entries.delete(key);
        dropped += 1;
      }
    }

    return dropped;
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Entries from least to most recently used.
   */
  snapshot(): PageCacheEntry[] {
    return Array.from(this.entries.values());
  }

  private touch(key: string, entry: PageCacheEntry): void {
    this.clock += 1;
    // Re-inserting keeps the map ordered by recency
    this.entries.delete(key);
    this.entries.set(key, { ...entry, recency: this.clock });
  }

  private enforceCapacity(): void {
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        return;
      }
      this.entries.delete(oldest.value);
    }
  }
}
