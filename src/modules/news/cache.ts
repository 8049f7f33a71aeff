/**
 * Freshness Cache - per-category article lists with a TTL
 *
 * One instance per aggregator, so tests get an isolated cache. Entries are
 * replaced whole; there is no partial refresh.
 */

import type { Article, CacheEntry, NewsCategory } from './types';
import { PIPELINE_DEFAULTS } from '@/lib/env';

export type FreshnessCacheOptions = {
  ttlMs?: number;
  now?: () => number;
};

export class FreshnessCache {
  private readonly entries = new Map<NewsCategory, CacheEntry>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(opts: FreshnessCacheOptions = {}) {
    this.ttlMs = opts.ttlMs ?? PIPELINE_DEFAULTS.CACHE_TTL_MS;
    this.now = opts.now ?? Date.now;
  }

  /**
   * Articles for a category if refreshed less than `ttlMs` ago. A stale
   * entry is dropped.
   */
  get(category: NewsCategory): Article[] | undefined {
    const entry = this.entries.get(category);
    if (!entry) return undefined;

    if (this.now() - entry.fetchedAt < this.ttlMs) {
      return entry.articles;
    }

    this.entries.delete(category);
    return undefined;
  }

  set(category: NewsCategory, articles: Article[]): void {
    this.entries.set(category, { fetchedAt: this.now(), articles });
  }

  /**
   * Cached list, or run `load` and store its result
   */
  async getOrFetch(category: NewsCategory, load: () => Promise<Article[]>): Promise<Article[]> {
    const cached = this.get(category);
    if (cached) return cached;

    const articles = await load();
    this.set(category, articles);
    return articles;
  }

  entry(category: NewsCategory): CacheEntry | undefined {
    return this.entries.get(category);
  }

  invalidate(category: NewsCategory): void {
    this.entries.delete(category);
  }

  invalidateAll(): void {
    this.entries.clear();
  }
}
