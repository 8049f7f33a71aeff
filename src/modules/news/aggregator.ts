/**
 * News Aggregator - category fetch orchestration
 *
 * fetchCategory: cache -> sources -> parallel fetch (full join) -> dedupe
 * -> cap -> cache.
 *
 * Each source is one independent unit of work with its own parser state.
 * Results are gathered in completion order, which varies between runs;
 * dedupe and story grouping are order-dependent, so borderline decisions
 * can differ from one refresh to the next.
 */

import {
  ALL_CATEGORIES,
  type Article,
  type CategoryFetchReport,
  type NewsCategory,
  type NewsSource,
  type SourceFetchResult,
  type StoryGroup,
  type UserLocation,
} from './types';
import { FreshnessCache } from './cache';
import { capByRecency, dedupeArticles } from './dedupe';
import { fetchFeed, type FeedFetcher, type FetchFeedOptions } from './fetcher';
import { SourceRegistry } from './sources';
import { groupSimilarStories } from './story-clustering';
import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from '@/lib/env';

export type NewsAggregatorDeps = {
  registry?: SourceRegistry;
  cache?: FreshnessCache;
  fetcher?: FeedFetcher;
  config?: Partial<PipelineConfig>;
  now?: () => number;
};

export type FetchCategoryOptions = {
  location?: UserLocation;
};

export class NewsAggregator {
  readonly registry: SourceRegistry;
  private readonly cache: FreshnessCache;
  private readonly fetcher: FeedFetcher;
  private readonly config: PipelineConfig;
  private readonly now: () => number;

  constructor(deps: NewsAggregatorDeps = {}) {
    this.config = { ...DEFAULT_PIPELINE_CONFIG, ...deps.config };
    this.now = deps.now ?? Date.now;
    this.registry = deps.registry ?? new SourceRegistry();
    this.cache = deps.cache ?? new FreshnessCache({ ttlMs: this.config.cacheTtlMs, now: this.now });
    this.fetcher = deps.fetcher ?? fetchFeed;
  }

  /**
   * Deduplicated, newest-first articles for a category, from cache while
   * fresh
   */
  async fetchCategory(category: NewsCategory, opts: FetchCategoryOptions = {}): Promise<Article[]> {
    return this.cache.getOrFetch(category, async () => {
      const report = await this.refresh(category, opts);
      return report.articles;
    });
  }

  /**
   * fetchCategory plus per-source outcomes. `bySource` is empty when the
   * result came from cache.
   */
  async fetchCategoryReport(category: NewsCategory, opts: FetchCategoryOptions = {}): Promise<CategoryFetchReport> {
    const cached = this.cache.get(category);
    if (cached) {
      console.log(`[news/aggregator] Using cached articles for ${category} (${cached.length} articles)`);
      return {
        category,
        articles: cached,
        bySource: [],
        totalFetched: cached.length,
        fetchedAt: new Date(this.cache.entry(category)?.fetchedAt ?? this.now()).toISOString(),
        cached: true,
      };
    }

    const report = await this.refresh(category, opts);
    this.cache.set(category, report.articles);
    return report;
  }

  /**
   * Full fetch -> dedupe -> cap, without touching the cache
   */
  private async refresh(category: NewsCategory, opts: FetchCategoryOptions): Promise<CategoryFetchReport> {
    const sources = this.registry.sourcesFor(category, opts);
    const bySource = await this.fetchAll(sources);

    const raw = bySource.flatMap((r) => r.articles);
    const deduped = dedupeArticles(raw, this.config.dedupThreshold);
    const articles = capByRecency(deduped, this.config.maxArticles);

    for (const result of bySource) {
      this.registry.custom.recordFetch(result.sourceId, result.articles.length);
    }

    console.log(
      `[news/aggregator] Fetched ${articles.length} articles for ${category} (from ${sources.length} sources)`
    );

    return {
      category,
      articles,
      bySource,
      totalFetched: raw.length,
      fetchedAt: new Date(this.now()).toISOString(),
      cached: false,
    };
  }

  /**
   * Every category, one after another
   */
  async fetchAllCategories(opts: FetchCategoryOptions = {}): Promise<Map<NewsCategory, Article[]>> {
    const results = new Map<NewsCategory, Article[]>();
    for (const category of ALL_CATEGORIES) {
      results.set(category, await this.fetchCategory(category, opts));
    }
    return results;
  }

  groupSimilarStories(articles: Article[]): StoryGroup[] {
    return groupSimilarStories(articles, {
      minSimilarity: this.config.clusterThreshold,
      timeWindowMs: this.config.clusterWindowMs,
    });
  }

  invalidate(category: NewsCategory): void {
    this.cache.invalidate(category);
  }

  invalidateAll(): void {
    this.cache.invalidateAll();
    console.log('[news/aggregator] Cleared all article caches');
  }

  /**
   * Fan out one unit per source and wait for all of them. A unit never
   * rejects, so nothing short-circuits.
   */
  private async fetchAll(sources: NewsSource[]): Promise<SourceFetchResult[]> {
    const completed: SourceFetchResult[] = [];
    const fetchOpts: FetchFeedOptions = {
      timeoutMs: this.config.fetchTimeoutMs,
      userAgent: this.config.userAgent,
      now: () => new Date(this.now()),
    };

    await Promise.all(
      sources.map(async (source) => {
        const result = await this.runUnit(source, fetchOpts);
        completed.push(result);
      })
    );

    return completed;
  }

  private async runUnit(
    source: NewsSource,
    fetchOpts: FetchFeedOptions
  ): Promise<SourceFetchResult> {
    const startTime = this.now();
    try {
      return await this.fetcher(source, fetchOpts);
    } catch (error) {
      // fetchFeed never throws; an injected fetcher might
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[news/aggregator] Unexpected error from ${source.name}: ${message}`);
      return {
        sourceId: source.id,
        sourceName: source.name,
        success: false,
        articles: [],
        error: message,
        fetchTimeMs: this.now() - startTime,
      };
    }
  }
}
