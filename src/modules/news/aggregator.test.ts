/**
 * Aggregator tests: full-join fan-out, freshness cache, custom and local
 * sources. fetch is stubbed per URL.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { NewsAggregator } from './aggregator';
import { SourceRegistry, CustomSourceStore } from './sources';
import type { FeedFetcher } from './fetcher';
import type { NewsSource } from './types';
import type { PipelineConfig } from '@/lib/env';
import { createTestArticle, createTestSource, rssDocument, stubFeeds } from '@/test-setup';

const HOUR = 60 * 60 * 1000;
const START = Date.parse('2024-06-01T12:00:00Z');

function worldSource(key: string): NewsSource {
  return createTestSource({
    id: key,
    name: `Source ${key}`,
    feedUrl: `https://feeds.example.com/${key}.xml`,
    category: 'World',
  });
}

const SOURCES = ['malformed', 'offline', 'alpha', 'beta', 'gamma'].map(worldSource);

const FEEDS = {
  'https://feeds.example.com/malformed.xml': { body: '<rss><channel><item><title>Half' },
  'https://feeds.example.com/offline.xml': { error: new Error('connect ECONNREFUSED') },
  'https://feeds.example.com/alpha.xml': {
    body: rssDocument([
      { title: 'Election results certified in Ohio', link: 'https://a.example.com/1', pubDate: 'Sat, 01 Jun 2024 09:00:00 GMT' },
      { title: 'Bridge reopens after repairs', link: 'https://a.example.com/2', pubDate: 'Sat, 01 Jun 2024 07:00:00 GMT' },
    ]),
  },
  'https://feeds.example.com/beta.xml': {
    body: rssDocument([
      { title: 'Volcano erupts near Naples', link: 'https://b.example.com/1', pubDate: 'Sat, 01 Jun 2024 10:00:00 GMT' },
    ]),
  },
  'https://feeds.example.com/slow.xml': {
    body: rssDocument([{ title: 'Too late to matter', link: 'https://s.example.com/1' }]),
    delayMs: 5_000,
  },
  'https://feeds.example.com/gamma.xml': {
    body: rssDocument([
      { title: 'Chess champion retires early', link: 'https://c.example.com/1', pubDate: 'Sat, 01 Jun 2024 08:00:00 GMT' },
    ]),
  },
};

function setup(opts: { sources?: NewsSource[]; custom?: CustomSourceStore; config?: Partial<PipelineConfig> } = {}) {
  const clock = { now: START };
  const registry = new SourceRegistry(opts.custom ?? new CustomSourceStore(), opts.sources ?? SOURCES);
  const aggregator = new NewsAggregator({ registry, config: opts.config, now: () => clock.now });
  return { aggregator, registry, clock };
}

describe('NewsAggregator', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  describe('fetchCategory', () => {
    it('should return the union of the sources that succeeded, newest first', async () => {
      stubFeeds(FEEDS);
      const { aggregator } = setup();

      const articles = await aggregator.fetchCategory('World');

      expect(articles.map((a) => a.title)).toEqual([
        'Volcano erupts near Naples',
        'Election results certified in Ohio',
        'Chess champion retires early',
        'Bridge reopens after repairs',
      ]);
    });

    it('should fetch every source exactly once', async () => {
      const fetchMock = stubFeeds(FEEDS);
      const { aggregator } = setup();

      await aggregator.fetchCategory('World');

      expect(fetchMock).toHaveBeenCalledTimes(5);
    });

    it('should serve from cache inside the TTL', async () => {
      const fetchMock = stubFeeds(FEEDS);
      const { aggregator, clock } = setup();

      const first = await aggregator.fetchCategory('World');
      clock.now += HOUR - 1;
      const second = await aggregator.fetchCategory('World');

      expect(second).toBe(first);
      expect(fetchMock).toHaveBeenCalledTimes(5);
    });

    it('should refetch once the TTL has passed', async () => {
      const fetchMock = stubFeeds(FEEDS);
      const { aggregator, clock } = setup();

      await aggregator.fetchCategory('World');
      clock.now += HOUR;
      await aggregator.fetchCategory('World');

      expect(fetchMock).toHaveBeenCalledTimes(10);
    });

    it('should refetch after invalidation', async () => {
      const fetchMock = stubFeeds(FEEDS);
      const { aggregator } = setup();

      await aggregator.fetchCategory('World');
      aggregator.invalidate('World');
      await aggregator.fetchCategory('World');
      aggregator.invalidateAll();
      await aggregator.fetchCategory('World');

      expect(fetchMock).toHaveBeenCalledTimes(15);
    });

    it('should keep the good sources when one is malformed and one times out', async () => {
      stubFeeds(FEEDS);
      const sources = ['malformed', 'slow', 'alpha', 'beta', 'gamma'].map(worldSource);
      const { aggregator } = setup({ sources, config: { fetchTimeoutMs: 50 } });

      const report = await aggregator.fetchCategoryReport('World');

      expect(report.articles.map((a) => a.title)).toEqual([
        'Volcano erupts near Naples',
        'Election results certified in Ohio',
        'Chess champion retires early',
        'Bridge reopens after repairs',
      ]);
      expect(report.bySource).toHaveLength(5);
      expect(report.bySource.filter((r) => r.success).map((r) => r.sourceId).sort()).toEqual(['alpha', 'beta', 'gamma']);
      expect(report.bySource.find((r) => r.sourceId === 'slow')).toMatchObject({ success: false, articles: [] });
    });

    it('should resolve to an empty list when every source fails', async () => {
      stubFeeds({});
      const { aggregator } = setup();

      expect(await aggregator.fetchCategory('World')).toEqual([]);
    });

    it('should drop wire copies carried by several sources', async () => {
      const wire = rssDocument([
        { title: 'Summit ends with joint statement', link: 'https://wire.example.com/1', pubDate: 'Sat, 01 Jun 2024 09:00:00 GMT' },
      ]);
      stubFeeds({
        'https://feeds.example.com/alpha.xml': { body: wire },
        'https://feeds.example.com/beta.xml': { body: wire },
      });
      const { aggregator } = setup({ sources: [worldSource('alpha'), worldSource('beta')] });

      const report = await aggregator.fetchCategoryReport('World');

      expect(report.totalFetched).toBe(2);
      expect(report.articles).toHaveLength(1);
    });

    it('should cap the list at the configured maximum', async () => {
      stubFeeds(FEEDS);
      const registry = new SourceRegistry(new CustomSourceStore(), SOURCES);
      const aggregator = new NewsAggregator({ registry, config: { maxArticles: 2 } });

      const articles = await aggregator.fetchCategory('World');

      expect(articles.map((a) => a.title)).toEqual(['Volcano erupts near Naples', 'Election results certified in Ohio']);
    });
  });

  describe('fetchCategoryReport', () => {
    it('should report every source outcome', async () => {
      stubFeeds(FEEDS);
      const { aggregator } = setup();

      const report = await aggregator.fetchCategoryReport('World');

      expect(report.cached).toBe(false);
      expect(report.category).toBe('World');
      expect(report.totalFetched).toBe(4);
      expect(report.fetchedAt).toBe('2024-06-01T12:00:00.000Z');
      expect(report.bySource).toHaveLength(5);

      const byId = new Map(report.bySource.map((r) => [r.sourceId, r]));
      expect(byId.get('malformed')?.success).toBe(false);
      expect(byId.get('offline')?.error).toBe('connect ECONNREFUSED');
      expect(byId.get('alpha')?.articles).toHaveLength(2);
      expect(byId.get('beta')?.success).toBe(true);
      expect(byId.get('gamma')?.success).toBe(true);
    });

    it('should mark a report served from cache', async () => {
      stubFeeds(FEEDS);
      const { aggregator, clock } = setup();

      const fresh = await aggregator.fetchCategoryReport('World');
      clock.now += 5 * 60 * 1000;
      const cached = await aggregator.fetchCategoryReport('World');

      expect(cached.cached).toBe(true);
      expect(cached.bySource).toEqual([]);
      expect(cached.articles).toBe(fresh.articles);
      expect(cached.fetchedAt).toBe(fresh.fetchedAt);
    });
  });

  describe('sources', () => {
    it('should include enabled custom sources and record their fetch', async () => {
      const custom = new CustomSourceStore();
      const record = custom.add({ name: 'Harbor Blog', feedUrl: 'https://blog.example.com/rss', category: 'World' });
      const fetchMock = stubFeeds({
        'https://blog.example.com/rss': {
          body: rssDocument([{ title: 'Ferry schedule changes', link: 'https://blog.example.com/ferry' }]),
        },
      });
      const { aggregator } = setup({ sources: [], custom });

      const articles = await aggregator.fetchCategory('World');

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(articles[0].source.id).toBe(`custom-${record.id}`);
      expect(custom.list()[0].articleCount).toBe(1);
      expect(custom.list()[0].lastFetchedAt).toBeInstanceOf(Date);
    });

    it('should skip disabled custom sources', async () => {
      const custom = new CustomSourceStore();
      const record = custom.add({ name: 'Harbor Blog', feedUrl: 'https://blog.example.com/rss', category: 'World' });
      custom.toggleEnabled(record.id);
      const fetchMock = stubFeeds({});
      const { aggregator } = setup({ sources: [], custom });

      await aggregator.fetchCategory('World');

      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should add the local search feed when a location is given', async () => {
      const localUrl = 'https://news.google.com/rss/search?q=when:24h+allinurl:Austin+TX';
      const fetchMock = stubFeeds({
        [localUrl]: { body: rssDocument([{ title: 'City council approves park', link: 'https://local.example.com/park' }]) },
      });
      const { aggregator } = setup({ sources: [] });

      const articles = await aggregator.fetchCategory('Local', { location: { city: 'Austin', state: 'TX' } });

      expect(fetchMock).toHaveBeenCalledWith(localUrl, expect.anything());
      expect(articles[0].category).toBe('Local');
      expect(articles[0].source.id).toBe('local-austin');
    });
  });

  describe('with an injected fetcher', () => {
    it('should contain a fetcher that throws', async () => {
      const good = worldSource('alpha');
      const fetcher: FeedFetcher = async (source) => {
        if (source.id !== good.id) throw new Error('boom');
        return {
          sourceId: source.id,
          sourceName: source.name,
          success: true,
          articles: [createTestArticle({ source, category: 'World' })],
          fetchTimeMs: 1,
        };
      };
      const registry = new SourceRegistry(new CustomSourceStore(), [good, worldSource('beta')]);
      const aggregator = new NewsAggregator({ registry, fetcher });

      const report = await aggregator.fetchCategoryReport('World');

      expect(report.articles).toHaveLength(1);
      expect(report.bySource.find((r) => r.sourceId === 'beta')).toMatchObject({ success: false, error: 'boom' });
      expect(console.error).toHaveBeenCalledWith('[news/aggregator] Unexpected error from Source beta: boom');
    });

    it('should fetch every category in turn', async () => {
      const fetcher = vi.fn(async (source: NewsSource) => ({
        sourceId: source.id,
        sourceName: source.name,
        success: true,
        articles: [createTestArticle({ source, category: source.category })],
        fetchTimeMs: 0,
      }));
      const sports = createTestSource({ id: 'sports-desk', category: 'Sports' });
      const science = createTestSource({ id: 'science-desk', category: 'Science' });
      const registry = new SourceRegistry(new CustomSourceStore(), [sports, science]);
      const aggregator = new NewsAggregator({ registry, fetcher });

      const all = await aggregator.fetchAllCategories();

      expect(all.size).toBe(9);
      expect(all.get('Sports')).toHaveLength(1);
      expect(all.get('Science')).toHaveLength(1);
      expect(all.get('US')).toEqual([]);
      expect(fetcher).toHaveBeenCalledTimes(2);
    });
  });

  describe('groupSimilarStories', () => {
    it('should use the configured thresholds', () => {
      const at = new Date(START);
      const articles = [
        createTestArticle({ title: 'Storm hits coast', publishedAt: at }),
        createTestArticle({ title: 'Storm hits the coast tonight', publishedAt: at }),
      ];

      // 3 of 5 words shared: 0.6
      expect(new NewsAggregator().groupSimilarStories(articles)).toEqual([]);
      expect(new NewsAggregator({ config: { clusterThreshold: 0.5 } }).groupSimilarStories(articles)).toHaveLength(1);
    });
  });
});
