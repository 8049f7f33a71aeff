/**
 * Feed Fetcher - one source, one request, one parse
 *
 * Never throws: transport errors, non-2xx responses, timeouts and
 * unparsable documents all come back as an unsuccessful result with no
 * articles. There is no retry; the next category refresh is the retry.
 */

import type { NewsSource, SourceFetchResult } from './types';
import { parseFeed } from './parser';
import { fetchWithTimeout } from './utils';
import { DEFAULT_PIPELINE_CONFIG } from '@/lib/env';

export type FetchFeedOptions = {
  timeoutMs?: number;
  userAgent?: string;
  now?: () => Date;
};

export type FeedFetcher = (source: NewsSource, opts?: FetchFeedOptions) => Promise<SourceFetchResult>;

/**
 * Fetch and parse a single feed
 */
export const fetchFeed: FeedFetcher = async (source, opts = {}) => {
  const {
    timeoutMs = DEFAULT_PIPELINE_CONFIG.fetchTimeoutMs,
    userAgent = DEFAULT_PIPELINE_CONFIG.userAgent,
    now = () => new Date(),
  } = opts;
  const startTime = Date.now();

  const failed = (error: string): SourceFetchResult => {
    console.warn(`[news/fetcher] Failed: ${source.name} - ${error}`);
    return {
      sourceId: source.id,
      sourceName: source.name,
      success: false,
      articles: [],
      error,
      fetchTimeMs: Date.now() - startTime,
    };
  };

  let xml: string;
  try {
    const response = await fetchWithTimeout(source.feedUrl, {
      timeoutMs,
      headers: { 'User-Agent': userAgent },
    });
    if (!response.ok) {
      return failed(`HTTP ${response.status}`);
    }
    xml = await response.text();
  } catch (error) {
    return failed(error instanceof Error ? error.message : String(error));
  }

  const parsed = parseFeed(xml, source, now());
  if (!parsed.ok) {
    return failed(parsed.error);
  }

  const { articles, skipped } = parsed;
  console.log(
    `[news/fetcher] ${source.name}: ${articles.length} articles` +
      (skipped > 0 ? ` (${skipped} malformed items skipped)` : '')
  );
  return {
    sourceId: source.id,
    sourceName: source.name,
    success: true,
    articles,
    fetchTimeMs: Date.now() - startTime,
  };
};

/**
 * Check a candidate custom feed by parsing it under a throwaway source
 */
export async function validateFeedUrl(
  feedUrl: string,
  opts: FetchFeedOptions = {}
): Promise<{ success: boolean; articleCount: number; error?: string }> {
  const probe: NewsSource = {
    id: 'validation-test',
    name: 'Feed Validation',
    feedUrl,
    category: 'US',
    bias: 'Center',
    credibility: 50,
    factuality: 0.5,
  };

  const result = await fetchFeed(probe, opts);
  return {
    success: result.articles.length > 0,
    articleCount: result.articles.length,
    error: result.error,
  };
}
