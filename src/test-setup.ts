/**
 * Test Setup - shared fixtures for the news pipeline tests
 *
 * Usage:
 *   import { createTestSource, createTestArticle, stubFeeds } from '@/test-setup';
 */

import { vi } from 'vitest';
import type { Article, NewsSource } from '@/modules/news/types';

// ============================================================================
// Sources & Articles
// ============================================================================

export function createTestSource(overrides: Partial<NewsSource> = {}): NewsSource {
  return {
    id: 'test-source',
    name: 'Test Source',
    feedUrl: 'https://feeds.example.com/test.xml',
    category: 'US',
    bias: 'Center',
    credibility: 80,
    factuality: 0.8,
    ...overrides,
  };
}

let articleCounter = 0;

export function createTestArticle(overrides: Partial<Article> = {}): Article {
  articleCounter++;
  return {
    id: `article-${articleCounter}`,
    title: `Test article ${articleCounter}`,
    source: createTestSource(),
    url: `https://example.com/articles/${articleCounter}`,
    publishedAt: new Date('2024-03-01T12:00:00Z'),
    category: 'US',
    isRead: false,
    isFavorite: false,
    isBreakingNews: false,
    importance: 5,
    ...overrides,
  };
}

// ============================================================================
// Feed Documents
// ============================================================================

export type TestItem = {
  title?: string;
  link?: string;
  pubDate?: string;
  description?: string;
};

export function rssDocument(items: TestItem[]): string {
  const body = items
    .map((item) => {
      const parts = [
        item.title !== undefined ? `<title>${item.title}</title>` : '',
        item.link !== undefined ? `<link>${item.link}</link>` : '',
        item.pubDate !== undefined ? `<pubDate>${item.pubDate}</pubDate>` : '',
        item.description !== undefined ? `<description>${item.description}</description>` : '',
      ];
      return `    <item>${parts.join('')}</item>`;
    })
    .join('\n');

  return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Test Feed</title>
${body}
  </channel>
</rss>`;
}

// ============================================================================
// fetch Stub
// ============================================================================

export type StubbedFeed =
  | { status?: number; body: string; delayMs?: number }
  | { error: Error };

function delay(ms: number, signal?: AbortSignal | null): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        reject(signal.reason);
      },
      { once: true }
    );
  });
}

/**
 * Replace global fetch with a URL -> response table. Unknown URLs answer 404.
 * A delayed feed honours the request's abort signal.
 * Call vi.unstubAllGlobals() in afterEach.
 */
export function stubFeeds(feeds: Record<string, StubbedFeed>) {
  const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const feed = feeds[url];
    if (!feed) return new Response('not found', { status: 404 });
    if ('error' in feed) throw feed.error;
    if (feed.delayMs) await delay(feed.delayMs, init?.signal);
    return new Response(feed.body, { status: feed.status ?? 200 });
  });

  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}
