/**
 * Source Registry - built-in feeds plus user-added ones
 */

import { z } from 'zod';
import type { NewsCategory, NewsSource, UserLocation } from '../types';
import { newsSourceSchema } from './schema';
import { CustomSourceStore } from './custom';
import builtinSourceData from './builtin-sources.json';

export { CustomSourceStore, customToNewsSource } from './custom';
export * from './schema';

export const BUILTIN_SOURCES: readonly NewsSource[] = z.array(newsSourceSchema).parse(builtinSourceData);

export function builtinSourcesFor(category: NewsCategory): NewsSource[] {
  return BUILTIN_SOURCES.filter((s) => s.category === category);
}

/**
 * Google News search feed for one city, limited to the last 24 hours
 */
export function localNewsSource(location: UserLocation): NewsSource {
  const query = encodeURIComponent(`${location.city} ${location.state}`).replace(/%20/g, '+');

  return {
    id: `local-${location.city.toLowerCase().replace(/\s+/g, '-')}`,
    name: `Local News - ${location.city}, ${location.state}`,
    feedUrl: `https://news.google.com/rss/search?q=when:24h+allinurl:${query}`,
    category: 'Local',
    bias: 'Center',
    credibility: 80,
    factuality: 0.82,
  };
}

export class SourceRegistry {
  constructor(
    readonly custom: CustomSourceStore = new CustomSourceStore(),
    private readonly builtIns: readonly NewsSource[] = BUILTIN_SOURCES
  ) {}

  /**
   * Everything to fetch for a category: built-ins, the local search feed
   * (Local only, when a location is known) and enabled custom sources.
   */
  sourcesFor(category: NewsCategory, opts?: { location?: UserLocation }): NewsSource[] {
    const sources = this.builtIns.filter((s) => s.category === category);

    if (category === 'Local' && opts?.location) {
      sources.push(localNewsSource(opts.location));
    }

    return [...sources, ...this.custom.sourcesFor(category)];
  }

  allBuiltIns(): readonly NewsSource[] {
    return this.builtIns;
  }

  isDuplicateUrl(url: string): boolean {
    return this.custom.isDuplicateUrl(url, this.builtIns);
  }
}
