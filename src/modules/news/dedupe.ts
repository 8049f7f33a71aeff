/**
 * Title deduplication for syndicated wire copy
 */

import type { Article } from './types';
import { PIPELINE_DEFAULTS } from '@/lib/env';

/**
 * Lowercase and keep only letters, digits and whitespace
 */
export function normalizeTitle(title: string): string {
  return title.toLowerCase().replace(/[^\p{L}\p{N}\s]/gu, '');
}

function tokenSet(text: string): Set<string> {
  return new Set(text.split(/\s+/).filter(Boolean));
}

/**
 * Jaccard similarity of the two strings' whitespace-separated word sets.
 * 0 when both are empty.
 */
export function jaccardSimilarity(a: string, b: string): number {
  const wordsA = tokenSet(a);
  const wordsB = tokenSet(b);

  let intersection = 0;
  for (const word of wordsA) {
    if (wordsB.has(word)) intersection++;
  }
  const union = wordsA.size + wordsB.size - intersection;

  return union > 0 ? intersection / union : 0;
}

/**
 * First-seen-wins: an article is dropped when its normalized title is more
 * than `threshold` similar to any title already kept. Arrival order decides
 * which copy of a wire story survives.
 */
export function dedupeArticles(
  articles: Article[],
  threshold: number = PIPELINE_DEFAULTS.DEDUP_THRESHOLD
): Article[] {
  const unique: Article[] = [];
  const seenTitles: string[] = [];

  for (const article of articles) {
    const normalized = normalizeTitle(article.title);
    const isDuplicate = seenTitles.some((seen) => jaccardSimilarity(normalized, seen) > threshold);

    if (!isDuplicate) {
      unique.push(article);
      seenTitles.push(normalized);
    }
  }

  console.log(`[news/dedupe] ${articles.length} -> ${unique.length} unique articles`);
  return unique;
}

/**
 * Newest first, truncated to `limit`
 */
export function capByRecency(
  articles: Article[],
  limit: number = PIPELINE_DEFAULTS.MAX_ARTICLES_PER_CATEGORY
): Article[] {
  return [...articles]
    .sort((a, b) => b.publishedAt.getTime() - a.publishedAt.getTime())
    .slice(0, limit);
}
