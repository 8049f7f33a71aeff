/**
 * News Module - Story Grouping
 *
 * Groups distinctly titled articles from different outlets that cover the
 * same event: title overlap above a threshold and publish times inside a
 * short window.
 *
 * This is one greedy forward pass, not a global clustering. The queue is
 * consumed head to tail; the head becomes an anchor and takes every
 * remaining match with it. An article therefore joins the group of the
 * earliest anchor it matches and is never reconsidered, so the result
 * depends on input order.
 */

import type { Article, StoryGroup } from './types';
import { computeBiasRange } from './bias';
import { jaccardSimilarity, normalizeTitle } from './dedupe';
import { PIPELINE_DEFAULTS } from '@/lib/env';

export type StoryGroupingOptions = {
  /** titles must be strictly more similar than this */
  minSimilarity?: number;
  /** publish times must be strictly closer than this */
  timeWindowMs?: number;
};

const DEFAULT_OPTIONS: Required<StoryGroupingOptions> = {
  minSimilarity: PIPELINE_DEFAULTS.CLUSTER_THRESHOLD,
  timeWindowMs: PIPELINE_DEFAULTS.CLUSTER_WINDOW_HOURS * 60 * 60 * 1000,
};

/**
 * Title similarity used for grouping (same measure as deduplication)
 */
export function titleSimilarity(a: Article, b: Article): number {
  return jaccardSimilarity(normalizeTitle(a.title), normalizeTitle(b.title));
}

function belongsWith(anchor: Article, other: Article, options: Required<StoryGroupingOptions>): boolean {
  const timeDiff = Math.abs(anchor.publishedAt.getTime() - other.publishedAt.getTime());
  if (timeDiff >= options.timeWindowMs) return false;
  return titleSimilarity(anchor, other) > options.minSimilarity;
}

/**
 * Only groups of two or more survive; single articles stay ungrouped.
 * Groups come back largest first, ties in formation order.
 */
export function groupSimilarStories(articles: Article[], options: StoryGroupingOptions = {}): StoryGroup[] {
  const resolved = { ...DEFAULT_OPTIONS, ...options };
  const groups: StoryGroup[] = [];
  let ungrouped = [...articles];

  while (ungrouped.length > 0) {
    const [anchor, ...rest] = ungrouped;
    const members: Article[] = [anchor];
    const remaining: Article[] = [];

    for (const other of rest) {
      if (belongsWith(anchor, other, resolved)) members.push(other);
      else remaining.push(other);
    }
    ungrouped = remaining;

    if (members.length >= 2) {
      groups.push({
        representative: anchor,
        articles: members,
        sourceCount: members.length,
        biasRange: computeBiasRange(members),
      });
    }
  }

  return groups.sort((a, b) => b.articles.length - a.articles.length);
}
