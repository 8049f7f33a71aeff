/**
 * News Module - feed ingestion pipeline
 *
 * Exports:
 * - types: Article, NewsSource, StoryGroup and friends
 * - aggregator: category fetch orchestration
 * - cache: per-category freshness cache
 * - fetcher / parser: one feed to Articles
 * - dedupe: title deduplication and recency cap
 * - story-clustering: multi-source story groups
 * - sources: built-in and custom source registry
 */

export * from './types';
export * from './bias';
export * from './aggregator';
export * from './cache';
export * from './fetcher';
export * from './parser';
export * from './dates';
export * from './dedupe';
export * from './story-clustering';
export * from './sources';
export { sanitizeHtml, cleanText, decodeHtmlEntities, parseCategory } from './utils';
