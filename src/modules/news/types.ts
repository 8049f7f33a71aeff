/**
 * News Module - Feed Pipeline Types
 *
 * Canonical records shared by the parser, aggregator, deduplicator and
 * story clusterer.
 */

// ============================================================================
// Category
// ============================================================================

export const ALL_CATEGORIES = [
  'US',
  'World',
  'Local',
  'Business',
  'Technology',
  'Entertainment',
  'Sports',
  'Science',
  'Health',
] as const;

export type NewsCategory = (typeof ALL_CATEGORIES)[number];

// ============================================================================
// Bias & Credibility
// ============================================================================

/**
 * 7-point political bias spectrum (far-left ... far-right)
 */
export const BIAS_SPECTRUM = [
  'Far Left',
  'Left',
  'Center-Left',
  'Center',
  'Center-Right',
  'Right',
  'Far Right',
] as const;

export type BiasSpectrum = (typeof BIAS_SPECTRUM)[number];

/**
 * Article-level bias rating, assigned by downstream analysis
 */
export interface BiasRating {
  spectrum: BiasSpectrum;
  confidence: number;               // 0-1
  sourceBias: number;               // -2.0 to +2.0, from the source database
  contentBias?: number;             // -2.0 to +2.0, from content analysis
  emotionalLanguageScore?: number;  // 0-1, higher = more emotional
  balanceScore?: number;            // 0-1, higher = more balanced
  reasoning?: string;
}

// ============================================================================
// Source
// ============================================================================

export interface NewsSource {
  readonly id: string;
  readonly name: string;
  readonly feedUrl: string;
  readonly category: NewsCategory;
  readonly bias: BiasSpectrum;
  readonly credibility: number;  // 0-100
  readonly factuality: number;   // 0.0-1.0
}

// ============================================================================
// Article
// ============================================================================

export interface Article {
  readonly id: string;
  readonly title: string;
  readonly source: NewsSource;
  readonly url: string;
  readonly publishedAt: Date;
  readonly category: NewsCategory;
  readonly description?: string;
  readonly imageUrl?: string;

  // Owned by downstream collaborators after hand-off
  bias?: BiasRating;
  isRead: boolean;
  readAt?: Date;
  isFavorite: boolean;
  isBreakingNews: boolean;
  importance: number;  // 1-10
}

// ============================================================================
// Story Group
// ============================================================================

export interface BiasRange {
  min: number;
  max: number;
  mean: number;
}

/**
 * Two or more articles judged to cover the same event. Derived on demand,
 * never cached.
 */
export interface StoryGroup {
  representative: Article;
  articles: Article[];
  sourceCount: number;
  /** null when no member carries a bias rating */
  biasRange: BiasRange | null;
}

// ============================================================================
// Fetch Results
// ============================================================================

export interface SourceFetchResult {
  sourceId: string;
  sourceName: string;
  success: boolean;
  articles: Article[];
  error?: string;
  fetchTimeMs: number;
}

export type CategoryFetchReport = {
  category: NewsCategory;
  articles: Article[];
  bySource: SourceFetchResult[];
  totalFetched: number;
  fetchedAt: string;
  cached: boolean;
};

export interface CacheEntry {
  fetchedAt: number;  // epoch ms
  articles: Article[];
}

export interface UserLocation {
  city: string;
  state: string;
}
