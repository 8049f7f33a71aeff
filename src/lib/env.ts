import { z } from 'zod';

/**
 * Pipeline defaults. The similarity thresholds and the clustering window have
 * no documented derivation; keep them as-is unless there is data to justify a
 * change.
 */
export const PIPELINE_DEFAULTS = {
  CACHE_TTL_MS: 60 * 60 * 1000,     // 1 hour
  FETCH_TIMEOUT_MS: 15_000,
  MAX_ARTICLES_PER_CATEGORY: 100,
  DEDUP_THRESHOLD: 0.85,
  CLUSTER_THRESHOLD: 0.70,
  CLUSTER_WINDOW_HOURS: 4,
  USER_AGENT: 'Mozilla/5.0 (compatible; NewsPipeline/1.0)',
} as const;

const ratio = z.coerce.number().min(0).max(1);

const configSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  NEWS_CACHE_TTL_MS: z.coerce.number().int().min(0).default(PIPELINE_DEFAULTS.CACHE_TTL_MS),
  NEWS_FETCH_TIMEOUT_MS: z.coerce.number().int().min(1).default(PIPELINE_DEFAULTS.FETCH_TIMEOUT_MS),
  NEWS_MAX_ARTICLES: z.coerce.number().int().min(1).default(PIPELINE_DEFAULTS.MAX_ARTICLES_PER_CATEGORY),
  NEWS_DEDUP_THRESHOLD: ratio.default(PIPELINE_DEFAULTS.DEDUP_THRESHOLD),
  NEWS_CLUSTER_THRESHOLD: ratio.default(PIPELINE_DEFAULTS.CLUSTER_THRESHOLD),
  NEWS_CLUSTER_WINDOW_HOURS: z.coerce.number().positive().default(PIPELINE_DEFAULTS.CLUSTER_WINDOW_HOURS),
  NEWS_USER_AGENT: z.string().min(1).default(PIPELINE_DEFAULTS.USER_AGENT),
});

export type EnvConfig = z.infer<typeof configSchema>;

/**
 * Pipeline settings in the shape the news module consumes
 */
export type PipelineConfig = {
  cacheTtlMs: number;
  fetchTimeoutMs: number;
  maxArticles: number;
  dedupThreshold: number;
  clusterThreshold: number;
  clusterWindowMs: number;
  userAgent: string;
};

/**
 * Load pipeline settings from the environment. Invalid values throw a ZodError naming the variable.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): EnvConfig {
  return configSchema.parse(env);
}

export function toPipelineConfig(config: EnvConfig): PipelineConfig {
  return {
    cacheTtlMs: config.NEWS_CACHE_TTL_MS,
    fetchTimeoutMs: config.NEWS_FETCH_TIMEOUT_MS,
    maxArticles: config.NEWS_MAX_ARTICLES,
    dedupThreshold: config.NEWS_DEDUP_THRESHOLD,
    clusterThreshold: config.NEWS_CLUSTER_THRESHOLD,
    clusterWindowMs: config.NEWS_CLUSTER_WINDOW_HOURS * 60 * 60 * 1000,
    userAgent: config.NEWS_USER_AGENT,
  };
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = toPipelineConfig(loadConfig({}));
