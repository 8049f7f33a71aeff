import { z } from 'zod';
import { ALL_CATEGORIES, BIAS_SPECTRUM } from '../types';

export const categorySchema = z.enum(ALL_CATEGORIES);
export const biasSchema = z.enum(BIAS_SPECTRUM);

const feedUrlSchema = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), 'feed URL must use http or https');

export const newsSourceSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  feedUrl: feedUrlSchema,
  category: categorySchema,
  bias: biasSchema,
  credibility: z.number().int().min(0).max(100),
  factuality: z.number().min(0).max(1),
});

/**
 * Input for a user-added source; unspecified ratings get neutral defaults
 */
export const customSourceInputSchema = z.object({
  name: z.string().trim().min(1),
  feedUrl: feedUrlSchema,
  category: categorySchema,
  bias: biasSchema.default('Center'),
  credibility: z.number().int().min(0).max(100).default(70),
  factuality: z.number().min(0).max(1).default(0.75),
});

export const customSourceRecordSchema = customSourceInputSchema.extend({
  id: z.string().uuid(),
  isEnabled: z.boolean(),
  addedAt: z.coerce.date(),
  lastFetchedAt: z.coerce.date().optional(),
  articleCount: z.number().int().min(0),
});

export type CustomSourceInput = z.input<typeof customSourceInputSchema>;
export type CustomSourceRecord = z.infer<typeof customSourceRecordSchema>;
