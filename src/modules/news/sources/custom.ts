/**
 * User-added feed sources
 *
 * Held in memory. Saving and loading is the host's job, through
 * exportRecords() / importRecords().
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { NewsCategory, NewsSource } from '../types';
import {
  customSourceInputSchema,
  customSourceRecordSchema,
  type CustomSourceInput,
  type CustomSourceRecord,
} from './schema';

export type CustomSourcePatch = Partial<CustomSourceInput>;

export function customToNewsSource(record: CustomSourceRecord): NewsSource {
  return {
    id: `custom-${record.id}`,
    name: record.name,
    feedUrl: record.feedUrl,
    category: record.category,
    bias: record.bias,
    credibility: record.credibility,
    factuality: record.factuality,
  };
}

export class CustomSourceStore {
  private records: CustomSourceRecord[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  /**
   * Validate and add a source. Invalid input throws a ZodError.
   */
  add(input: CustomSourceInput): CustomSourceRecord {
    const parsed = customSourceInputSchema.parse(input);
    const record: CustomSourceRecord = {
      ...parsed,
      id: randomUUID(),
      isEnabled: true,
      addedAt: this.now(),
      articleCount: 0,
    };
    this.records.push(record);
    console.log(`[news/sources] Added custom source: ${record.name} (${record.category}, ${record.bias})`);
    return record;
  }

  remove(id: string): boolean {
    const before = this.records.length;
    this.records = this.records.filter((r) => r.id !== id);
    return this.records.length < before;
  }

  update(id: string, patch: CustomSourcePatch): CustomSourceRecord | null {
    const index = this.records.findIndex((r) => r.id === id);
    if (index === -1) return null;

    const current = this.records[index];
    const merged = customSourceInputSchema.parse({
      name: patch.name ?? current.name,
      feedUrl: patch.feedUrl ?? current.feedUrl,
      category: patch.category ?? current.category,
      bias: patch.bias ?? current.bias,
      credibility: patch.credibility ?? current.credibility,
      factuality: patch.factuality ?? current.factuality,
    });
    const updated: CustomSourceRecord = { ...current, ...merged };
    this.records[index] = updated;
    return updated;
  }

  toggleEnabled(id: string): CustomSourceRecord | null {
    const record = this.records.find((r) => r.id === id);
    if (!record) return null;
    record.isEnabled = !record.isEnabled;
    return record;
  }

  /**
   * Note the outcome of a fetch. Accepts either the record id or the
   * `custom-` prefixed NewsSource id.
   */
  recordFetch(id: string, articleCount: number): void {
    const recordId = id.startsWith('custom-') ? id.slice('custom-'.length) : id;
    const record = this.records.find((r) => r.id === recordId);
    if (!record) return;
    record.lastFetchedAt = this.now();
    record.articleCount = articleCount;
  }

  list(): readonly CustomSourceRecord[] {
    return this.records;
  }

  /** Enabled sources of one category, as NewsSource */
  sourcesFor(category: NewsCategory): NewsSource[] {
    return this.records
      .filter((r) => r.isEnabled && r.category === category)
      .map(customToNewsSource);
  }

  allEnabled(): NewsSource[] {
    return this.records.filter((r) => r.isEnabled).map(customToNewsSource);
  }

  /**
   * Whether a feed URL is already registered here or among `builtIns`
   * (case-insensitive)
   */
  isDuplicateUrl(url: string, builtIns: readonly NewsSource[] = []): boolean {
    const needle = url.toLowerCase();
    return (
      this.records.some((r) => r.feedUrl.toLowerCase() === needle) ||
      builtIns.some((s) => s.feedUrl.toLowerCase() === needle)
    );
  }

  exportRecords(): CustomSourceRecord[] {
    return this.records.map((r) => ({ ...r }));
  }

  /**
   * Replace the store's contents with previously exported records
   */
  importRecords(data: unknown): number {
    this.records = z.array(customSourceRecordSchema).parse(data);
    console.log(`[news/sources] Loaded ${this.records.length} custom sources`);
    return this.records.length;
  }
}
