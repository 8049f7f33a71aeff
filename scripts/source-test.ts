/**
 * Feed source integration check (hits the network)
 * Run: npx tsx scripts/source-test.ts [category] [--url=https://...]
 *
 * Without --url every built-in source (optionally one category) is fetched
 * and parsed. With --url a single candidate custom feed is validated.
 */

import { config } from 'dotenv';
import { loadConfig, toPipelineConfig } from '../src/lib/env';
import { BUILTIN_SOURCES, fetchFeed, parseCategory, validateFeedUrl } from '../src/modules/news';

config({ path: '.env.local' });

async function checkUrl(url: string, timeoutMs: number, userAgent: string) {
  console.log(`Validating ${url}...`);
  const result = await validateFeedUrl(url, { timeoutMs, userAgent });
  if (result.success) {
    console.log(`✅ ${result.articleCount} articles`);
    process.exit(0);
  }
  console.log(`❌ ${result.error || 'No articles found'}`);
  process.exit(1);
}

async function main() {
  const args = process.argv.slice(2);
  const pipeline = toPipelineConfig(loadConfig());

  const url = args.find((a) => a.startsWith('--url='))?.slice('--url='.length);
  if (url) {
    await checkUrl(url, pipeline.fetchTimeoutMs, pipeline.userAgent);
    return;
  }

  const [categoryArg] = args.filter((a) => !a.startsWith('--'));
  const category = categoryArg ? parseCategory(categoryArg) : undefined;
  const sources = category ? BUILTIN_SOURCES.filter((s) => s.category === category) : BUILTIN_SOURCES;

  console.log(`🌐 Checking ${sources.length} feed sources...\n`);

  let passed = 0;
  let failed = 0;

  for (const source of sources) {
    process.stdout.write(`  ${source.name} (${source.category})... `);
    const result = await fetchFeed(source, {
      timeoutMs: pipeline.fetchTimeoutMs,
      userAgent: pipeline.userAgent,
    });
    if (result.success && result.articles.length > 0) {
      console.log(`✅ (${result.articles.length} items, ${result.fetchTimeMs}ms)`);
      passed++;
    } else {
      console.log(`❌ ${result.error || 'No items'}`);
      failed++;
    }
  }

  console.log('\n' + '='.repeat(50));
  console.log(`Result: ${passed} passed, ${failed} failed`);

  // Some feeds rate-limit or move; only a majority failing is an error
  process.exit(passed >= failed ? 0 : 1);
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
