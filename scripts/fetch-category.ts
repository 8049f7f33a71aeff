/**
 * Fetch one category and print the result
 * Run: npx tsx scripts/fetch-category.ts <category> [--groups] [--city=Austin --state=TX]
 */

import { config } from 'dotenv';
import { loadConfig, toPipelineConfig } from '../src/lib/env';
import { NewsAggregator, parseCategory, biasDistribution, type UserLocation } from '../src/modules/news';

config({ path: '.env.local' });

function readFlag(args: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  return args.find((a) => a.startsWith(prefix))?.slice(prefix.length);
}

async function main() {
  const args = process.argv.slice(2);
  const [categoryArg] = args.filter((a) => !a.startsWith('--'));
  if (!categoryArg) {
    console.error('Usage: tsx scripts/fetch-category.ts <category> [--groups] [--city=... --state=...]');
    process.exit(1);
  }

  const category = parseCategory(categoryArg);
  const city = readFlag(args, 'city');
  const state = readFlag(args, 'state');
  const location: UserLocation | undefined = city && state ? { city, state } : undefined;

  const aggregator = new NewsAggregator({ config: toPipelineConfig(loadConfig()) });
  const report = await aggregator.fetchCategoryReport(category, { location });

  console.log('\n=== Sources ===');
  for (const result of report.bySource) {
    const status = result.success ? '✅' : '❌';
    console.log(`${status} ${result.sourceName}: ${result.articles.length} (${result.fetchTimeMs}ms)${result.error ? ` - ${result.error}` : ''}`);
  }

  console.log(`\n=== ${category}: ${report.articles.length} articles (${report.totalFetched} before dedupe) ===`);
  for (const article of report.articles) {
    console.log(`${article.publishedAt.toISOString()}  [${article.source.name}]  ${article.title}`);
  }

  if (args.includes('--groups')) {
    const groups = aggregator.groupSimilarStories(report.articles);
    console.log(`\n=== Story groups: ${groups.length} ===`);
    for (const group of groups) {
      console.log(`(${group.sourceCount}) ${group.representative.title}  ${biasDistribution(group)}`);
      for (const member of group.articles.slice(1)) {
        console.log(`    - [${member.source.name}] ${member.title}`);
      }
    }
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
