/**
 * Herald — Collect
 *
 * Fetches from every configured source, deduplicates and classifies.
 *
 * Usage:
 *   npm run collect                       # Last 24 hours
 *   npm run collect -- --hours 6
 *   npm run collect -- --source chat      # One source only
 */

import type { ActivitySource } from '../src/types';
import { ActivitySourceSchema } from '../src/types';
import { createRuntime } from '../src/runtime';
import { runCollection } from '../src/feeds/aggregator';
import { EXIT_FAILURE, EXIT_OK, EXIT_PARTIAL } from '../src/scheduler';
import { banner, numberOption, runMain } from './shared';

function sourceOption(args: string[]): ActivitySource[] | undefined {
  const index = args.indexOf('--source');
  if (index === -1) return undefined;
  return [ActivitySourceSchema.parse(args[index + 1])];
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const lookbackHours = numberOption(args, '--hours', 24);
  const only = sourceOption(args);
  const runtime = createRuntime();

  banner('HERALD COLLECTION', { Started: new Date().toISOString(), 'Lookback (h)': lookbackHours });

  const result = await runCollection(runtime, { lookbackHours, only });

  for (const source of result.sourceResults) {
    const status = source.error ? `✗ ${source.error}` : `✓ ${source.items.length} items`;
    console.log(`  ${source.source}: ${status} (${source.durationMs}ms)`);
  }
  console.log('');
  console.log(`Admitted: ${result.admitted}`);
  console.log(`Duplicates: ${result.duplicates}`);
  console.log(`Newsworthy: ${result.newsworthy}`);
  console.log(`Rejected: ${result.invalid}`);
  console.log(`Classification failures: ${result.classificationFailures}`);
  console.log(`Reclassified: ${result.reclassified}`);

  const failedSources = result.sourceResults.filter((s) => s.error).length;
  if (failedSources === 0) return EXIT_OK;
  return failedSources < result.sourceResults.length ? EXIT_PARTIAL : EXIT_FAILURE;
}

runMain('Collection', main);
