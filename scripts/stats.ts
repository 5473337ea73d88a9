/**
 * Herald — Stats
 *
 * Usage:
 *   npm run stats                 # Last 7 days
 *   npm run stats -- --days 30
 */

import { createRuntime } from '../src/runtime';
import { formatStats, getPostingStats } from '../src/reporting/stats';
import { EXIT_OK } from '../src/scheduler';
import { numberOption, runMain } from './shared';

async function main(): Promise<number> {
  const days = numberOption(process.argv.slice(2), '--days', 7);
  const { store } = createRuntime();

  console.log(formatStats(await getPostingStats(store, days)));
  return EXIT_OK;
}

runMain('Stats', main);
