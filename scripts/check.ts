/**
 * Herald — Connectivity Check
 *
 * Verifies the store and every configured destination.
 *
 * Usage:
 *   npm run check
 */

import { createRuntime } from '../src/runtime';
import { runChecks } from '../src/reporting/check';
import { EXIT_FAILURE, EXIT_OK } from '../src/scheduler';
import { runMain } from './shared';

async function main(): Promise<number> {
  const runtime = createRuntime();
  const results = await runChecks(runtime.store, runtime.publishers);

  for (const result of results) {
    console.log(`  ${result.ok ? '✓' : '✗'} ${result.name}${result.error ? `: ${result.error}` : ''}`);
  }

  const sources = Object.keys(runtime.sources);
  console.log(`\nSources configured: ${sources.join(', ') || 'none'}`);

  return results.every((r) => r.ok) ? EXIT_OK : EXIT_FAILURE;
}

runMain('Check', main);
