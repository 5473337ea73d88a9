/**
 * Herald — Command Helpers
 *
 * Argument parsing, signal handling and exit codes shared by the scripts.
 */

import { logger } from '../src/lib/logger';
import { toErrorMessage } from '../src/lib/errors';
import type { CycleOutcome } from '../src/types';
import { EXIT_FAILURE, resultsOf } from '../src/scheduler';

export function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

/**
 * Positive number following `flag`, or the fallback.
 */
export function numberOption(args: string[], flag: string, fallback: number): number {
  const index = args.indexOf(flag);
  if (index === -1) return fallback;

  const value = Number(args[index + 1]);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${flag} expects a positive number`);
  }
  return value;
}

/**
 * AbortController wired to SIGINT and SIGTERM.
 */
export function abortOnSignals(): AbortController {
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.warn('Received signal, aborting', { signal });
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
  return controller;
}

export function banner(title: string, details: Record<string, string | number | boolean>): void {
  console.log('\n' + '='.repeat(60));
  console.log(title);
  console.log('='.repeat(60));
  for (const [key, value] of Object.entries(details)) {
    console.log(`${key}: ${value}`);
  }
  console.log('='.repeat(60) + '\n');
}

export function printOutcome(outcome: CycleOutcome): void {
  if (outcome.status === 'skipped') {
    console.log(`Skipped: ${outcome.reason}`);
    console.log(`Next eligible at: ${outcome.nextEligibleAt}`);
    return;
  }

  console.log(`Mode: ${outcome.mode}`);
  console.log(`Candidates: ${outcome.candidates.length}`);
  for (const candidate of outcome.candidates) {
    console.log(`  ${candidate.activityIds.join(', ')}`);
    for (const result of resultsOf(candidate.results)) {
      const detail = result.externalReference ?? result.error ?? '';
      console.log(`    ${result.destination}: ${result.status}${detail ? ` (${detail})` : ''}`);
    }
  }
  console.log(`Succeeded: ${outcome.succeeded.join(', ') || 'none'}`);
  console.log(`Retryable: ${outcome.retryable.join(', ') || 'none'}`);
  console.log(`Permanent: ${outcome.permanent.join(', ') || 'none'}`);
}

/**
 * Run a command and exit with the code it returns. Uncaught errors exit 1.
 */
export function runMain(name: string, main: () => Promise<number>): void {
  main().then(
    (code) => process.exit(code),
    (error: unknown) => {
      logger.error(`${name} failed`, { error: toErrorMessage(error) });
      console.error(`\n${name} failed:`, toErrorMessage(error));
      process.exit(EXIT_FAILURE);
    }
  );
}
