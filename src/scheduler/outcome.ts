/**
 * Herald — Cycle Outcome Helpers
 */

import type { CycleOutcome, Destination, PostResult, PublishResults } from '../types';

export function resultsOf(results: PublishResults): PostResult[] {
  return Object.values(results).filter((r): r is PostResult => r !== undefined);
}

/**
 * Destination lists across every candidate of a cycle. A destination can
 * appear in more than one list when candidates fared differently.
 */
export function summarizeResults(all: PublishResults[]): {
  succeeded: Destination[];
  retryable: Destination[];
  permanent: Destination[];
} {
  const succeeded = new Set<Destination>();
  const retryable = new Set<Destination>();
  const permanent = new Set<Destination>();

  for (const results of all) {
    for (const result of resultsOf(results)) {
      if (result.status === 'succeeded') succeeded.add(result.destination);
      else if (result.status === 'failed_retryable' || result.status === 'pending') retryable.add(result.destination);
      else if (result.status === 'failed_permanent') permanent.add(result.destination);
    }
  }

  return { succeeded: [...succeeded], retryable: [...retryable], permanent: [...permanent] };
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_PARTIAL = 2;

/**
 * 0 when nothing failed (skipped included), 2 when some destinations
 * failed while others succeeded, 1 when nothing succeeded.
 */
export function exitCodeFor(outcome: CycleOutcome): number {
  if (outcome.status === 'skipped') return EXIT_OK;
  if (outcome.retryable.length === 0 && outcome.permanent.length === 0) return EXIT_OK;
  return outcome.succeeded.length > 0 ? EXIT_PARTIAL : EXIT_FAILURE;
}
