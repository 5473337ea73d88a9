/**
 * Tests for cycle outcome helpers and the cycle lock
 */

import { describe, it, expect } from 'vitest';
import { CycleLock } from '../../src/scheduler/lock';
import { EXIT_FAILURE, EXIT_OK, EXIT_PARTIAL, exitCodeFor, summarizeResults } from '../../src/scheduler/outcome';
import { CycleInProgressError } from '../../src/lib/errors';
import type { CycleOutcome, Destination, PostResult } from '../../src/types';

const result = (destination: Destination, status: PostResult['status']): PostResult => ({
  destination,
  status,
  postId: status === 'rate_limited' ? null : `${destination}-post`,
  attempts: 1,
});

function outcome(lists: { succeeded?: Destination[]; retryable?: Destination[]; permanent?: Destination[] }): CycleOutcome {
  return {
    status: 'completed',
    cycleType: 'daily',
    mode: 'full',
    startedAt: '2026-03-01T12:00:00.000Z',
    candidates: [],
    succeeded: lists.succeeded ?? [],
    retryable: lists.retryable ?? [],
    permanent: lists.permanent ?? [],
  };
}

describe('summarizeResults', () => {
  it('sorts destinations by how they fared across candidates', () => {
    const summary = summarizeResults([
      { microblog_a: result('microblog_a', 'succeeded'), microblog_b: result('microblog_b', 'failed_retryable') },
      { microblog_a: result('microblog_a', 'failed_permanent'), microblog_b: result('microblog_b', 'rate_limited') },
      { blog: result('blog', 'already_published') },
    ]);

    expect(summary).toEqual({ succeeded: ['microblog_a'], retryable: ['microblog_b'], permanent: ['microblog_a'] });
  });
});

describe('exitCodeFor', () => {
  it('is zero for skipped and clean cycles', () => {
    expect(
      exitCodeFor({ status: 'skipped', cycleType: 'weekly', reason: 'r', nextEligibleAt: '2026-03-01T12:00:00.000Z' })
    ).toBe(EXIT_OK);
    expect(exitCodeFor(outcome({ succeeded: ['microblog_a'] }))).toBe(EXIT_OK);
    expect(exitCodeFor(outcome({}))).toBe(EXIT_OK);
  });

  it('separates partial from total failure', () => {
    expect(exitCodeFor(outcome({ succeeded: ['microblog_a'], retryable: ['microblog_b'] }))).toBe(EXIT_PARTIAL);
    expect(exitCodeFor(outcome({ permanent: ['blog'] }))).toBe(EXIT_FAILURE);
  });
});

describe('CycleLock', () => {
  it('holds one slot per cycle type', () => {
    const lock = new CycleLock();
    const release = lock.acquire('daily');

    expect(() => lock.acquire('daily')).toThrow(CycleInProgressError);
    expect(() => lock.acquire('weekly')).not.toThrow();

    release();
    release();
    expect(lock.isHeld('daily')).toBe(false);
    expect(lock.isHeld('weekly')).toBe(true);
  });
});
