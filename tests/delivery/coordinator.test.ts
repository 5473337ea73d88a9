/**
 * Tests for the Publish Coordinator
 */

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { PublishCoordinator, backoffDelay, postSignature } from '../../src/delivery/coordinator';
import { renderCandidate } from '../../src/delivery/formatter';
import {
  ContentTooLongError,
  PublishPermanentError,
  PublishRetryableError,
  StoreUnavailableError,
} from '../../src/lib/errors';
import type { Candidate } from '../../src/types';
import { MemoryActivityStore } from '../helpers/memory-store';
import { FORMAT, RETRY, fakePublisher, seedActivity, type FakePublisher } from '../helpers/fixtures';

const NOW = new Date('2026-03-01T12:00:00.000Z');

describe('postSignature', () => {
  it('does not depend on id order', () => {
    expect(postSignature(['b', 'a'])).toBe(postSignature(['a', 'b']));
    expect(postSignature(['a'])).not.toBe(postSignature(['a', 'b']));
  });
});

describe('backoffDelay', () => {
  it('grows geometrically from the base', () => {
    expect([1, 2, 3].map((n) => backoffDelay(n, RETRY))).toEqual([1000, 4000, 16000]);
  });
});

describe('PublishCoordinator', () => {
  let store: MemoryActivityStore;
  let a: FakePublisher;
  let b: FakePublisher;
  let sleep: Mock<(ms: number, signal?: AbortSignal) => Promise<void>>;
  let coordinator: PublishCoordinator;
  let candidate: Candidate;

  beforeEach(async () => {
    store = new MemoryActivityStore();
    a = fakePublisher('microblog_a');
    b = fakePublisher('microblog_b');
    sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
    let ids = 0;
    coordinator = new PublishCoordinator({
      store,
      publishers: { microblog_a: a, microblog_b: b },
      format: FORMAT,
      retry: RETRY,
      sleep,
      now: () => NOW,
      generateId: () => `post-${++ids}`,
    });

    const activity = await seedActivity(store, { id: 'a1', observedAt: '2026-03-01T10:00:00.000Z' });
    candidate = { kind: 'single', activityIds: ['a1'], activity };
  });

  const postFor = (destination: string) => store.posts.filter((p) => p.destination === destination);

  it('publishes to every destination and records each post', async () => {
    const results = await coordinator.publish(candidate, ['microblog_a', 'microblog_b'], { cycleType: 'daily' });

    expect(results.microblog_a).toMatchObject({ status: 'succeeded', attempts: 1, externalReference: 'microblog_a-ref' });
    expect(results.microblog_b).toMatchObject({ status: 'succeeded', attempts: 1, externalReference: 'microblog_b-ref' });
    expect(postFor('microblog_a')).toEqual([
      {
        id: results.microblog_a?.postId,
        activityIds: ['a1'],
        signature: postSignature(['a1']),
        destination: 'microblog_a',
        cycleType: 'daily',
        status: 'succeeded',
        attemptCount: 1,
        lastAttemptAt: NOW.toISOString(),
        externalReference: 'microblog_a-ref',
        content: '🚀 Release a1\n\n🔗 https://example.org/a1\n\n#acme #release #update #opensource',
        lastError: null,
        createdAt: NOW.toISOString(),
      },
    ]);
  });

  it('never publishes the same candidate twice to a destination', async () => {
    await coordinator.publish(candidate, ['microblog_a', 'microblog_b'], { cycleType: 'daily' });
    const second = await coordinator.publish(candidate, ['microblog_a', 'microblog_b'], { cycleType: 'daily' });

    expect(second.microblog_a?.status).toBe('already_published');
    expect(second.microblog_b?.status).toBe('already_published');
    expect(a.publish).toHaveBeenCalledTimes(1);
    expect(b.publish).toHaveBeenCalledTimes(1);
    expect(store.posts).toHaveLength(2);
  });

  it('keeps one destination failure from affecting another', async () => {
    a.publish.mockRejectedValue(new PublishPermanentError('Mastodon error: 401 - bad token'));

    const results = await coordinator.publish(candidate, ['microblog_a', 'microblog_b'], { cycleType: 'daily' });

    expect(results.microblog_a).toMatchObject({
      status: 'failed_permanent',
      attempts: 1,
      error: 'Mastodon error: 401 - bad token',
    });
    expect(results.microblog_b?.status).toBe('succeeded');
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries transient failures with backoff and then gives up', async () => {
    a.publish.mockRejectedValue(new PublishRetryableError('Mastodon error: 503'));

    const results = await coordinator.publish(candidate, ['microblog_a'], { cycleType: 'daily' });

    expect(results.microblog_a).toMatchObject({ status: 'failed_retryable', attempts: 3, error: 'Mastodon error: 503' });
    expect(a.publish).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 4000]);
    expect(postFor('microblog_a')[0]).toMatchObject({
      status: 'failed_retryable',
      attemptCount: 3,
      lastError: 'Mastodon error: 503',
    });
  });

  it('succeeds on a later attempt', async () => {
    a.publish.mockRejectedValueOnce(new PublishRetryableError('Mastodon error: 502'));

    const results = await coordinator.publish(candidate, ['microblog_a'], { cycleType: 'daily' });

    expect(results.microblog_a).toMatchObject({ status: 'succeeded', attempts: 2 });
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000]);
    expect(postFor('microblog_a')[0].lastError).toBeNull();
  });

  it('treats an unsuccessful outcome as retryable', async () => {
    a.publish.mockResolvedValue({ success: false, error: 'no id returned' });

    const results = await coordinator.publish(candidate, ['microblog_a'], { cycleType: 'daily' });

    expect(results.microblog_a).toMatchObject({ status: 'failed_retryable', attempts: 3, error: 'no id returned' });
  });

  it('tries one shortened rendering after a length rejection', async () => {
    a.publish.mockRejectedValueOnce(new ContentTooLongError('too long', 500));

    const results = await coordinator.publish(candidate, ['microblog_a'], { cycleType: 'daily' });

    expect(results.microblog_a).toMatchObject({ status: 'succeeded', attempts: 2 });
    expect(a.publish.mock.calls.map(([content]) => content)).toEqual([
      '🚀 Release a1\n\n🔗 https://example.org/a1\n\n#acme #release #update #opensource',
      '🚀 Release a1 https://example.org/a1',
    ]);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('gives up when the shortened rendering is rejected too', async () => {
    a.publish.mockRejectedValue(new ContentTooLongError('too long', 500));

    const results = await coordinator.publish(candidate, ['microblog_a'], { cycleType: 'daily' });

    expect(results.microblog_a).toMatchObject({ status: 'failed_permanent', attempts: 2 });
  });

  it('reuses the non-terminal post on a later call', async () => {
    a.publish.mockRejectedValue(new PublishRetryableError('Mastodon error: 503'));
    await coordinator.publish(candidate, ['microblog_a'], { cycleType: 'daily' });

    a.publish.mockResolvedValue({ success: true, externalReference: 'later-ref' });
    const results = await coordinator.publish(candidate, ['microblog_a'], { cycleType: 'daily' });

    expect(results.microblog_a).toMatchObject({ status: 'succeeded', attempts: 1, externalReference: 'later-ref' });
    expect(postFor('microblog_a')).toHaveLength(1);
    expect(postFor('microblog_a')[0]).toMatchObject({ status: 'succeeded', attemptCount: 4 });
  });

  it('records a success found from a concurrent publisher as permanent', async () => {
    a.publish.mockImplementation(async () => {
      await store.createPost({
        id: 'other',
        activityIds: ['a1'],
        signature: postSignature(['a1']),
        destination: 'microblog_a',
        cycleType: 'daily',
        createdAt: NOW.toISOString(),
      });
      await store.updatePost('other', { status: 'succeeded' });
      return { success: true, externalReference: 'dup-ref' };
    });

    const results = await coordinator.publish(candidate, ['microblog_a'], { cycleType: 'daily' });

    expect(results.microblog_a?.status).toBe('failed_permanent');
  });

  it('reports a destination without an adapter as permanent', async () => {
    const results = await coordinator.publish(candidate, ['blog'], { cycleType: 'weekly' });

    expect(results.blog).toEqual({
      destination: 'blog',
      status: 'failed_permanent',
      postId: null,
      attempts: 0,
      error: 'No adapter configured',
    });
    expect(store.posts).toHaveLength(0);
  });

  it('fails the whole call when the store is unavailable', async () => {
    store.unavailable.add('createPost');

    await expect(
      coordinator.publish(candidate, ['microblog_a', 'microblog_b'], { cycleType: 'daily' })
    ).rejects.toBeInstanceOf(StoreUnavailableError);
    expect(a.publish).not.toHaveBeenCalled();
  });

  it('leaves the post retryable when aborted before publishing', async () => {
    const controller = new AbortController();
    controller.abort();

    const results = await coordinator.publish(candidate, ['microblog_a'], {
      cycleType: 'daily',
      signal: controller.signal,
    });

    expect(results.microblog_a).toMatchObject({ status: 'failed_retryable', attempts: 0, error: 'Aborted' });
    expect(a.publish).not.toHaveBeenCalled();
  });

  it('leaves the post retryable when aborted in flight', async () => {
    const controller = new AbortController();
    a.publish.mockImplementation(async () => {
      controller.abort();
      const error = new Error('The operation was aborted');
      error.name = 'AbortError';
      throw error;
    });

    const results = await coordinator.publish(candidate, ['microblog_a'], {
      cycleType: 'daily',
      signal: controller.signal,
    });

    expect(results.microblog_a).toMatchObject({ status: 'failed_retryable', attempts: 1, error: 'Aborted' });
    expect(postFor('microblog_a')[0].lastError).toBe('Aborted');
  });

  it('previews without touching the store', () => {
    expect(coordinator.preview(candidate, 'microblog_b')).toBe(renderCandidate(candidate, 'microblog_b', FORMAT));
    expect(store.posts).toHaveLength(0);
  });
});
