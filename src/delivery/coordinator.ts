/**
 * Herald — Publish Coordinator
 *
 * Fans one candidate out to a set of destinations. Each destination runs as
 * its own task with its own Post row, retry budget and failure; a sibling's
 * outcome never changes another's.
 *
 * Per destination:
 * 1. Already succeeded for this signature → already_published, no call
 * 2. Reuse the latest non-terminal Post row, or create a pending one
 * 3. Render, call the adapter, record the attempt
 * 4. Retryable failure → back off and retry up to the attempt limit
 * 5. ContentTooLong → one shortened rendering, then permanent
 *
 * Only StoreUnavailableError escapes; the whole call fails with it.
 */

import { createHash } from 'crypto';
import { nanoid } from 'nanoid';
import type { Candidate, CycleType, Destination, Post, PostResult, PostUpdate, PublishResults } from '../types';
import { isTerminal } from '../types';
import type { ActivityStore } from '../db/store';
import type { FormatConfig, RetryConfig } from '../lib/config';
import {
  ContentTooLongError,
  PublishPermanentError,
  PublishRetryableError,
  StoreUnavailableError,
  ValidationError,
  isAbortError,
  toErrorMessage,
} from '../lib/errors';
import { logger, type Logger } from '../lib/logger';
import { sleep as defaultSleep } from '../lib/time';
import { renderCandidate } from './formatter';
import type { Publishers } from './destinations/base';

const log = logger.child({ component: 'PublishCoordinator' });

// ============================================================
// SIGNATURE
// ============================================================

/**
 * Identity of a candidate across cycles: sha256 of the sorted,
 * comma-joined activity ids.
 */
export function postSignature(activityIds: string[]): string {
  return createHash('sha256').update([...activityIds].sort().join(',')).digest('hex');
}

export function backoffDelay(failedAttempt: number, retry: RetryConfig): number {
  return retry.backoffBaseMs * Math.pow(retry.backoffFactor, failedAttempt - 1);
}

// ============================================================
// TYPES
// ============================================================

export interface CoordinatorDeps {
  store: ActivityStore;
  publishers: Publishers;
  format: FormatConfig;
  retry: RetryConfig;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => Date;
  generateId?: () => string;
}

export interface PublishOptions {
  cycleType: CycleType;
  signal?: AbortSignal;
}

type AttemptFailure =
  | { kind: 'retryable'; message: string }
  | { kind: 'permanent'; message: string }
  | { kind: 'too_long'; message: string }
  | { kind: 'aborted'; message: string };

// ============================================================
// COORDINATOR
// ============================================================

export class PublishCoordinator {
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(private readonly deps: CoordinatorDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
    this.generateId = deps.generateId ?? (() => nanoid());
  }

  /**
   * Publish to every requested destination. The result has one entry per
   * destination.
   */
  async publish(
    candidate: Candidate,
    destinations: readonly Destination[],
    options: PublishOptions
  ): Promise<PublishResults> {
    const signature = postSignature(candidate.activityIds);

    const settled = await Promise.allSettled(
      destinations.map((destination) => this.publishOne(candidate, signature, destination, options))
    );

    const storeFailure = settled.find(
      (s): s is PromiseRejectedResult => s.status === 'rejected' && s.reason instanceof StoreUnavailableError
    );
    if (storeFailure) {
      throw storeFailure.reason;
    }

    const results: PublishResults = {};
    settled.forEach((outcome, index) => {
      const destination = destinations[index];
      if (outcome.status === 'fulfilled') {
        results[destination] = outcome.value;
        return;
      }
      log.error('Destination task failed unexpectedly', { destination, error: toErrorMessage(outcome.reason) });
      results[destination] = {
        destination,
        status: 'failed_retryable',
        postId: null,
        attempts: 0,
        error: toErrorMessage(outcome.reason),
      };
    });

    return results;
  }

  /**
   * Render without publishing, for dry runs.
   */
  preview(candidate: Candidate, destination: Destination): string {
    return renderCandidate(candidate, destination, this.deps.format);
  }

  private async publishOne(
    candidate: Candidate,
    signature: string,
    destination: Destination,
    options: PublishOptions
  ): Promise<PostResult> {
    const { store } = this.deps;
    const dlog = log.child({ destination, signature: signature.slice(0, 12) });

    const publisher = this.deps.publishers[destination];
    if (!publisher) {
      dlog.warn('No adapter configured');
      return { destination, status: 'failed_permanent', postId: null, attempts: 0, error: 'No adapter configured' };
    }

    const existing = await store.findPosts({ signature, destination });
    const published = existing.find((p) => p.status === 'succeeded');
    if (published) {
      dlog.info('Already published', { postId: published.id });
      return {
        destination,
        status: 'already_published',
        postId: published.id,
        attempts: 0,
        externalReference: published.externalReference ?? undefined,
      };
    }

    let post: Post =
      existing.find((p) => !isTerminal(p.status)) ??
      (await store.createPost({
        id: this.generateId(),
        activityIds: [...candidate.activityIds].sort(),
        signature,
        destination,
        cycleType: options.cycleType,
        createdAt: this.now().toISOString(),
      }));

    const record = async (update: PostUpdate): Promise<Post> => {
      post = await store.updatePost(post.id, update);
      return post;
    };

    const { maxAttempts } = this.deps.retry;
    let shortened = false;
    let failedAttempts = 0;
    let attempts = 0;

    while (true) {
      if (options.signal?.aborted) {
        await record({ status: 'failed_retryable', lastError: 'Aborted' });
        return this.result(destination, post, attempts, 'Aborted');
      }

      const content = renderCandidate(candidate, destination, this.deps.format, { shortened });
      attempts++;
      await record({
        status: 'pending',
        attemptCount: post.attemptCount + 1,
        lastAttemptAt: this.now().toISOString(),
        content,
      });

      const failure = await publisher.publish(content, options.signal).then(
        async (outcome): Promise<AttemptFailure | null> => {
          if (!outcome.success) {
            return { kind: 'retryable', message: outcome.error ?? 'Adapter reported failure' };
          }
          return this.markSucceeded(post, outcome.externalReference, record, dlog);
        },
        (error: unknown) => classifyFailure(error)
      );

      if (failure === null) {
        return this.result(destination, post, attempts);
      }

      dlog.warn('Publish attempt failed', { attempt: attempts, kind: failure.kind, error: failure.message });

      switch (failure.kind) {
        case 'aborted':
          await record({ status: 'failed_retryable', lastError: failure.message });
          return this.result(destination, post, attempts, failure.message);

        case 'too_long':
          if (!shortened) {
            shortened = true;
            await record({ lastError: failure.message });
            continue;
          }
          await record({ status: 'failed_permanent', lastError: failure.message });
          return this.result(destination, post, attempts, failure.message);

        case 'permanent':
          await record({ status: 'failed_permanent', lastError: failure.message });
          return this.result(destination, post, attempts, failure.message);

        case 'retryable': {
          failedAttempts++;
          if (failedAttempts >= maxAttempts) {
            await record({ status: 'failed_retryable', lastError: failure.message });
            return this.result(destination, post, attempts, failure.message);
          }
          await record({ lastError: failure.message });
          try {
            await this.sleep(backoffDelay(failedAttempts, this.deps.retry), options.signal);
          } catch (error) {
            if (!isAbortError(error)) throw error;
            // The loop head records the abort
          }
        }
      }
    }
  }

  private async markSucceeded(
    post: Post,
    externalReference: string | undefined,
    record: (update: PostUpdate) => Promise<Post>,
    dlog: Logger
  ): Promise<AttemptFailure | null> {
    try {
      await record({ status: 'succeeded', externalReference: externalReference ?? null, lastError: null });
      dlog.info('Published', { postId: post.id, externalReference });
      return null;
    } catch (error) {
      // Another process recorded a success for this signature first
      if (error instanceof ValidationError) {
        return { kind: 'permanent', message: error.message };
      }
      throw error;
    }
  }

  private result(destination: Destination, post: Post, attempts: number, error?: string): PostResult {
    return {
      destination,
      status: post.status,
      postId: post.id,
      attempts,
      externalReference: post.externalReference ?? undefined,
      error,
    };
  }
}

function classifyFailure(error: unknown): AttemptFailure {
  if (error instanceof StoreUnavailableError) throw error;
  if (isAbortError(error)) return { kind: 'aborted', message: 'Aborted' };
  if (error instanceof ContentTooLongError) return { kind: 'too_long', message: error.message };
  if (error instanceof PublishPermanentError) return { kind: 'permanent', message: error.message };
  if (error instanceof PublishRetryableError) return { kind: 'retryable', message: error.message };
  // Unclassified adapter errors are treated as transient
  return { kind: 'retryable', message: toErrorMessage(error) };
}
