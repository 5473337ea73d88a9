/**
 * Shared test fixtures.
 */

import { vi, type Mock } from 'vitest';
import type { Activity, ActivityPayload, Destination, RawActivity } from '../../src/types';
import type { AppConfig, FormatConfig, RetryConfig, ScheduleConfig } from '../../src/lib/config';
import { loadConfig } from '../../src/lib/config';
import type { Publisher, PublishOutcome } from '../../src/delivery/destinations/base';
import type { MemoryActivityStore } from './memory-store';
import { computeContentHash } from '../../src/feeds/dedup';

export function testConfig(overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({ PROJECT_NAME: 'Acme', PROJECT_HASHTAGS: '#acme,#opensource', ...overrides });
}

export const FORMAT: FormatConfig = {
  projectName: 'Acme',
  hashtags: ['#acme', '#opensource'],
  limits: { microblog_a: 500, microblog_b: 280 },
};

export const RETRY: RetryConfig = { maxAttempts: 3, backoffBaseMs: 1000, backoffFactor: 4 };

export const SCHEDULE: ScheduleConfig = {
  timezone: 'UTC',
  minPostIntervalHours: 1,
  maxDailyPosts: 10,
  dailyLookbackHours: 24,
  weeklyMinIntervalHours: 144,
  weeklyLookbackDays: 7,
};

export function rawChat(id: string, text: string, actor = '@alice:example.org'): RawActivity {
  return {
    source: 'chat',
    sourceNativeId: id,
    payload: { kind: 'message', title: text.split('\n')[0], text, actor },
  };
}

let nextId = 0;

/**
 * Insert an already-classified activity straight into the store.
 */
export async function seedActivity(
  store: MemoryActivityStore,
  options: {
    id?: string;
    observedAt: string;
    newsworthy?: boolean | null;
    payload?: Partial<ActivityPayload>;
    source?: Activity['source'];
  }
): Promise<Activity> {
  const id = options.id ?? `act-${++nextId}`;
  const payload: ActivityPayload = {
    kind: 'release',
    title: `Release ${id}`,
    text: `Notes for ${id}`,
    link: `https://example.org/${id}`,
    ...options.payload,
  };

  const { activity } = await store.findOrCreateActivity({
    id,
    source: options.source ?? 'repository',
    sourceNativeId: id,
    contentHash: computeContentHash(payload),
    observedAt: options.observedAt,
    payload,
  });

  const flag = options.newsworthy === undefined ? true : options.newsworthy;
  return flag === null ? activity : store.setNewsworthy(activity.id, flag);
}

export interface FakePublisher extends Publisher {
  publish: Mock<(content: string, signal?: AbortSignal) => Promise<PublishOutcome>>;
}

export function fakePublisher(
  destination: Destination,
  impl: (content: string, signal?: AbortSignal) => Promise<PublishOutcome> = async () => ({
    success: true,
    externalReference: `${destination}-ref`,
  })
): FakePublisher {
  return {
    destination,
    publish: vi.fn(impl),
    checkConnection: vi.fn(async () => true),
  };
}
