/**
 * Herald — Runtime Wiring
 *
 * Builds the store, adapters and core components from configuration for the
 * operational commands.
 */

import type { Destination } from './types';
import { loadConfig, type AppConfig } from './lib/config';
import type { ActivityStore } from './db/store';
import { getAdminClient } from './db/client';
import { SupabaseActivityStore } from './db/queries';
import { ContentFilter } from './feeds/filter';
import { Deduplicator } from './feeds/dedup';
import { createSources } from './feeds/sources';
import type { SourceAdapters } from './feeds/base';
import { createPublishers } from './delivery/destinations';
import type { Publishers } from './delivery/destinations/base';
import { PublishCoordinator } from './delivery/coordinator';
import { AnthropicSummarizer, type Summarizer } from './delivery/summarizer';
import { Scheduler } from './scheduler';

export interface Runtime {
  config: AppConfig;
  store: ActivityStore;
  sources: SourceAdapters;
  publishers: Publishers;
  deduplicator: Deduplicator;
  filter: ContentFilter;
  coordinator: PublishCoordinator;
  scheduler: Scheduler;
  summarizer: Summarizer | null;
}

export function configuredDestinations(publishers: Publishers): Destination[] {
  return (['microblog_a', 'microblog_b', 'blog'] as const).filter((d) => publishers[d] !== undefined);
}

export function createRuntime(config: AppConfig = loadConfig()): Runtime {
  const { env } = config;

  const store = new SupabaseActivityStore(getAdminClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_ROLE_KEY));
  const sources = createSources(config);
  const publishers = createPublishers(config);

  const summarizer = env.ANTHROPIC_API_KEY
    ? new AnthropicSummarizer({
        apiKey: env.ANTHROPIC_API_KEY,
        model: env.SUMMARY_MODEL,
        projectName: config.format.projectName,
        timeZone: config.schedule.timezone,
      })
    : null;

  const coordinator = new PublishCoordinator({
    store,
    publishers,
    format: config.format,
    retry: config.retry,
  });

  const scheduler = new Scheduler({
    store,
    coordinator,
    destinations: configuredDestinations(publishers),
    schedule: config.schedule,
    projectName: config.format.projectName,
    summarizer,
  });

  return {
    config,
    store,
    sources,
    publishers,
    deduplicator: new Deduplicator(store),
    filter: new ContentFilter(store, config.filter),
    coordinator,
    scheduler,
    summarizer,
  };
}
