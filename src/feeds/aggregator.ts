/**
 * Herald — Activity Collector
 *
 * Runs one collection pass:
 * 1. Re-attempt activities an earlier pass left unclassified
 * 2. Fetch from every configured source (failures isolated per source)
 * 3. Drop repeats within the batch
 * 4. Admit through the deduplicator
 * 5. Classify admitted activities
 *
 * A StoreUnavailableError ends the pass; everything else is counted and logged.
 */

import type { Activity, ActivitySource, RawActivity } from '../types';
import type { ActivityStore } from '../db/store';
import { safeCollect, type SourceAdapter, type SourceAdapters, type SourceFetchResult } from './base';
import { deduplicateInMemory, type Deduplicator } from './dedup';
import type { ContentFilter } from './filter';
import { ClassificationError, ValidationError } from '../lib/errors';
import { HOUR_MS } from '../lib/time';
import { logger } from '../lib/logger';

const log = logger.child({ component: 'Collector' });

// ============================================================
// TYPES
// ============================================================

export interface CollectorDeps {
  store: ActivityStore;
  sources: SourceAdapters;
  deduplicator: Deduplicator;
  filter: ContentFilter;
}

export interface CollectorConfig {
  /** How far back each source looks */
  lookbackHours?: number;
  /** Only these sources (default: every configured one) */
  only?: ActivitySource[];
  /** Unclassified activities re-attempted per pass */
  reclassifyLimit?: number;
  now?: Date;
}

export interface CollectionResult {
  sourceResults: SourceFetchResult[];
  totalRawItems: number;
  admitted: number;
  duplicates: number;
  invalid: number;
  newsworthy: number;
  classificationFailures: number;
  reclassified: number;
  durationMs: number;
  completedAt: string;
  errors: string[];
}

const DEFAULT_LOOKBACK_HOURS = 24;
const DEFAULT_RECLASSIFY_LIMIT = 100;

// ============================================================
// COLLECTOR
// ============================================================

export async function runCollection(deps: CollectorDeps, config: CollectorConfig = {}): Promise<CollectionResult> {
  const startTime = Date.now();
  const now = config.now ?? new Date();
  const since = new Date(now.getTime() - (config.lookbackHours ?? DEFAULT_LOOKBACK_HOURS) * HOUR_MS);

  const adapters = Object.values(deps.sources).filter(
    (adapter): adapter is SourceAdapter =>
      adapter !== undefined && (!config.only || config.only.includes(adapter.source))
  );

  log.info('Starting collection', { sources: adapters.map((a) => a.source), since: since.toISOString() });

  // Earlier failures first, so this pass's own failures wait for the next one
  const reclassified = await reclassifyPending(deps, config.reclassifyLimit ?? DEFAULT_RECLASSIFY_LIMIT);

  const sourceResults = await Promise.all(adapters.map((adapter) => safeCollect(adapter, since)));
  const errors = sourceResults.filter((r) => r.error).map((r) => `${r.source}: ${r.error}`);

  const rawItems: RawActivity[] = sourceResults.flatMap((r) => r.items);
  const { unique, duplicateCount } = deduplicateInMemory(rawItems);

  let admitted = 0;
  let duplicates = duplicateCount;
  let invalid = 0;
  let newsworthy = 0;
  let classificationFailures = 0;

  for (const raw of unique) {
    let activity: Activity;
    try {
      const result = await deps.deduplicator.admit(raw);
      if (result.kind === 'duplicate') {
        duplicates++;
        continue;
      }
      activity = result.activity;
      admitted++;
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      invalid++;
      log.warn('Rejected malformed activity', { source: raw.source, error: error.message });
      continue;
    }

    const classified = await classifySafely(deps.filter, activity);
    if (classified === null) classificationFailures++;
    else if (classified.newsworthy) newsworthy++;
  }

  const result: CollectionResult = {
    sourceResults,
    totalRawItems: rawItems.length,
    admitted,
    duplicates,
    invalid,
    newsworthy,
    classificationFailures,
    reclassified,
    durationMs: Date.now() - startTime,
    completedAt: new Date().toISOString(),
    errors,
  };

  log.info('Collection completed', {
    totalRaw: result.totalRawItems,
    admitted,
    duplicates,
    invalid,
    newsworthy,
    classificationFailures,
    reclassified,
    durationMs: result.durationMs,
    errors: errors.length,
  });

  return result;
}

/**
 * Classify, leaving the activity unclassified when a rule throws.
 * Returns null in that case.
 */
async function classifySafely(filter: ContentFilter, activity: Activity): Promise<Activity | null> {
  try {
    return await filter.classify(activity);
  } catch (error) {
    if (!(error instanceof ClassificationError)) throw error;
    log.warn('Classification failed', { activityId: activity.id, error: error.message });
    return null;
  }
}

async function reclassifyPending(deps: CollectorDeps, limit: number): Promise<number> {
  const pending = await deps.store.listUnclassified(limit);
  let reclassified = 0;

  for (const activity of pending) {
    const classified = await classifySafely(deps.filter, activity);
    if (classified !== null && classified.newsworthy !== null) reclassified++;
  }

  return reclassified;
}
