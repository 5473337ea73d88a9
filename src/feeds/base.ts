/**
 * Herald — Source Adapter Contract
 *
 * The set of sources is closed (chat, repository, statistics). Each adapter
 * yields raw activities observed since a point in time and owns no
 * pagination state between calls.
 */

import type { ActivitySource, RawActivity } from '../types';
import { toErrorMessage } from '../lib/errors';
import { logger } from '../lib/logger';

export interface SourceAdapter {
  readonly source: ActivitySource;
  collect(since: Date): Promise<RawActivity[]>;
}

export type SourceAdapters = Partial<Record<ActivitySource, SourceAdapter>>;

export interface SourceFetchResult {
  source: ActivitySource;
  items: RawActivity[];
  durationMs: number;
  error?: string;
}

/**
 * Run an adapter, turning a thrown error into a failed result so that one
 * source cannot stop the others.
 */
export async function safeCollect(adapter: SourceAdapter, since: Date): Promise<SourceFetchResult> {
  const log = logger.child({ component: 'SourceAdapter', source: adapter.source });
  const startTime = Date.now();
  log.info('Starting collection', { since: since.toISOString() });

  try {
    const items = await adapter.collect(since);
    const durationMs = Date.now() - startTime;
    log.info('Collection completed', { itemsFound: items.length, durationMs });
    return { source: adapter.source, items, durationMs };
  } catch (error) {
    const message = toErrorMessage(error);
    log.error('Collection failed', { error: message });
    return { source: adapter.source, items: [], durationMs: Date.now() - startTime, error: message };
  }
}

/**
 * First line of a text, capped for use as an activity title.
 */
export function firstLine(text: string, max = 100): string {
  const line = text.split('\n')[0]?.trim() ?? '';
  return line.length > max ? `${line.slice(0, max - 3)}...` : line;
}
