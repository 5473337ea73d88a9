/**
 * Herald — Deduplication Gate
 *
 * Decides whether an incoming raw activity is new. The fingerprint is
 * (source, sourceNativeId) when the source has stable ids, otherwise
 * (source, contentHash). The store's uniqueness constraint makes admission
 * atomic: of two collectors racing on one fingerprint, exactly one stores it.
 */

import { createHash } from 'crypto';
import { nanoid } from 'nanoid';
import { RawActivitySchema } from '../types';
import type { ActivityPayload, AdmissionResult, RawActivity } from '../types';
import type { ActivityStore } from '../db/store';
import { ValidationError } from '../lib/errors';
import { logger } from '../lib/logger';

const log = logger.child({ component: 'Deduplicator' });

// ============================================================
// FINGERPRINT
// ============================================================

/**
 * Collapse runs of whitespace and trim. Case is preserved.
 */
export function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function computeContentHash(payload: Pick<ActivityPayload, 'title' | 'text'>): string {
  const content = `${normalizeText(payload.title)}\n${normalizeText(payload.text)}`;
  return createHash('sha256').update(content).digest('hex');
}

export function fingerprint(raw: RawActivity): string {
  return raw.sourceNativeId
    ? `${raw.source}:id:${raw.sourceNativeId}`
    : `${raw.source}:hash:${computeContentHash(raw.payload)}`;
}

// ============================================================
// IN-BATCH DEDUP
// ============================================================

export interface BatchDedupResult {
  unique: RawActivity[];
  duplicateCount: number;
}

/**
 * Drop repeats within a single collection batch before touching the store.
 * The first occurrence wins.
 */
export function deduplicateInMemory(items: RawActivity[]): BatchDedupResult {
  const seen = new Set<string>();
  const unique: RawActivity[] = [];

  for (const item of items) {
    const key = fingerprint(item);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(item);
  }

  return { unique, duplicateCount: items.length - unique.length };
}

// ============================================================
// DEDUPLICATOR
// ============================================================

export interface DeduplicatorOptions {
  now?: () => Date;
  generateId?: () => string;
}

export class Deduplicator {
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(
    private readonly store: ActivityStore,
    options: DeduplicatorOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? (() => nanoid());
  }

  /**
   * Admit a raw activity. Duplicates cause no store mutation.
   */
  async admit(candidate: RawActivity): Promise<AdmissionResult> {
    const parsed = RawActivitySchema.safeParse(candidate);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new ValidationError(`Malformed ${String(candidate.source)} activity: ${issues}`);
    }

    const raw = parsed.data;
    const { activity, created } = await this.store.findOrCreateActivity({
      id: this.generateId(),
      source: raw.source,
      sourceNativeId: raw.sourceNativeId ?? null,
      contentHash: computeContentHash(raw.payload),
      observedAt: this.now().toISOString(),
      payload: raw.payload,
    });

    if (!created) {
      log.debug('Duplicate activity', { source: raw.source, activityId: activity.id });
      return { kind: 'duplicate', existing: activity };
    }

    log.debug('Activity admitted', { source: raw.source, activityId: activity.id });
    return { kind: 'admitted', activity };
  }
}
