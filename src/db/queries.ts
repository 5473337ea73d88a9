/**
 * Herald — Supabase Activity Store
 *
 * PostgreSQL-backed ActivityStore. Uniqueness is enforced by the partial
 * unique indexes in supabase/migrations; a unique violation on insert is the
 * duplicate path, not an error.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import {
  ActivityPayloadSchema,
  ActivitySourceSchema,
  CycleTypeSchema,
  DestinationSchema,
  PostStatusSchema,
  type Activity,
  type ActivitySource,
  type NewActivity,
  type NewPost,
  type Post,
  type PostFilter,
  type PostUpdate,
  type ScheduleState,
  type ScheduleStatePatch,
} from '../types';
import { ValidationError } from '../lib/errors';
import { isUniqueViolation, storeError } from './client';
import type { ActivityStore, FindOrCreateResult, NewsworthyQuery, SourceCounts } from './store';

// ============================================================
// ROW SCHEMAS
// ============================================================

const ActivityRowSchema = z.object({
  id: z.string(),
  seq: z.coerce.number(),
  source: ActivitySourceSchema,
  source_native_id: z.string().nullable(),
  content_hash: z.string(),
  observed_at: z.string(),
  payload: ActivityPayloadSchema,
  newsworthy: z.boolean().nullable(),
});

const PostRowSchema = z.object({
  id: z.string(),
  activity_ids: z.array(z.string()),
  signature: z.string(),
  destination: DestinationSchema,
  cycle_type: CycleTypeSchema,
  status: PostStatusSchema,
  attempt_count: z.number().int(),
  last_attempt_at: z.string().nullable(),
  external_reference: z.string().nullable(),
  content: z.string().nullable(),
  last_error: z.string().nullable(),
  created_at: z.string(),
});

const ScheduleRowSchema = z.object({
  last_daily_run_at: z.string().nullable(),
  last_weekly_run_at: z.string().nullable(),
  posts_published_today: z.number().int(),
  posts_counted_on: z.string().nullable(),
});

const DestinationRowSchema = z.object({
  destination: DestinationSchema,
  last_post_at: z.string().nullable(),
});

const CountRowSchema = z.object({
  source: ActivitySourceSchema,
  newsworthy: z.boolean().nullable(),
});

// Schedule state is a single row
const SCHEDULE_ROW_ID = 1;

// ============================================================
// MAPPERS
// ============================================================

function toActivity(row: unknown): Activity {
  const r = ActivityRowSchema.parse(row);
  return {
    id: r.id,
    seq: r.seq,
    source: r.source,
    sourceNativeId: r.source_native_id,
    contentHash: r.content_hash,
    observedAt: r.observed_at,
    payload: r.payload,
    newsworthy: r.newsworthy,
  };
}

function toPost(row: unknown): Post {
  const r = PostRowSchema.parse(row);
  return {
    id: r.id,
    activityIds: r.activity_ids,
    signature: r.signature,
    destination: r.destination,
    cycleType: r.cycle_type,
    status: r.status,
    attemptCount: r.attempt_count,
    lastAttemptAt: r.last_attempt_at,
    externalReference: r.external_reference,
    content: r.content,
    lastError: r.last_error,
    createdAt: r.created_at,
  };
}

function toPostUpdateRow(update: PostUpdate): Record<string, unknown> {
  const row: Record<string, unknown> = {};
  if (update.status !== undefined) row.status = update.status;
  if (update.attemptCount !== undefined) row.attempt_count = update.attemptCount;
  if (update.lastAttemptAt !== undefined) row.last_attempt_at = update.lastAttemptAt;
  if (update.externalReference !== undefined) row.external_reference = update.externalReference;
  if (update.content !== undefined) row.content = update.content;
  if (update.lastError !== undefined) row.last_error = update.lastError;
  return row;
}

// ============================================================
// STORE
// ============================================================

export class SupabaseActivityStore implements ActivityStore {
  constructor(private readonly db: SupabaseClient) {}

  // ----- Activities -----

  async findOrCreateActivity(input: NewActivity): Promise<FindOrCreateResult> {
    const { data, error } = await this.db
      .from('activities')
      .insert({
        id: input.id,
        source: input.source,
        source_native_id: input.sourceNativeId,
        content_hash: input.contentHash,
        observed_at: input.observedAt,
        payload: input.payload,
        newsworthy: null,
      })
      .select('*')
      .single();

    if (!error) {
      return { activity: toActivity(data), created: true };
    }

    if (isUniqueViolation(error)) {
      const existing = await this.findByFingerprint(input);
      if (existing) return { activity: existing, created: false };
    }

    throw storeError('activity insert', error);
  }

  private async findByFingerprint(input: NewActivity): Promise<Activity | null> {
    let query = this.db.from('activities').select('*').eq('source', input.source);

    query = input.sourceNativeId
      ? query.eq('source_native_id', input.sourceNativeId)
      : query.is('source_native_id', null).eq('content_hash', input.contentHash);

    const { data, error } = await query.maybeSingle();
    if (error) throw storeError('activity lookup', error);
    return data ? toActivity(data) : null;
  }

  async getActivities(ids: string[]): Promise<Activity[]> {
    if (ids.length === 0) return [];

    const { data, error } = await this.db.from('activities').select('*').in('id', ids);
    if (error) throw storeError('activity fetch', error);
    return (data ?? []).map(toActivity);
  }

  async setNewsworthy(id: string, newsworthy: boolean): Promise<Activity> {
    const { data, error } = await this.db
      .from('activities')
      .update({ newsworthy })
      .eq('id', id)
      .select('*')
      .single();

    if (error) throw storeError('newsworthy update', error);
    return toActivity(data);
  }

  async listNewsworthy(query: NewsworthyQuery): Promise<Activity[]> {
    let q = this.db
      .from('activities')
      .select('*')
      .eq('newsworthy', true)
      .lte('observed_at', query.until);

    if (query.since) q = q.gt('observed_at', query.since);

    const { data, error } = await q
      .order('observed_at', { ascending: false })
      .order('seq', { ascending: false });

    if (error) throw storeError('newsworthy listing', error);
    return (data ?? []).map(toActivity);
  }

  async listUnclassified(limit: number): Promise<Activity[]> {
    const { data, error } = await this.db
      .from('activities')
      .select('*')
      .is('newsworthy', null)
      .order('seq', { ascending: true })
      .limit(limit);

    if (error) throw storeError('unclassified listing', error);
    return (data ?? []).map(toActivity);
  }

  async findLatestNewsworthy(source: ActivitySource, excludeId?: string): Promise<Activity | null> {
    let q = this.db.from('activities').select('*').eq('source', source).eq('newsworthy', true);
    if (excludeId) q = q.neq('id', excludeId);

    const { data, error } = await q
      .order('observed_at', { ascending: false })
      .order('seq', { ascending: false })
      .limit(1)
      .maybeSingle();

    if (error) throw storeError('latest newsworthy lookup', error);
    return data ? toActivity(data) : null;
  }

  async countActivitiesSince(since: string): Promise<Partial<Record<ActivitySource, SourceCounts>>> {
    const { data, error } = await this.db
      .from('activities')
      .select('source, newsworthy')
      .gte('observed_at', since);

    if (error) throw storeError('activity counts', error);

    const counts: Partial<Record<ActivitySource, SourceCounts>> = {};
    for (const raw of data ?? []) {
      const row = CountRowSchema.parse(raw);
      const entry = counts[row.source] ?? { total: 0, newsworthy: 0 };
      entry.total++;
      if (row.newsworthy) entry.newsworthy++;
      counts[row.source] = entry;
    }
    return counts;
  }

  // ----- Posts -----

  async createPost(input: NewPost): Promise<Post> {
    const { data, error } = await this.db
      .from('posts')
      .insert({
        id: input.id,
        activity_ids: input.activityIds,
        signature: input.signature,
        destination: input.destination,
        cycle_type: input.cycleType,
        status: 'pending',
        attempt_count: 0,
        created_at: input.createdAt,
      })
      .select('*')
      .single();

    if (error) throw storeError('post insert', error);
    return toPost(data);
  }

  async updatePost(id: string, update: PostUpdate): Promise<Post> {
    const { data, error } = await this.db
      .from('posts')
      .update(toPostUpdateRow(update))
      .eq('id', id)
      .select('*')
      .single();

    if (error) {
      if (isUniqueViolation(error)) {
        throw new ValidationError(`Post ${id}: a succeeded post already exists for this content and destination`);
      }
      throw storeError('post update', error);
    }
    return toPost(data);
  }

  async findPosts(filter: PostFilter): Promise<Post[]> {
    let q = this.db.from('posts').select('*');

    if (filter.signature) q = q.eq('signature', filter.signature);
    if (filter.destination) q = q.eq('destination', filter.destination);
    if (filter.cycleType) q = q.eq('cycle_type', filter.cycleType);
    if (filter.statuses) q = q.in('status', filter.statuses);
    if (filter.activityId) q = q.contains('activity_ids', [filter.activityId]);

    const { data, error } = await q.order('created_at', { ascending: false });
    if (error) throw storeError('post lookup', error);
    return (data ?? []).map(toPost);
  }

  async listPostsSince(since: string): Promise<Post[]> {
    const { data, error } = await this.db
      .from('posts')
      .select('*')
      .gte('created_at', since)
      .order('created_at', { ascending: false });

    if (error) throw storeError('post listing', error);
    return (data ?? []).map(toPost);
  }

  // ----- Schedule state -----

  async readScheduleState(): Promise<ScheduleState> {
    const [scheduleResult, destinationResult] = await Promise.all([
      this.db.from('schedule_state').select('*').eq('id', SCHEDULE_ROW_ID).maybeSingle(),
      this.db.from('destination_state').select('*'),
    ]);

    if (scheduleResult.error) throw storeError('schedule state read', scheduleResult.error);
    if (destinationResult.error) throw storeError('destination state read', destinationResult.error);

    const schedule = scheduleResult.data ? ScheduleRowSchema.parse(scheduleResult.data) : null;

    const lastPostAt: ScheduleState['lastPostAt'] = {};
    for (const raw of destinationResult.data ?? []) {
      const row = DestinationRowSchema.parse(raw);
      if (row.last_post_at) lastPostAt[row.destination] = row.last_post_at;
    }

    return {
      lastDailyRunAt: schedule?.last_daily_run_at ?? null,
      lastWeeklyRunAt: schedule?.last_weekly_run_at ?? null,
      postsPublishedToday: schedule?.posts_published_today ?? 0,
      postsCountedOn: schedule?.posts_counted_on ?? null,
      lastPostAt,
    };
  }

  async updateScheduleState(patch: ScheduleStatePatch): Promise<void> {
    const row: Record<string, unknown> = {};
    if (patch.lastDailyRunAt !== undefined) row.last_daily_run_at = patch.lastDailyRunAt;
    if (patch.lastWeeklyRunAt !== undefined) row.last_weekly_run_at = patch.lastWeeklyRunAt;
    if (patch.postsPublishedToday !== undefined) row.posts_published_today = patch.postsPublishedToday;
    if (patch.postsCountedOn !== undefined) row.posts_counted_on = patch.postsCountedOn;

    if (Object.keys(row).length > 0) {
      // Upsert only touches the columns present in the payload
      const { error } = await this.db
        .from('schedule_state')
        .upsert({ id: SCHEDULE_ROW_ID, ...row }, { onConflict: 'id' });
      if (error) throw storeError('schedule state write', error);
    }

    const destinationRows = Object.entries(patch.lastPostAt ?? {}).map(([destination, lastPostAt]) => ({
      destination,
      last_post_at: lastPostAt,
    }));

    if (destinationRows.length > 0) {
      const { error } = await this.db
        .from('destination_state')
        .upsert(destinationRows, { onConflict: 'destination' });
      if (error) throw storeError('destination state write', error);
    }
  }

  async ping(): Promise<void> {
    const { error } = await this.db.from('schedule_state').select('id').limit(1);
    if (error) throw storeError('health check', error);
  }
}
