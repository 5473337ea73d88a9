/**
 * Herald — Post, Schedule & Cycle Types
 */

import { z } from 'zod';
import type { Activity } from './activity';

// ============================================================
// ENUMS
// ============================================================

export const DestinationSchema = z.enum(['microblog_a', 'microblog_b', 'blog']);
export type Destination = z.infer<typeof DestinationSchema>;

export const DESTINATIONS = DestinationSchema.options;

export const CycleTypeSchema = z.enum(['daily', 'weekly']);
export type CycleType = z.infer<typeof CycleTypeSchema>;

export const PostStatusSchema = z.enum([
  'pending',
  'succeeded',
  'failed_retryable',
  'failed_permanent',
]);
export type PostStatus = z.infer<typeof PostStatusSchema>;

export const TERMINAL_STATUSES: readonly PostStatus[] = ['succeeded', 'failed_permanent'];

export function isTerminal(status: PostStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/** Destination set each cycle fans out to. */
export const CYCLE_DESTINATIONS: Record<CycleType, readonly Destination[]> = {
  daily: ['microblog_a', 'microblog_b'],
  weekly: ['blog'],
};

// ============================================================
// POST
// ============================================================

export interface Post {
  id: string;
  activityIds: string[];
  signature: string;
  destination: Destination;
  cycleType: CycleType;
  status: PostStatus;
  attemptCount: number;
  lastAttemptAt: string | null;
  externalReference: string | null;
  content: string | null;
  lastError: string | null;
  createdAt: string;
}

export type NewPost = Pick<Post, 'id' | 'activityIds' | 'signature' | 'destination' | 'cycleType'> & {
  createdAt: string;
};

export type PostUpdate = Partial<
  Pick<Post, 'status' | 'attemptCount' | 'lastAttemptAt' | 'externalReference' | 'content' | 'lastError'>
>;

export interface PostFilter {
  signature?: string;
  destination?: Destination;
  cycleType?: CycleType;
  statuses?: PostStatus[];
  activityId?: string;
}

// ============================================================
// CANDIDATE
// ============================================================

export interface ReportingWindow {
  start: string;
  end: string;
}

/**
 * A unit of content selected for publishing in a cycle.
 */
export type Candidate =
  | { kind: 'single'; activityIds: string[]; activity: Activity }
  | {
      kind: 'digest';
      activityIds: string[];
      activities: Activity[];
      window: ReportingWindow;
      body: string;
      summarized: boolean;
    };

// ============================================================
// PUBLISH RESULTS
// ============================================================

export type PostResultStatus = PostStatus | 'already_published' | 'rate_limited';

export interface PostResult {
  destination: Destination;
  status: PostResultStatus;
  postId: string | null;
  attempts: number;
  externalReference?: string;
  error?: string;
}

export type PublishResults = Partial<Record<Destination, PostResult>>;

// ============================================================
// SCHEDULE STATE
// ============================================================

export interface ScheduleState {
  lastDailyRunAt: string | null;
  lastWeeklyRunAt: string | null;
  postsPublishedToday: number;
  /** Local date key (YYYY-MM-DD) that postsPublishedToday belongs to */
  postsCountedOn: string | null;
  lastPostAt: Partial<Record<Destination, string>>;
}

/**
 * Field-disjoint update. Only the fields present are written, so daily and
 * weekly cycles never overwrite each other.
 */
export interface ScheduleStatePatch {
  lastDailyRunAt?: string;
  lastWeeklyRunAt?: string;
  postsPublishedToday?: number;
  postsCountedOn?: string;
  lastPostAt?: Partial<Record<Destination, string>>;
}

// ============================================================
// CYCLE OUTCOME
// ============================================================

export type CyclePhase = 'idle' | 'collecting' | 'selecting' | 'publishing' | 'recording';

export interface CandidateOutcome {
  activityIds: string[];
  signature: string;
  results: PublishResults;
}

export type CycleOutcome =
  | {
      status: 'skipped';
      cycleType: CycleType;
      reason: string;
      nextEligibleAt: string;
    }
  | {
      status: 'completed';
      cycleType: CycleType;
      mode: 'full' | 'retry';
      startedAt: string;
      candidates: CandidateOutcome[];
      succeeded: Destination[];
      retryable: Destination[];
      permanent: Destination[];
    };
