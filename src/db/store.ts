/**
 * Herald — Activity Store Contract
 *
 * Everything the core persists goes through this interface. Implementations
 * must enforce the uniqueness rules with a real constraint, not an
 * in-process check, and throw StoreUnavailableError when unreachable.
 */

import type {
  Activity,
  ActivitySource,
  NewActivity,
  NewPost,
  Post,
  PostFilter,
  PostUpdate,
  ScheduleState,
  ScheduleStatePatch,
} from '../types';

export interface FindOrCreateResult {
  activity: Activity;
  created: boolean;
}

export interface NewsworthyQuery {
  /** Exclusive lower bound on observedAt */
  since?: string;
  /** Inclusive upper bound on observedAt */
  until: string;
}

export interface SourceCounts {
  total: number;
  newsworthy: number;
}

export interface ActivityStore {
  /**
   * Insert unless an activity with the same fingerprint exists:
   * (source, sourceNativeId) when the id is present, else (source, contentHash).
   */
  findOrCreateActivity(input: NewActivity): Promise<FindOrCreateResult>;
  getActivities(ids: string[]): Promise<Activity[]>;
  setNewsworthy(id: string, newsworthy: boolean): Promise<Activity>;
  /** Newsworthy activities, newest first, ties broken by descending seq */
  listNewsworthy(query: NewsworthyQuery): Promise<Activity[]>;
  /** Activities with newsworthy still unset, oldest first */
  listUnclassified(limit: number): Promise<Activity[]>;
  findLatestNewsworthy(source: ActivitySource, excludeId?: string): Promise<Activity | null>;
  countActivitiesSince(since: string): Promise<Partial<Record<ActivitySource, SourceCounts>>>;

  createPost(input: NewPost): Promise<Post>;
  updatePost(id: string, update: PostUpdate): Promise<Post>;
  /** Matching posts, newest first */
  findPosts(filter: PostFilter): Promise<Post[]>;
  listPostsSince(since: string): Promise<Post[]>;

  readScheduleState(): Promise<ScheduleState>;
  updateScheduleState(patch: ScheduleStatePatch): Promise<void>;

  ping(): Promise<void>;
}
