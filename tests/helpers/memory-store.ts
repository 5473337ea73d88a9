/**
 * In-memory ActivityStore for tests. Enforces the same uniqueness rules as
 * the database: one activity per fingerprint and one succeeded post per
 * (signature, destination).
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
} from '../../src/types';
import type { ActivityStore, FindOrCreateResult, NewsworthyQuery, SourceCounts } from '../../src/db/store';
import { StoreUnavailableError, ValidationError } from '../../src/lib/errors';

type StoreMethod = keyof ActivityStore;

export class MemoryActivityStore implements ActivityStore {
  readonly activities: Activity[] = [];
  readonly posts: Post[] = [];
  state: ScheduleState = {
    lastDailyRunAt: null,
    lastWeeklyRunAt: null,
    postsPublishedToday: 0,
    postsCountedOn: null,
    lastPostAt: {},
  };

  /** Methods that throw StoreUnavailableError while listed */
  readonly unavailable = new Set<StoreMethod>();

  private seq = 0;
  private readonly postOrder = new Map<string, number>();

  private guard(method: StoreMethod): void {
    if (this.unavailable.has(method)) {
      throw new StoreUnavailableError(`Store unavailable during ${method}`);
    }
  }

  // ----- Activities -----

  async findOrCreateActivity(input: NewActivity): Promise<FindOrCreateResult> {
    this.guard('findOrCreateActivity');

    const existing = this.activities.find((a) =>
      input.sourceNativeId
        ? a.source === input.source && a.sourceNativeId === input.sourceNativeId
        : a.source === input.source && a.sourceNativeId === null && a.contentHash === input.contentHash
    );
    if (existing) return { activity: existing, created: false };

    const activity: Activity = { ...input, seq: ++this.seq, newsworthy: null };
    this.activities.push(activity);
    return { activity, created: true };
  }

  async getActivities(ids: string[]): Promise<Activity[]> {
    this.guard('getActivities');
    return this.activities.filter((a) => ids.includes(a.id));
  }

  async setNewsworthy(id: string, newsworthy: boolean): Promise<Activity> {
    this.guard('setNewsworthy');
    const index = this.activities.findIndex((a) => a.id === id);
    if (index === -1) throw new StoreUnavailableError(`No activity ${id}`);
    const updated = { ...this.activities[index], newsworthy };
    this.activities[index] = updated;
    return updated;
  }

  async listNewsworthy(query: NewsworthyQuery): Promise<Activity[]> {
    this.guard('listNewsworthy');
    return this.activities
      .filter(
        (a) =>
          a.newsworthy === true &&
          a.observedAt <= query.until &&
          (query.since === undefined || a.observedAt > query.since)
      )
      .sort((a, b) => (a.observedAt === b.observedAt ? b.seq - a.seq : a.observedAt < b.observedAt ? 1 : -1));
  }

  async listUnclassified(limit: number): Promise<Activity[]> {
    this.guard('listUnclassified');
    return this.activities
      .filter((a) => a.newsworthy === null)
      .sort((a, b) => a.seq - b.seq)
      .slice(0, limit);
  }

  async findLatestNewsworthy(source: ActivitySource, excludeId?: string): Promise<Activity | null> {
    this.guard('findLatestNewsworthy');
    const matches = (await this.listNewsworthy({ until: '9999-12-31T23:59:59.999Z' })).filter(
      (a) => a.source === source && a.id !== excludeId
    );
    return matches[0] ?? null;
  }

  async countActivitiesSince(since: string): Promise<Partial<Record<ActivitySource, SourceCounts>>> {
    this.guard('countActivitiesSince');
    const counts: Partial<Record<ActivitySource, SourceCounts>> = {};
    for (const a of this.activities.filter((x) => x.observedAt >= since)) {
      const entry = counts[a.source] ?? { total: 0, newsworthy: 0 };
      entry.total++;
      if (a.newsworthy) entry.newsworthy++;
      counts[a.source] = entry;
    }
    return counts;
  }

  // ----- Posts -----

  async createPost(input: NewPost): Promise<Post> {
    this.guard('createPost');
    const post: Post = {
      ...input,
      status: 'pending',
      attemptCount: 0,
      lastAttemptAt: null,
      externalReference: null,
      content: null,
      lastError: null,
    };
    this.posts.push(post);
    this.postOrder.set(post.id, this.postOrder.size);
    return post;
  }

  async updatePost(id: string, update: PostUpdate): Promise<Post> {
    this.guard('updatePost');
    const index = this.posts.findIndex((p) => p.id === id);
    if (index === -1) throw new StoreUnavailableError(`No post ${id}`);

    const updated: Post = { ...this.posts[index], ...update };
    if (
      updated.status === 'succeeded' &&
      this.posts.some(
        (p) =>
          p.id !== id &&
          p.status === 'succeeded' &&
          p.signature === updated.signature &&
          p.destination === updated.destination
      )
    ) {
      throw new ValidationError(`Post ${id}: a succeeded post already exists for this content and destination`);
    }

    this.posts[index] = updated;
    return updated;
  }

  async findPosts(filter: PostFilter): Promise<Post[]> {
    this.guard('findPosts');
    return this.posts
      .filter(
        (p) =>
          (filter.signature === undefined || p.signature === filter.signature) &&
          (filter.destination === undefined || p.destination === filter.destination) &&
          (filter.cycleType === undefined || p.cycleType === filter.cycleType) &&
          (filter.statuses === undefined || filter.statuses.includes(p.status)) &&
          (filter.activityId === undefined || p.activityIds.includes(filter.activityId))
      )
      .sort((a, b) => this.newestFirst(a, b));
  }

  async listPostsSince(since: string): Promise<Post[]> {
    this.guard('listPostsSince');
    return this.posts.filter((p) => p.createdAt >= since).sort((a, b) => this.newestFirst(a, b));
  }

  private newestFirst(a: Post, b: Post): number {
    if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? 1 : -1;
    return (this.postOrder.get(b.id) ?? 0) - (this.postOrder.get(a.id) ?? 0);
  }

  // ----- Schedule state -----

  async readScheduleState(): Promise<ScheduleState> {
    this.guard('readScheduleState');
    return { ...this.state, lastPostAt: { ...this.state.lastPostAt } };
  }

  async updateScheduleState(patch: ScheduleStatePatch): Promise<void> {
    this.guard('updateScheduleState');
    const { lastPostAt, ...rest } = patch;
    this.state = {
      ...this.state,
      ...rest,
      lastPostAt: { ...this.state.lastPostAt, ...lastPostAt },
    };
  }

  async ping(): Promise<void> {
    this.guard('ping');
  }
}
