/**
 * Herald — Posting Statistics
 *
 * Recent activity and post counts for the `stats` command.
 */

import type { ActivitySource, CycleType, Destination, Post, PostStatus, ScheduleState } from '../types';
import { ACTIVITY_SOURCES, DESTINATIONS } from '../types';
import type { ActivityStore, SourceCounts } from '../db/store';
import { DAY_MS } from '../lib/time';

// ============================================================
// TYPES
// ============================================================

export type StatusCounts = Record<PostStatus, number>;

export interface PostingStats {
  since: string;
  until: string;
  totalPosts: number;
  byDestination: Record<Destination, StatusCounts>;
  byCycle: Record<CycleType, number>;
  activities: Record<ActivitySource, SourceCounts>;
  schedule: ScheduleState;
}

function emptyStatusCounts(): StatusCounts {
  return { pending: 0, succeeded: 0, failed_retryable: 0, failed_permanent: 0 };
}

// ============================================================
// AGGREGATION
// ============================================================

export function countPosts(posts: Post[]): Pick<PostingStats, 'totalPosts' | 'byDestination' | 'byCycle'> {
  const byDestination: Record<Destination, StatusCounts> = {
    microblog_a: emptyStatusCounts(),
    microblog_b: emptyStatusCounts(),
    blog: emptyStatusCounts(),
  };
  const byCycle: Record<CycleType, number> = { daily: 0, weekly: 0 };

  for (const post of posts) {
    byDestination[post.destination][post.status]++;
    byCycle[post.cycleType]++;
  }

  return { totalPosts: posts.length, byDestination, byCycle };
}

export async function getPostingStats(store: ActivityStore, days: number, now: Date = new Date()): Promise<PostingStats> {
  const since = new Date(now.getTime() - days * DAY_MS).toISOString();

  const [posts, counts, schedule] = await Promise.all([
    store.listPostsSince(since),
    store.countActivitiesSince(since),
    store.readScheduleState(),
  ]);

  const empty: SourceCounts = { total: 0, newsworthy: 0 };
  const activities: Record<ActivitySource, SourceCounts> = {
    chat: counts.chat ?? empty,
    repository: counts.repository ?? empty,
    statistics: counts.statistics ?? empty,
  };

  return { since, until: now.toISOString(), ...countPosts(posts), activities, schedule };
}

// ============================================================
// OUTPUT
// ============================================================

export function formatStats(stats: PostingStats): string {
  const lines = [
    `Posting statistics ${stats.since.slice(0, 10)} to ${stats.until.slice(0, 10)}`,
    '',
    `Posts: ${stats.totalPosts} (daily ${stats.byCycle.daily}, weekly ${stats.byCycle.weekly})`,
  ];

  for (const destination of DESTINATIONS) {
    const c = stats.byDestination[destination];
    lines.push(
      `  ${destination}: ${c.succeeded} succeeded, ${c.failed_retryable} retryable, ` +
        `${c.failed_permanent} permanent, ${c.pending} pending`
    );
  }

  lines.push('', 'Activities:');
  for (const source of ACTIVITY_SOURCES) {
    const c = stats.activities[source];
    lines.push(`  ${source}: ${c.total} collected, ${c.newsworthy} newsworthy`);
  }

  const { schedule } = stats;
  lines.push(
    '',
    `Last daily run: ${schedule.lastDailyRunAt ?? 'never'}`,
    `Last weekly run: ${schedule.lastWeeklyRunAt ?? 'never'}`,
    `Posts counted on ${schedule.postsCountedOn ?? 'n/a'}: ${schedule.postsPublishedToday}`
  );

  return lines.join('\n');
}
