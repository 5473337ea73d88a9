/**
 * Herald — Content Filter
 *
 * Source-specific newsworthiness rules. Classification writes only the
 * newsworthy flag and may be re-run; an activity already published as
 * newsworthy is never reclassified.
 */

import type { Activity, ActivityPayload } from '../types';
import type { ActivityStore } from '../db/store';
import type { FilterConfig } from '../lib/config';
import { ClassificationError, StoreUnavailableError, toErrorMessage } from '../lib/errors';
import { logger } from '../lib/logger';

const log = logger.child({ component: 'ContentFilter' });

const NEWSWORTHY_ISSUE_LABELS = ['bug', 'enhancement', 'feature'];

// ============================================================
// RULES
// ============================================================

export function isNewsworthyChat(payload: ActivityPayload, config: FilterConfig): boolean {
  if (payload.actor && config.chatTrustedSenders.includes(payload.actor)) {
    return true;
  }

  const text = payload.text.trim();
  if (text.length < config.chatMinLength) return false;
  if (config.chatNoisePatterns.some((pattern) => pattern.test(text))) return false;

  if (config.chatKeywords.length === 0) return true;
  const lower = text.toLowerCase();
  return config.chatKeywords.some((keyword) => lower.includes(keyword));
}

export function isNewsworthyRepositoryEvent(payload: ActivityPayload): boolean {
  const onDefaultBranch =
    payload.branch === undefined || payload.defaultBranch === undefined || payload.branch === payload.defaultBranch;

  switch (payload.kind) {
    case 'release':
      return true;
    case 'pull_request':
      return payload.merged === true;
    case 'issue': {
      const labels = (payload.labels ?? []).map((l) => l.toLowerCase());
      return payload.state === 'closed' || labels.some((l) => NEWSWORTHY_ISSUE_LABELS.includes(l));
    }
    case 'commit':
    case 'comment':
      return onDefaultBranch;
    default:
      return false;
  }
}

/**
 * A snapshot is newsworthy when any tracked metric moved by more than the
 * relative threshold since the previous newsworthy snapshot.
 */
export function hasSignificantChange(
  current: Record<string, number> | undefined,
  previous: Record<string, number> | undefined,
  config: FilterConfig
): boolean {
  if (!current) return false;

  const tracked = config.statsTrackedMetrics.filter((metric) => metric in current);
  if (tracked.length === 0) return false;
  if (!previous) return true;

  return tracked.some((metric) => {
    const now = current[metric];
    const before = previous[metric];
    if (before === undefined) return true;
    if (before === 0) return now !== 0;
    return Math.abs(now - before) / Math.abs(before) > config.statsChangeThreshold;
  });
}

// ============================================================
// FILTER
// ============================================================

export class ContentFilter {
  constructor(
    private readonly store: ActivityStore,
    private readonly config: FilterConfig
  ) {}

  /**
   * Set the newsworthy flag. Returns the same activity identity.
   */
  async classify(activity: Activity): Promise<Activity> {
    if (activity.newsworthy === true && (await this.isConsumed(activity))) {
      return activity;
    }

    let newsworthy: boolean;
    try {
      newsworthy = await this.evaluate(activity);
    } catch (error) {
      if (error instanceof StoreUnavailableError) throw error;
      throw new ClassificationError(activity.id, `Classification failed: ${toErrorMessage(error)}`, {
        cause: error,
      });
    }

    if (activity.newsworthy === newsworthy) return activity;

    const updated = await this.store.setNewsworthy(activity.id, newsworthy);
    log.debug('Activity classified', { activityId: activity.id, source: activity.source, newsworthy });
    return updated;
  }

  private async isConsumed(activity: Activity): Promise<boolean> {
    const posts = await this.store.findPosts({ activityId: activity.id, statuses: ['succeeded'] });
    return posts.length > 0;
  }

  private async evaluate(activity: Activity): Promise<boolean> {
    switch (activity.source) {
      case 'chat':
        return isNewsworthyChat(activity.payload, this.config);
      case 'repository':
        return isNewsworthyRepositoryEvent(activity.payload);
      case 'statistics': {
        const previous = await this.store.findLatestNewsworthy('statistics', activity.id);
        return hasSignificantChange(activity.payload.metrics, previous?.payload.metrics, this.config);
      }
    }
  }
}
