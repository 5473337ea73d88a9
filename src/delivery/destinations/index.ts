/**
 * Herald — Destination Registry
 *
 * Builds the adapters whose credentials are configured. Cycles only publish
 * to destinations present here.
 */

import type { AppConfig } from '../../lib/config';
import { getOctokit } from '../../lib/github';
import { logger } from '../../lib/logger';
import type { Publishers } from './base';
import { BlogPublisher } from './blog';
import { MastodonPublisher } from './mastodon';
import { XPublisher } from './x';

export { BlogPublisher, buildPostFile, extractTitle, postPath, slugify, type BlogConfig } from './blog';
export { MastodonPublisher, type MastodonConfig } from './mastodon';
export { XPublisher, type XConfig } from './x';
export { classifyHttpFailure, classifyThrown, isRetryableStatus, postJson, statusOf } from './http';
export type { Publisher, Publishers, PublishOutcome } from './base';

export function createPublishers(config: AppConfig): Publishers {
  const { env } = config;
  const publishers: Publishers = {};

  if (env.MASTODON_INSTANCE_URL && env.MASTODON_ACCESS_TOKEN) {
    publishers.microblog_a = new MastodonPublisher({
      instanceUrl: env.MASTODON_INSTANCE_URL,
      accessToken: env.MASTODON_ACCESS_TOKEN,
      limit: config.format.limits.microblog_a,
    });
  }

  if (env.X_ACCESS_TOKEN) {
    publishers.microblog_b = new XPublisher({
      accessToken: env.X_ACCESS_TOKEN,
      limit: config.format.limits.microblog_b,
    });
  }

  if (env.BLOG_REPO && env.GITHUB_TOKEN) {
    publishers.blog = new BlogPublisher(getOctokit(config), {
      repository: env.BLOG_REPO,
      branch: env.BLOG_BRANCH,
      postsDir: env.BLOG_POSTS_DIR,
      authorName: env.BLOG_AUTHOR_NAME,
      authorEmail: env.BLOG_AUTHOR_EMAIL,
    });
  }

  const missing = (['microblog_a', 'microblog_b', 'blog'] as const).filter((d) => !publishers[d]);
  if (missing.length > 0) {
    logger.info('Destinations not configured', { missing });
  }

  return publishers;
}
