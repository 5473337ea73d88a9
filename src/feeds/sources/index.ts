/**
 * Herald — Source Registry
 *
 * Builds the adapters whose credentials are configured. A source without
 * credentials is left out of the collection pass rather than failing it.
 */

import type { AppConfig } from '../../lib/config';
import { getOctokit } from '../../lib/github';
import { logger } from '../../lib/logger';
import type { SourceAdapters } from '../base';
import { MatrixChatSource } from './chat';
import { GitHubRepositorySource } from './repository';
import { StatisticsSource } from './statistics';

export { MatrixChatSource, type ChatSourceOptions } from './chat';
export { GitHubRepositorySource } from './repository';
export { StatisticsSource, flattenMetrics, type StatisticsSourceOptions } from './statistics';

export function createSources(config: AppConfig): SourceAdapters {
  const { env } = config;
  const sources: SourceAdapters = {};

  if (env.MATRIX_ACCESS_TOKEN && env.MATRIX_ROOM_ID) {
    sources.chat = new MatrixChatSource({
      homeserver: env.MATRIX_HOMESERVER,
      accessToken: env.MATRIX_ACCESS_TOKEN,
      roomId: env.MATRIX_ROOM_ID,
    });
  }

  if (env.GITHUB_TOKEN && env.GITHUB_ORG) {
    sources.repository = new GitHubRepositorySource(getOctokit(config), env.GITHUB_ORG);
  }

  if (env.STATS_URL) {
    sources.statistics = new StatisticsSource({ url: env.STATS_URL, timezone: config.schedule.timezone });
  }

  const missing = (['chat', 'repository', 'statistics'] as const).filter((s) => !sources[s]);
  if (missing.length > 0) {
    logger.info('Sources not configured', { missing });
  }

  return sources;
}
