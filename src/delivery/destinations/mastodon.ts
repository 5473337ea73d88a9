/**
 * Herald — Mastodon Destination (microblog_a)
 */

import { z } from 'zod';
import type { Publisher, PublishOutcome } from './base';
import { postJson } from './http';
import { logger } from '../../lib/logger';

const StatusResponseSchema = z.object({
  id: z.string(),
  url: z.string().nullable().optional(),
});

export interface MastodonConfig {
  instanceUrl: string;
  accessToken: string;
  limit: number;
  visibility?: 'public' | 'unlisted';
}

export class MastodonPublisher implements Publisher {
  readonly destination = 'microblog_a' as const;

  private readonly log = logger.child({ component: 'MastodonPublisher' });
  private readonly baseUrl: string;

  constructor(private readonly config: MastodonConfig) {
    this.baseUrl = config.instanceUrl.replace(/\/$/, '');
  }

  async publish(content: string, signal?: AbortSignal): Promise<PublishOutcome> {
    const body = await postJson('Mastodon', `${this.baseUrl}/api/v1/statuses`, {
      headers: { Authorization: `Bearer ${this.config.accessToken}` },
      body: { status: content, visibility: this.config.visibility ?? 'public' },
      signal,
      limit: this.config.limit,
    });

    const parsed = StatusResponseSchema.safeParse(body);
    if (!parsed.success) {
      return { success: false, error: 'Mastodon returned no status id' };
    }

    this.log.info('Status published', { id: parsed.data.id });
    return { success: true, externalReference: parsed.data.url ?? parsed.data.id };
  }

  async checkConnection(): Promise<boolean> {
    const res = await fetch(`${this.baseUrl}/api/v1/accounts/verify_credentials`, {
      headers: { Authorization: `Bearer ${this.config.accessToken}` },
    });
    return res.ok;
  }
}
