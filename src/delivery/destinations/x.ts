/**
 * Herald — X Destination (microblog_b)
 *
 * Posts through the v2 API with an OAuth 2.0 user-context token.
 */

import { z } from 'zod';
import type { Publisher, PublishOutcome } from './base';
import { postJson } from './http';
import { logger } from '../../lib/logger';

const API_BASE = 'https://api.twitter.com/2';

const TweetResponseSchema = z.object({
  data: z.object({ id: z.string() }),
});

export interface XConfig {
  accessToken: string;
  limit: number;
}

export class XPublisher implements Publisher {
  readonly destination = 'microblog_b' as const;

  private readonly log = logger.child({ component: 'XPublisher' });

  constructor(private readonly config: XConfig) {}

  async publish(content: string, signal?: AbortSignal): Promise<PublishOutcome> {
    const body = await postJson('X', `${API_BASE}/tweets`, {
      headers: { Authorization: `Bearer ${this.config.accessToken}` },
      body: { text: content },
      signal,
      limit: this.config.limit,
    });

    const parsed = TweetResponseSchema.safeParse(body);
    if (!parsed.success) {
      return { success: false, error: 'X API returned no data' };
    }

    this.log.info('Post published', { id: parsed.data.data.id });
    return { success: true, externalReference: parsed.data.data.id };
  }

  async checkConnection(): Promise<boolean> {
    const res = await fetch(`${API_BASE}/users/me`, {
      headers: { Authorization: `Bearer ${this.config.accessToken}` },
    });
    return res.ok;
  }
}
