/**
 * Herald — Blog Destination
 *
 * Publishes a markdown post by committing it to a static-site repository
 * through the GitHub contents API. The external reference is the commit sha.
 *
 * Re-publishing the same title on the same day updates the existing file
 * instead of failing on the missing blob sha.
 */

import type { Octokit } from 'octokit';
import type { Publisher, PublishOutcome } from './base';
import { classifyThrown, statusOf } from './http';
import { ValidationError } from '../../lib/errors';
import { logger } from '../../lib/logger';

export interface BlogConfig {
  /** "owner/name" */
  repository: string;
  branch: string;
  postsDir: string;
  authorName: string;
  authorEmail: string;
  category?: string;
  now?: () => Date;
}

// ============================================================
// POST FILE
// ============================================================

export function extractTitle(content: string): { title: string; body: string } {
  const lines = content.split('\n');
  const first = lines[0]?.trim() ?? '';
  if (first.startsWith('#')) {
    return { title: first.replace(/^#+\s*/, '').trim(), body: lines.slice(1).join('\n').trim() };
  }
  return { title: 'Project Update', body: content.trim() };
}

export function slugify(title: string): string {
  return (
    title
      .toLowerCase()
      .normalize('NFKD')
      .replace(/[^a-z0-9]+/g, '-')
      .replace(/^-+|-+$/g, '')
      .slice(0, 60)
      .replace(/-+$/, '') || 'update'
  );
}

/**
 * Jekyll-style front matter followed by the body without its title line.
 */
export function buildPostFile(content: string, now: Date, config: Pick<BlogConfig, 'authorName' | 'category'>): string {
  const { title, body } = extractTitle(content);
  const timestamp = `${now.toISOString().slice(0, 19).replace('T', ' ')} +0000`;

  return [
    '---',
    'layout: post',
    `title: "${title.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`,
    `date: ${timestamp}`,
    `categories: [${config.category ?? 'weekly-update'}]`,
    `author: ${config.authorName}`,
    '---',
    '',
    body,
    '',
  ].join('\n');
}

export function postPath(content: string, now: Date, postsDir: string): string {
  const { title } = extractTitle(content);
  const dir = postsDir.replace(/\/+$/, '');
  return `${dir}/${now.toISOString().slice(0, 10)}-${slugify(title)}.md`;
}

// ============================================================
// PUBLISHER
// ============================================================

export class BlogPublisher implements Publisher {
  readonly destination = 'blog' as const;

  private readonly log = logger.child({ component: 'BlogPublisher' });
  private readonly owner: string;
  private readonly repo: string;
  private readonly now: () => Date;

  constructor(
    private readonly octokit: Octokit,
    private readonly config: BlogConfig
  ) {
    const [owner, repo, ...rest] = config.repository.split('/');
    if (!owner || !repo || rest.length > 0) {
      throw new ValidationError(`BLOG_REPO must look like "owner/name", got "${config.repository}"`);
    }
    this.owner = owner;
    this.repo = repo;
    this.now = config.now ?? (() => new Date());
  }

  async publish(content: string, signal?: AbortSignal): Promise<PublishOutcome> {
    const now = this.now();
    const path = postPath(content, now, this.config.postsDir);
    const { title } = extractTitle(content);

    try {
      const sha = await this.existingSha(path, signal);
      const { data } = await this.octokit.rest.repos.createOrUpdateFileContents({
        owner: this.owner,
        repo: this.repo,
        path,
        branch: this.config.branch,
        message: `Add post: ${title}`,
        content: Buffer.from(buildPostFile(content, now, this.config), 'utf-8').toString('base64'),
        sha,
        committer: { name: this.config.authorName, email: this.config.authorEmail },
        request: { signal },
      });

      const commitSha = data.commit.sha;
      if (!commitSha) {
        return { success: false, error: 'GitHub returned no commit sha' };
      }

      this.log.info('Blog post committed', { path, commit: commitSha });
      return { success: true, externalReference: commitSha };
    } catch (error) {
      throw classifyThrown('GitHub', error);
    }
  }

  async checkConnection(): Promise<boolean> {
    const { data } = await this.octokit.rest.repos.get({ owner: this.owner, repo: this.repo });
    return data.permissions?.push ?? false;
  }

  private async existingSha(path: string, signal?: AbortSignal): Promise<string | undefined> {
    try {
      const { data } = await this.octokit.rest.repos.getContent({
        owner: this.owner,
        repo: this.repo,
        path,
        ref: this.config.branch,
        request: { signal },
      });
      return Array.isArray(data) ? undefined : data.sha;
    } catch (error) {
      if (statusOf(error) === 404) return undefined;
      throw error;
    }
  }
}
