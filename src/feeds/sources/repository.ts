/**
 * Herald — Repository Event Source
 *
 * Collects events from every non-archived repository of a GitHub
 * organisation: releases, closed pull requests, issues, commits on the
 * default branch, and pull request review comments.
 *
 * Review comments carry the branch of their pull request so the content
 * filter can drop discussion on feature branches.
 */

import { Octokit } from 'octokit';
import type { RawActivity } from '../../types';
import { firstLine, type SourceAdapter } from '../base';
import { logger } from '../../lib/logger';
import { toErrorMessage } from '../../lib/errors';

const PER_PAGE = 30;

// ============================================================
// MAPPERS
// ============================================================

export interface RepoRef {
  owner: string;
  name: string;
  defaultBranch: string;
}

export interface ReleaseLike {
  id: number;
  tag_name: string;
  name: string | null;
  body?: string | null;
  html_url: string;
  published_at: string | null;
  author?: { login: string } | null;
}

export interface PullLike {
  number: number;
  title: string;
  body: string | null;
  html_url: string;
  merged_at: string | null;
  state: string;
  updated_at: string;
  user: { login: string } | null;
  head: { ref: string };
}

export interface IssueLike {
  number: number;
  title: string;
  body?: string | null;
  html_url: string;
  state: string;
  updated_at: string;
  user: { login: string } | null;
  labels: Array<string | { name?: string }>;
  pull_request?: unknown;
}

export interface CommitLike {
  sha: string;
  html_url: string;
  commit: { message: string; author: { date?: string } | null };
  author: { login: string } | Record<string, never> | null;
}

export interface ReviewCommentLike {
  id: number;
  body: string;
  html_url: string;
  created_at: string;
  pull_request_url: string;
  user: { login: string } | null;
}

export function releaseToActivity(repo: RepoRef, release: ReleaseLike): RawActivity {
  const label = release.name || release.tag_name;
  return {
    source: 'repository',
    sourceNativeId: `release:${repo.owner}/${repo.name}:${release.id}`,
    payload: {
      kind: 'release',
      title: `${repo.name} ${label} released`,
      text: release.body ?? '',
      actor: release.author?.login,
      link: release.html_url,
      occurredAt: release.published_at ?? undefined,
    },
  };
}

export function pullToActivity(repo: RepoRef, pull: PullLike): RawActivity {
  return {
    source: 'repository',
    sourceNativeId: `pull:${repo.owner}/${repo.name}:${pull.number}`,
    payload: {
      kind: 'pull_request',
      title: `PR #${pull.number}: ${pull.title}`,
      text: pull.body ?? `Pull request in ${repo.name}`,
      actor: pull.user?.login,
      link: pull.html_url,
      occurredAt: pull.merged_at ?? pull.updated_at,
      branch: pull.head.ref,
      defaultBranch: repo.defaultBranch,
      state: pull.state,
      merged: pull.merged_at !== null,
    },
  };
}

export function issueToActivity(repo: RepoRef, issue: IssueLike): RawActivity {
  const labels = issue.labels
    .map((label) => (typeof label === 'string' ? label : label.name ?? ''))
    .filter(Boolean);

  return {
    source: 'repository',
    sourceNativeId: `issue:${repo.owner}/${repo.name}:${issue.number}`,
    payload: {
      kind: 'issue',
      title: `Issue #${issue.number}: ${issue.title}`,
      text: issue.body ?? `Issue in ${repo.name}`,
      actor: issue.user?.login,
      link: issue.html_url,
      occurredAt: issue.updated_at,
      state: issue.state,
      labels,
    },
  };
}

export function commitToActivity(repo: RepoRef, commit: CommitLike): RawActivity {
  return {
    source: 'repository',
    sourceNativeId: `commit:${repo.owner}/${repo.name}:${commit.sha}`,
    payload: {
      kind: 'commit',
      title: firstLine(commit.commit.message) || `Commit ${commit.sha.slice(0, 7)}`,
      text: commit.commit.message,
      actor: commit.author?.login,
      link: commit.html_url,
      occurredAt: commit.commit.author?.date,
      branch: repo.defaultBranch,
      defaultBranch: repo.defaultBranch,
    },
  };
}

export function reviewCommentToActivity(
  repo: RepoRef,
  comment: ReviewCommentLike,
  branch: string | undefined
): RawActivity {
  const pullNumber = comment.pull_request_url.split('/').pop() ?? '';
  return {
    source: 'repository',
    sourceNativeId: `comment:${repo.owner}/${repo.name}:${comment.id}`,
    payload: {
      kind: 'comment',
      title: `Review comment on ${repo.name} #${pullNumber}`,
      text: comment.body,
      actor: comment.user?.login,
      link: comment.html_url,
      occurredAt: comment.created_at,
      branch,
      defaultBranch: repo.defaultBranch,
    },
  };
}

// ============================================================
// SOURCE
// ============================================================

export class GitHubRepositorySource implements SourceAdapter {
  readonly source = 'repository' as const;

  private readonly log = logger.child({ component: 'GitHubRepositorySource' });

  constructor(
    private readonly octokit: Octokit,
    private readonly org: string
  ) {}

  async collect(since: Date): Promise<RawActivity[]> {
    const { data: repos } = await this.octokit.rest.repos.listForOrg({
      org: this.org,
      sort: 'pushed',
      per_page: PER_PAGE,
    });

    const activities: RawActivity[] = [];

    for (const repo of repos) {
      if (repo.archived) continue;

      const ref: RepoRef = {
        owner: this.org,
        name: repo.name,
        defaultBranch: repo.default_branch ?? 'main',
      };

      // One failing repository must not hide the others
      try {
        activities.push(...(await this.collectRepo(ref, since)));
      } catch (error) {
        this.log.warn('Repository collection failed', { repo: repo.name, error: toErrorMessage(error) });
      }
    }

    return activities;
  }

  private async collectRepo(repo: RepoRef, since: Date): Promise<RawActivity[]> {
    const owner = repo.owner;
    const sinceIso = since.toISOString();
    const isRecent = (iso: string | null | undefined) => iso != null && new Date(iso) >= since;

    const [releases, pulls, issues, commits, comments] = await Promise.all([
      this.octokit.rest.repos.listReleases({ owner, repo: repo.name, per_page: PER_PAGE }),
      this.octokit.rest.pulls.list({
        owner,
        repo: repo.name,
        state: 'all',
        sort: 'updated',
        direction: 'desc',
        per_page: PER_PAGE,
      }),
      this.octokit.rest.issues.listForRepo({ owner, repo: repo.name, state: 'all', since: sinceIso, per_page: PER_PAGE }),
      this.octokit.rest.repos.listCommits({ owner, repo: repo.name, sha: repo.defaultBranch, since: sinceIso, per_page: PER_PAGE }),
      this.octokit.rest.pulls.listReviewCommentsForRepo({ owner, repo: repo.name, since: sinceIso, per_page: PER_PAGE }),
    ]);

    const branchByPull = new Map<string, string>();
    for (const pull of pulls.data) {
      branchByPull.set(String(pull.number), pull.head.ref);
    }

    return [
      ...releases.data.filter((r) => isRecent(r.published_at)).map((r) => releaseToActivity(repo, r)),
      ...pulls.data.filter((p) => isRecent(p.updated_at)).map((p) => pullToActivity(repo, p)),
      // The issues endpoint also returns pull requests
      ...issues.data.filter((i) => !i.pull_request).map((i) => issueToActivity(repo, i)),
      ...commits.data.map((c) => commitToActivity(repo, c)),
      ...comments.data.map((c) =>
        reviewCommentToActivity(repo, c, branchByPull.get(c.pull_request_url.split('/').pop() ?? ''))
      ),
    ];
  }
}
