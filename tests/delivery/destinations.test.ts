/**
 * Tests for the destination adapters
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Octokit } from 'octokit';
import {
  BlogPublisher,
  MastodonPublisher,
  XPublisher,
  buildPostFile,
  classifyHttpFailure,
  classifyThrown,
  createPublishers,
  extractTitle,
  postPath,
  slugify,
} from '../../src/delivery/destinations';
import {
  ContentTooLongError,
  PublishPermanentError,
  PublishRetryableError,
  ValidationError,
} from '../../src/lib/errors';
import { testConfig } from '../helpers/fixtures';

const mockFetch = vi.fn();
global.fetch = mockFetch;

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

beforeEach(() => {
  mockFetch.mockReset();
});

describe('classifyHttpFailure', () => {
  it('treats 429 and 5xx as retryable', () => {
    expect(classifyHttpFailure('X', 429, 'slow down')).toBeInstanceOf(PublishRetryableError);
    expect(classifyHttpFailure('X', 502, '')).toBeInstanceOf(PublishRetryableError);
  });

  it('recognises length rejections', () => {
    const error = classifyHttpFailure('X', 403, 'Your Tweet text is too long.', 280);
    expect(error).toBeInstanceOf(ContentTooLongError);
    expect(error.message).toBe('X error: 403 - Your Tweet text is too long.');
  });

  it('treats other client errors as permanent', () => {
    expect(classifyHttpFailure('X', 401, 'Unauthorized')).toBeInstanceOf(PublishPermanentError);
    expect(classifyHttpFailure('X', 422, 'Duplicate content')).toBeInstanceOf(PublishPermanentError);
  });
});

describe('classifyThrown', () => {
  it('passes abort errors through', () => {
    const abort = new Error('aborted');
    abort.name = 'AbortError';
    expect(classifyThrown('GitHub', abort)).toBe(abort);
  });

  it('treats errors without a status as network faults', () => {
    const error = classifyThrown('GitHub', new TypeError('fetch failed'));
    expect(error).toBeInstanceOf(PublishRetryableError);
  });

  it('classifies client errors by their status', () => {
    const error = Object.assign(new Error('Bad credentials'), { status: 401 });
    expect(classifyThrown('GitHub', error)).toBeInstanceOf(PublishPermanentError);
  });
});

describe('MastodonPublisher', () => {
  const publisher = new MastodonPublisher({
    instanceUrl: 'https://social.example.org/',
    accessToken: 'test-token',
    limit: 500,
  });

  it('posts a public status and returns its url', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ id: '1', url: 'https://social.example.org/@acme/1' }));

    const outcome = await publisher.publish('Hello');

    expect(outcome).toEqual({ success: true, externalReference: 'https://social.example.org/@acme/1' });
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://social.example.org/api/v1/statuses');
    expect(init.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-token' });
    expect(JSON.parse(init.body)).toEqual({ status: 'Hello', visibility: 'public' });
  });

  it('reports a response without an id as a failed attempt', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({}));

    expect(await publisher.publish('Hello')).toEqual({ success: false, error: 'Mastodon returned no status id' });
  });

  it('maps server errors to retryable', async () => {
    mockFetch.mockResolvedValueOnce(new Response('unavailable', { status: 503 }));

    await expect(publisher.publish('Hello')).rejects.toThrow(
      new PublishRetryableError('Mastodon error: 503 - unavailable')
    );
  });

  it('maps the character limit rejection to ContentTooLong', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ error: 'Validation failed: Text character limit of 500 exceeded' }, 422)
    );

    await expect(publisher.publish('x'.repeat(600))).rejects.toBeInstanceOf(ContentTooLongError);
  });

  it('maps rejected credentials to permanent', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ error: 'The access token is invalid' }, 401));

    await expect(publisher.publish('Hello')).rejects.toBeInstanceOf(PublishPermanentError);
  });

  it('maps network faults to retryable', async () => {
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

    await expect(publisher.publish('Hello')).rejects.toThrow('Mastodon request failed: fetch failed');
  });
});

describe('XPublisher', () => {
  const publisher = new XPublisher({ accessToken: 'test-token', limit: 280 });

  it('returns the post id', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ data: { id: '99', text: 'Hello' } }, 201));

    expect(await publisher.publish('Hello')).toEqual({ success: true, externalReference: '99' });
    expect(mockFetch.mock.calls[0][0]).toBe('https://api.twitter.com/2/tweets');
  });

  it('maps rate limiting to retryable', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ title: 'Too Many Requests' }, 429));

    await expect(publisher.publish('Hello')).rejects.toBeInstanceOf(PublishRetryableError);
  });
});

describe('blog post file', () => {
  const now = new Date('2026-03-08T09:30:00.000Z');
  const content = '# Weekly Update: "Big" week\n\nBody text';

  it('takes the title from a leading heading', () => {
    expect(extractTitle(content)).toEqual({ title: 'Weekly Update: "Big" week', body: 'Body text' });
    expect(extractTitle('No heading here')).toEqual({ title: 'Project Update', body: 'No heading here' });
  });

  it('slugifies titles', () => {
    expect(slugify('Weekly Update: "Big" week')).toBe('weekly-update-big-week');
    expect(slugify('!!!')).toBe('update');
  });

  it('writes front matter before the body', () => {
    expect(buildPostFile(content, now, { authorName: 'Herald Bot' })).toBe(
      [
        '---',
        'layout: post',
        'title: "Weekly Update: \\"Big\\" week"',
        'date: 2026-03-08 09:30:00 +0000',
        'categories: [weekly-update]',
        'author: Herald Bot',
        '---',
        '',
        'Body text',
        '',
      ].join('\n')
    );
  });

  it('names the file by date and slug', () => {
    expect(postPath(content, now, 'content/posts/')).toBe('content/posts/2026-03-08-weekly-update-big-week.md');
  });
});

describe('BlogPublisher', () => {
  const now = new Date('2026-03-08T09:30:00.000Z');
  const config = {
    repository: 'acme/blog',
    branch: 'main',
    postsDir: 'content/posts',
    authorName: 'Herald Bot',
    authorEmail: 'bot@example.org',
    now: () => now,
  };

  it('rejects a malformed repository name', () => {
    expect(() => new BlogPublisher(new Octokit({ auth: 'test-token' }), { ...config, repository: 'blog' })).toThrow(
      ValidationError
    );
  });

  it('commits a new post and returns the commit sha', async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse({ message: 'Not Found' }, 404))
      .mockResolvedValueOnce(jsonResponse({ content: { sha: 'blob1' }, commit: { sha: 'abc123' } }, 201));
    const publisher = new BlogPublisher(new Octokit({ auth: 'test-token' }), config);
    const content = '# Weekly Update\n\nBody text';

    const outcome = await publisher.publish(content);

    expect(outcome).toEqual({ success: true, externalReference: 'abc123' });
    const body = JSON.parse(mockFetch.mock.calls[1][1].body);
    expect(body.message).toBe('Add post: Weekly Update');
    expect(body.branch).toBe('main');
    expect(body.sha).toBeUndefined();
    expect(Buffer.from(body.content, 'base64').toString('utf-8')).toBe(
      buildPostFile(content, now, { authorName: 'Herald Bot' })
    );
  });
});

describe('createPublishers', () => {
  it('builds only the destinations with credentials', () => {
    const publishers = createPublishers(
      testConfig({ MASTODON_INSTANCE_URL: 'https://social.example.org', MASTODON_ACCESS_TOKEN: 'test-token' })
    );

    expect(Object.keys(publishers)).toEqual(['microblog_a']);
  });
});
