/**
 * Herald — Content Formatter
 *
 * Renders a candidate for one destination. Microblogs get an emoji, the
 * cleaned title, the link and a few hashtags, cut to the platform limit.
 * The blog gets markdown and has no limit.
 *
 * The shortened rendering is what the coordinator asks for after a
 * destination rejects the first one as too long: no hashtags and a tighter
 * limit.
 */

import type { Activity, ActivityKind, Candidate, Destination } from '../types';
import type { FormatConfig } from '../lib/config';

// ============================================================
// CONSTANTS
// ============================================================

export const KIND_EMOJI: Record<ActivityKind, string> = {
  message: '💬',
  pull_request: '🔀',
  issue: '🐛',
  commit: '📝',
  release: '🚀',
  snapshot: '📊',
  comment: '💭',
};

const KIND_HASHTAGS: Record<ActivityKind, string[]> = {
  message: ['#community'],
  pull_request: ['#development', '#pullrequest'],
  issue: ['#development', '#issue'],
  commit: ['#development', '#commit'],
  release: ['#release', '#update'],
  snapshot: ['#stats', '#data'],
  comment: ['#development', '#codereview'],
};

const KIND_SOURCE_NAME: Record<ActivityKind, string> = {
  message: 'Matrix',
  pull_request: 'GitHub',
  issue: 'GitHub',
  commit: 'GitHub',
  release: 'GitHub',
  comment: 'GitHub',
  snapshot: 'the dashboard',
};

const MAX_HASHTAGS: Record<Destination, number> = {
  microblog_a: 5,
  microblog_b: 2,
  blog: 0,
};

/** Share of the platform limit the shortened rendering may use */
const SHORTENED_RATIO = 0.8;

// ============================================================
// TEXT HELPERS
// ============================================================

/** Length in code points, which is what the microblog limits count. */
export function textLength(text: string): number {
  return Array.from(text).length;
}

/**
 * Collapse whitespace, drop markdown emphasis and the "PR #12:" style
 * prefixes the repository source adds.
 */
export function cleanTitle(title: string): string {
  return title
    .trim()
    .replace(/\s+/g, ' ')
    .replace(/[*_`]/g, '')
    .replace(/^(PR #\d+:|Issue #\d+:|Commit:)\s*/, '');
}

/**
 * Cut to `max` code points ending in "...". Cuts at the last space when
 * that keeps more than 80% of the limit.
 */
export function truncate(text: string, max: number): string {
  const chars = Array.from(text);
  if (chars.length <= max) return text;

  let kept = chars.slice(0, Math.max(0, max - 3));
  const lastSpace = kept.lastIndexOf(' ');
  if (lastSpace > max * 0.8) {
    kept = kept.slice(0, lastSpace);
  }

  return `${kept.join('')}...`;
}

export function hashtagsFor(kind: ActivityKind, config: FormatConfig, max: number): string[] {
  const [primary, ...rest] = config.hashtags;
  const tags = [...(primary ? [primary] : []), ...KIND_HASHTAGS[kind], ...rest];
  return [...new Set(tags)].slice(0, max);
}

// ============================================================
// RENDERERS
// ============================================================

export interface RenderOptions {
  shortened?: boolean;
}

export function destinationLimit(destination: Destination, config: FormatConfig): number | null {
  return destination === 'blog' ? null : config.limits[destination];
}

export function renderActivityMarkdown(activity: Activity): string {
  const { payload } = activity;
  const title = cleanTitle(payload.title);
  const parts = [`### ${title}`];

  if (payload.text && payload.text.trim() !== title) {
    parts.push(payload.text.trim());
  }
  if (payload.actor) {
    parts.push(`*By: ${payload.actor}*`);
  }
  if (payload.link) {
    parts.push(`[View on ${KIND_SOURCE_NAME[payload.kind]}](${payload.link})`);
  }

  return parts.join('\n\n');
}

/**
 * Join the headline and the tail, shortening only the headline so the link
 * survives. Drops the tail when even the shortest one leaves no room.
 */
function fitHeadline(headline: string, tails: string[], separator: string, limit: number): string {
  const [first] = tails;
  if (first === undefined) return truncate(headline, limit);

  const whole = `${headline}${separator}${first}`;
  if (textLength(whole) <= limit) return whole;

  for (const tail of tails) {
    const room = limit - textLength(tail) - textLength(separator);
    if (room > 3) return `${truncate(headline, room)}${separator}${tail}`;
  }
  return truncate(headline, limit);
}

function renderMicroblog(
  activity: Activity,
  destination: 'microblog_a' | 'microblog_b',
  config: FormatConfig,
  shortened: boolean
): string {
  const { payload } = activity;
  const limit = config.limits[destination];
  const headline = `${KIND_EMOJI[payload.kind]} ${cleanTitle(payload.title)}`;

  if (shortened) {
    const budget = Math.floor(limit * SHORTENED_RATIO);
    return fitHeadline(headline, payload.link ? [payload.link] : [], ' ', budget);
  }

  const tags = hashtagsFor(payload.kind, config, MAX_HASHTAGS[destination]).join(' ');
  const separator = destination === 'microblog_a' ? '\n\n' : ' ';
  const link = payload.link ? (destination === 'microblog_a' ? `🔗 ${payload.link}` : payload.link) : '';

  // Hashtags go before the link does
  const tails = [[link, tags].filter(Boolean).join(separator), link].filter(Boolean);
  return fitHeadline(headline, [...new Set(tails)], separator, limit);
}

/**
 * Render a candidate for a destination.
 */
export function renderCandidate(
  candidate: Candidate,
  destination: Destination,
  config: FormatConfig,
  options: RenderOptions = {}
): string {
  const shortened = options.shortened ?? false;

  if (candidate.kind === 'digest') {
    const limit = destinationLimit(destination, config);
    if (limit === null) return candidate.body;
    return truncate(candidate.body, shortened ? Math.floor(limit * SHORTENED_RATIO) : limit);
  }

  if (destination === 'blog') {
    return renderActivityMarkdown(candidate.activity);
  }

  return renderMicroblog(candidate.activity, destination, config, shortened);
}
