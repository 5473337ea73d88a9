/**
 * Herald — Weekly Digest
 *
 * The deterministic digest used when the summarizer is unavailable, and the
 * prompt the summarizer is given. Both group the window's activities by kind.
 */

import type { Activity, ActivityKind, ReportingWindow } from '../types';
import { KIND_EMOJI } from './formatter';

// ============================================================
// GROUPING
// ============================================================

const SECTIONS: Array<{ kind: ActivityKind; title: string }> = [
  { kind: 'release', title: 'Releases' },
  { kind: 'snapshot', title: 'Statistics' },
  { kind: 'message', title: 'Community Updates' },
  { kind: 'pull_request', title: 'Pull Requests' },
  { kind: 'issue', title: 'Issues' },
  { kind: 'commit', title: 'Development Activity' },
  { kind: 'comment', title: 'Code Review' },
];

const ITEMS_PER_SECTION = 5;
const PROMPT_TEXT_LIMIT = 200;

export function groupByKind(activities: Activity[]): Map<ActivityKind, Activity[]> {
  const groups = new Map<ActivityKind, Activity[]>();
  for (const activity of activities) {
    const group = groups.get(activity.payload.kind) ?? [];
    group.push(activity);
    groups.set(activity.payload.kind, group);
  }
  return groups;
}

// ============================================================
// DATES
// ============================================================

/**
 * "January 05 - January 12, 2026" in the given time zone.
 */
export function formatWindow(window: ReportingWindow, timeZone: string): string {
  const start = new Intl.DateTimeFormat('en-US', { timeZone, month: 'long', day: '2-digit' }).format(
    new Date(window.start)
  );
  const end = new Intl.DateTimeFormat('en-US', {
    timeZone,
    month: 'long',
    day: '2-digit',
    year: 'numeric',
  }).format(new Date(window.end));
  return `${start} - ${end}`;
}

// ============================================================
// DIGEST
// ============================================================

export interface DigestOptions {
  projectName: string;
  timeZone: string;
}

export function buildDigest(activities: Activity[], window: ReportingWindow, options: DigestOptions): string {
  const heading = `# Weekly Update: ${formatWindow(window, options.timeZone)}`;

  if (activities.length === 0) {
    return [heading, '', `This was a quiet week for ${options.projectName}. Stay tuned for what comes next.`, ''].join(
      '\n'
    );
  }

  const noun = activities.length === 1 ? 'activity' : 'activities';
  const lines = [heading, '', `This week we had ${activities.length} ${noun} across the ${options.projectName} project:`, ''];
  const groups = groupByKind(activities);

  for (const { kind, title } of SECTIONS) {
    const group = groups.get(kind);
    if (!group) continue;

    lines.push(`## ${KIND_EMOJI[kind]} ${title}`, '');
    for (const activity of group.slice(0, ITEMS_PER_SECTION)) {
      lines.push(`- ${activity.payload.title}`);
      if (activity.payload.link) {
        lines.push(`  - [View details](${activity.payload.link})`);
      }
    }
    if (group.length > ITEMS_PER_SECTION) {
      lines.push(`- ...and ${group.length - ITEMS_PER_SECTION} more`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

// ============================================================
// SUMMARIZER PROMPT
// ============================================================

export function describeActivity(activity: Activity): string {
  const { payload } = activity;
  const text = payload.text.length > PROMPT_TEXT_LIMIT ? `${payload.text.slice(0, PROMPT_TEXT_LIMIT)}...` : payload.text;
  const fields = [
    `Type: ${payload.kind}`,
    `Title: ${payload.title}`,
    `Content: ${text.replace(/\s+/g, ' ')}`,
    `Author: ${payload.actor ?? 'Unknown'}`,
    `Date: ${payload.occurredAt ?? activity.observedAt}`,
  ];
  if (payload.link) fields.push(`URL: ${payload.link}`);
  return fields.join(' | ');
}

export function buildSummarySystemPrompt(projectName: string): string {
  return `You write the weekly update blog post for ${projectName}, an open-source project.
Write in markdown with an engaging title as the first line ("# ...").
Group related activities, lead with releases and major features, then community growth,
development progress and statistical milestones. Keep the tone friendly and approachable
for technical and non-technical readers. End with a short forward-looking note.
Only mention activities from the list you are given.`;
}

export function buildSummaryPrompt(activities: Activity[], window: ReportingWindow, options: DigestOptions): string {
  return `Summarize the activities from ${formatWindow(window, options.timeZone)}.

Activities (${activities.length}):
${activities.map(describeActivity).join('\n')}`;
}
