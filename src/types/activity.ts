/**
 * Herald — Activity Types
 *
 * Activities are observed project events (chat messages, repository events,
 * statistics snapshots). Raw activities come from source adapters; stored
 * activities have passed the deduplication gate.
 */

import { z } from 'zod';

// ============================================================
// ENUMS
// ============================================================

export const ActivitySourceSchema = z.enum(['chat', 'repository', 'statistics']);
export type ActivitySource = z.infer<typeof ActivitySourceSchema>;

export const ACTIVITY_SOURCES = ActivitySourceSchema.options;

export const ActivityKindSchema = z.enum([
  'message',
  'release',
  'pull_request',
  'issue',
  'commit',
  'comment',
  'snapshot',
]);
export type ActivityKind = z.infer<typeof ActivityKindSchema>;

// ============================================================
// PAYLOAD
// ============================================================

/**
 * Normalized fields needed for formatting.
 */
export const ActivityPayloadSchema = z.object({
  kind: ActivityKindSchema,
  title: z.string().min(1, 'Title cannot be empty'),
  text: z.string(),
  actor: z.string().optional(),
  link: z.string().url().optional(),
  occurredAt: z.string().datetime().optional(),
  // Repository events
  branch: z.string().optional(),
  defaultBranch: z.string().optional(),
  state: z.string().optional(),
  merged: z.boolean().optional(),
  labels: z.array(z.string()).optional(),
  // Statistics snapshots
  metrics: z.record(z.number()).optional(),
});
export type ActivityPayload = z.infer<typeof ActivityPayloadSchema>;

// ============================================================
// RAW ACTIVITY (from source adapters)
// ============================================================

export const RawActivitySchema = z.object({
  source: ActivitySourceSchema,
  sourceNativeId: z.string().min(1).optional(),
  payload: ActivityPayloadSchema,
});
export type RawActivity = z.infer<typeof RawActivitySchema>;

// ============================================================
// STORED ACTIVITY
// ============================================================

export interface Activity {
  id: string;
  seq: number;
  source: ActivitySource;
  sourceNativeId: string | null;
  contentHash: string;
  observedAt: string;
  payload: ActivityPayload;
  /** null until the content filter has run */
  newsworthy: boolean | null;
}

export type NewActivity = Omit<Activity, 'seq' | 'newsworthy'>;

/**
 * Outcome of the deduplication gate. A duplicate is an expected outcome,
 * not an error.
 */
export type AdmissionResult =
  | { kind: 'admitted'; activity: Activity }
  | { kind: 'duplicate'; existing: Activity };

