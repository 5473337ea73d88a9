/**
 * Herald — Statistics Source
 *
 * Fetches a JSON statistics document and turns it into at most one snapshot
 * activity per local day. Numeric leaves become metrics; nested objects are
 * flattened with dotted keys.
 */

import { z } from 'zod';
import type { RawActivity } from '../../types';
import type { SourceAdapter } from '../base';
import { localDateKey } from '../../lib/time';

const JsonObjectSchema = z.record(z.unknown());

export interface StatisticsSourceOptions {
  url: string;
  timezone: string;
  now?: () => Date;
}

export function flattenMetrics(value: Record<string, unknown>, prefix = ''): Record<string, number> {
  const metrics: Record<string, number> = {};

  for (const [key, entry] of Object.entries(value)) {
    const path = prefix ? `${prefix}.${key}` : key;

    if (typeof entry === 'number' && Number.isFinite(entry)) {
      metrics[path] = entry;
      continue;
    }

    const nested = JsonObjectSchema.safeParse(entry);
    if (nested.success && !Array.isArray(entry)) {
      Object.assign(metrics, flattenMetrics(nested.data, path));
    }
  }

  return metrics;
}

export function describeMetrics(metrics: Record<string, number>): string {
  return Object.entries(metrics)
    .map(([name, value]) => `${name.replace(/[._]/g, ' ')}: ${value.toLocaleString('en-US')}`)
    .join('\n');
}

export class StatisticsSource implements SourceAdapter {
  readonly source = 'statistics' as const;

  private readonly now: () => Date;

  constructor(private readonly options: StatisticsSourceOptions) {
    this.now = options.now ?? (() => new Date());
  }

  async collect(_since: Date): Promise<RawActivity[]> {
    const res = await fetch(this.options.url, {
      headers: { Accept: 'application/json' },
    });

    if (!res.ok) {
      throw new Error(`Statistics request failed: ${res.status}`);
    }

    const document = JsonObjectSchema.parse(await res.json());
    const metrics = flattenMetrics(document);
    if (Object.keys(metrics).length === 0) return [];

    const observed = this.now();
    const day = localDateKey(observed, this.options.timezone);

    return [
      {
        source: 'statistics',
        sourceNativeId: `stats-${day}`,
        payload: {
          kind: 'snapshot',
          title: `Statistics for ${day}`,
          text: describeMetrics(metrics),
          occurredAt: observed.toISOString(),
          metrics,
        },
      },
    ];
  }
}
