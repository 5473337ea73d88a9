/**
 * Herald — Connectivity Check
 */

import type { ActivityStore } from '../db/store';
import type { Publishers } from '../delivery/destinations/base';
import { toErrorMessage } from '../lib/errors';

export interface CheckResult {
  name: string;
  ok: boolean;
  error?: string;
}

async function check(name: string, run: () => Promise<boolean | void>): Promise<CheckResult> {
  try {
    const ok = await run();
    return ok === false ? { name, ok: false, error: 'Rejected credentials or missing permission' } : { name, ok: true };
  } catch (error) {
    return { name, ok: false, error: toErrorMessage(error) };
  }
}

/**
 * Check the store and every configured destination. Never throws.
 */
export async function runChecks(store: ActivityStore, publishers: Publishers): Promise<CheckResult[]> {
  const checks = [check('store', () => store.ping())];

  for (const publisher of Object.values(publishers)) {
    if (publisher) checks.push(check(publisher.destination, () => publisher.checkConnection()));
  }

  return Promise.all(checks);
}
