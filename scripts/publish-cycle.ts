/**
 * Herald — Publish Cycle Command
 *
 * Shared body of daily-post and weekly-post.
 */

import type { CycleType } from '../src/types';
import { createRuntime } from '../src/runtime';
import { EXIT_OK, exitCodeFor } from '../src/scheduler';
import { logger, timeOperation } from '../src/lib/logger';
import { abortOnSignals, banner, hasFlag, printOutcome } from './shared';

export async function runPublishCycle(cycleType: CycleType, args: string[]): Promise<number> {
  const dryRun = hasFlag(args, '--dry-run');
  const runtime = createRuntime();
  const now = new Date();

  banner(`HERALD ${cycleType.toUpperCase()} CYCLE`, { Started: now.toISOString(), 'Dry Run': dryRun });

  if (dryRun) {
    const plan = await runtime.scheduler.plan(cycleType, now);
    if (plan.kind === 'skipped') {
      console.log(`Would skip: ${plan.reason}`);
      return EXIT_OK;
    }

    console.log(`Mode: ${plan.mode}, ${plan.candidates.length} candidate(s)\n`);
    for (const planned of plan.candidates) {
      for (const destination of planned.destinations) {
        console.log(`--- ${destination} ---`);
        console.log(runtime.coordinator.preview(planned.candidate, destination));
        console.log('');
      }
      for (const destination of planned.rateLimited) {
        console.log(`--- ${destination}: rate limited ---\n`);
      }
    }
    return EXIT_OK;
  }

  const controller = abortOnSignals();
  const outcome = await timeOperation(`${cycleType} cycle`, () =>
    runtime.scheduler.runCycle(cycleType, now, { signal: controller.signal })
  );
  printOutcome(outcome);

  const code = exitCodeFor(outcome);
  logger.info('Publish command finished', { cycleType, status: outcome.status, exitCode: code });
  return code;
}
