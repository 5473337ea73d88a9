/**
 * Herald — Scheduler
 *
 * Drives the daily and weekly publish cycles through
 * idle → collecting → selecting → publishing → recording → idle.
 * There is no internal timer; something external calls runCycle.
 *
 * Rate limits:
 * - a cycle type runs at most once per its minimum interval
 * - daily cycles publish at most MAX_DAILY_POSTS candidates per local day
 * - a destination is skipped while its last post is inside the interval
 *
 * Every cycle first picks up failed_retryable or pending posts left by an
 * earlier cycle of its type. Those retries never take a slot of the daily
 * limit. A gated cycle with leftovers runs a retry-only pass that does not
 * move the cycle timestamp.
 */

import type {
  Activity,
  Candidate,
  CycleOutcome,
  CyclePhase,
  CycleType,
  Destination,
  Post,
  PostResult,
  PublishResults,
  ReportingWindow,
  ScheduleState,
  ScheduleStatePatch,
} from '../types';
import { CYCLE_DESTINATIONS, isTerminal } from '../types';
import type { ActivityStore } from '../db/store';
import type { ScheduleConfig } from '../lib/config';
import { DAY_MS, HOUR_MS, addMs, elapsedMs, localDateKey } from '../lib/time';
import { toErrorMessage } from '../lib/errors';
import { logger } from '../lib/logger';
import { postSignature, type PublishCoordinator } from '../delivery/coordinator';
import { buildDigest } from '../delivery/digest';
import type { Summarizer } from '../delivery/summarizer';
import { CycleLock } from './lock';
import { resultsOf, summarizeResults } from './outcome';

const log = logger.child({ component: 'Scheduler' });

// ============================================================
// TYPES
// ============================================================

export interface SchedulerDeps {
  store: ActivityStore;
  coordinator: PublishCoordinator;
  /** Destinations with a configured adapter */
  destinations: readonly Destination[];
  schedule: ScheduleConfig;
  projectName: string;
  summarizer?: Summarizer | null;
  lock?: CycleLock;
}

export interface PlannedCandidate {
  candidate: Candidate;
  signature: string;
  /** Destinations to publish to in this cycle */
  destinations: Destination[];
  /** Destinations held back by their minimum interval */
  rateLimited: Destination[];
  /** A destination already carries a succeeded post for this candidate */
  previouslyPublished: boolean;
}

export type CyclePlan =
  | { kind: 'skipped'; reason: string; nextEligibleAt: string }
  | { kind: 'run'; mode: 'full' | 'retry'; candidates: PlannedCandidate[]; state: ScheduleState };

export interface RunCycleOptions {
  signal?: AbortSignal;
}

const RETRY_STATUSES = ['failed_retryable', 'pending'] as const;

// ============================================================
// SCHEDULER
// ============================================================

export class Scheduler {
  private readonly lock: CycleLock;
  private readonly phases = new Map<CycleType, CyclePhase>();

  constructor(private readonly deps: SchedulerDeps) {
    this.lock = deps.lock ?? new CycleLock();
  }

  phase(cycleType: CycleType): CyclePhase {
    return this.phases.get(cycleType) ?? 'idle';
  }

  /**
   * Run one cycle. Throws CycleInProgressError when the same cycle type is
   * already running and StoreUnavailableError when the store fails, in which
   * case no schedule state is written.
   */
  async runCycle(cycleType: CycleType, now: Date = new Date(), options: RunCycleOptions = {}): Promise<CycleOutcome> {
    const release = this.lock.acquire(cycleType);
    const startedAt = now.toISOString();

    try {
      // Collection runs as its own command; the store already holds its output
      this.enter(cycleType, 'collecting');

      this.enter(cycleType, 'selecting');
      const plan = await this.plan(cycleType, now);

      if (plan.kind === 'skipped') {
        log.info('Cycle skipped', { cycleType, reason: plan.reason, nextEligibleAt: plan.nextEligibleAt });
        return { status: 'skipped', cycleType, reason: plan.reason, nextEligibleAt: plan.nextEligibleAt };
      }

      this.enter(cycleType, 'publishing');
      const candidates: Array<{ planned: PlannedCandidate; results: PublishResults }> = [];
      for (const planned of plan.candidates) {
        if (options.signal?.aborted) {
          log.warn('Cycle aborted before all candidates were published', { cycleType });
          break;
        }
        candidates.push({
          planned,
          results: await this.publishPlanned(planned, cycleType, options.signal),
        });
      }

      this.enter(cycleType, 'recording');
      const patch = this.buildPatch(cycleType, plan, candidates, now);
      await this.deps.store.updateScheduleState(patch);

      const allResults = candidates.map((c) => c.results);
      const outcome: CycleOutcome = {
        status: 'completed',
        cycleType,
        mode: plan.mode,
        startedAt,
        candidates: candidates.map((c) => ({
          activityIds: c.planned.candidate.activityIds,
          signature: c.planned.signature,
          results: c.results,
        })),
        ...summarizeResults(allResults),
      };

      log.info('Cycle completed', {
        cycleType,
        mode: plan.mode,
        candidates: outcome.candidates.length,
        succeeded: outcome.succeeded,
        retryable: outcome.retryable,
        permanent: outcome.permanent,
      });

      return outcome;
    } finally {
      this.enter(cycleType, 'idle');
      release();
    }
  }

  /**
   * Gate and select without publishing anything.
   */
  async plan(cycleType: CycleType, now: Date): Promise<CyclePlan> {
    const state = await this.deps.store.readScheduleState();
    const destinations = CYCLE_DESTINATIONS[cycleType].filter((d) => this.deps.destinations.includes(d));

    if (destinations.length === 0) {
      return { kind: 'skipped', reason: 'No destinations configured', nextEligibleAt: now.toISOString() };
    }

    const lastRunAt = cycleType === 'daily' ? state.lastDailyRunAt : state.lastWeeklyRunAt;
    const intervalMs =
      (cycleType === 'daily' ? this.deps.schedule.minPostIntervalHours : this.deps.schedule.weeklyMinIntervalHours) *
      HOUR_MS;

    if (lastRunAt !== null && elapsedMs(lastRunAt, now) < intervalMs) {
      const candidates = await this.selectRetries(cycleType, destinations, state, now);
      if (candidates.length === 0) {
        return {
          kind: 'skipped',
          reason: `Last ${cycleType} cycle ran at ${lastRunAt}`,
          nextEligibleAt: addMs(lastRunAt, intervalMs),
        };
      }
      return { kind: 'run', mode: 'retry', candidates, state };
    }

    const retries = await this.selectRetries(cycleType, destinations, state, now);
    const claimed = new Set(retries.flatMap((r) => r.candidate.activityIds));
    const fresh =
      cycleType === 'daily'
        ? await this.selectDaily(destinations, state, now, claimed)
        : await this.selectWeekly(destinations, state, now, claimed);

    return { kind: 'run', mode: 'full', candidates: [...retries, ...fresh], state };
  }

  // ============================================================
  // SELECTION
  // ============================================================

  /**
   * Newest first within the lookback, skipping activities a retry already
   * carries.
   */
  private async selectDaily(
    destinations: Destination[],
    state: ScheduleState,
    now: Date,
    claimed: ReadonlySet<string>
  ): Promise<PlannedCandidate[]> {
    const remaining = Math.max(0, this.deps.schedule.maxDailyPosts - this.publishedToday(state, now));
    if (remaining === 0) {
      log.info('Daily post limit reached', { maxDailyPosts: this.deps.schedule.maxDailyPosts });
      return [];
    }

    const since = new Date(now.getTime() - this.deps.schedule.dailyLookbackHours * HOUR_MS).toISOString();
    const activities = await this.deps.store.listNewsworthy({ since, until: now.toISOString() });
    const planned: PlannedCandidate[] = [];

    for (const activity of activities) {
      if (planned.length >= remaining) break;
      if (claimed.has(activity.id)) continue;

      const candidate: Candidate = { kind: 'single', activityIds: [activity.id], activity };
      const entry = await this.planCandidate(candidate, destinations, state, now);
      if (entry) planned.push(entry);
    }

    return planned;
  }

  private async selectWeekly(
    destinations: Destination[],
    state: ScheduleState,
    now: Date,
    claimed: ReadonlySet<string>
  ): Promise<PlannedCandidate[]> {
    const window: ReportingWindow = {
      start: state.lastWeeklyRunAt ?? new Date(now.getTime() - this.deps.schedule.weeklyLookbackDays * DAY_MS).toISOString(),
      end: now.toISOString(),
    };

    const consumed = new Set([
      ...claimed,
      ...(await this.deps.store.findPosts({ cycleType: 'weekly', destination: 'blog', statuses: ['succeeded'] })).flatMap(
        (p) => p.activityIds
      ),
    ]);

    const activities = (await this.deps.store.listNewsworthy({ since: window.start, until: window.end }))
      .filter((a) => !consumed.has(a.id))
      .reverse();

    if (activities.length === 0) {
      log.info('No newsworthy activities in weekly window', { window });
      return [];
    }

    const { body, summarized } = await this.digestBody(activities, window);
    const candidate: Candidate = {
      kind: 'digest',
      activityIds: activities.map((a) => a.id),
      activities,
      window,
      body,
      summarized,
    };

    const entry = await this.planCandidate(candidate, destinations, state, now);
    return entry ? [entry] : [];
  }

  /**
   * Rebuild candidates from posts left retryable or pending by an earlier
   * cycle of this type.
   */
  private async selectRetries(
    cycleType: CycleType,
    destinations: Destination[],
    state: ScheduleState,
    now: Date
  ): Promise<PlannedCandidate[]> {
    const posts = await this.deps.store.findPosts({ cycleType, statuses: [...RETRY_STATUSES] });
    const bySignature = new Map<string, Post[]>();
    for (const post of posts) {
      if (!destinations.includes(post.destination)) continue;
      bySignature.set(post.signature, [...(bySignature.get(post.signature) ?? []), post]);
    }

    const planned: PlannedCandidate[] = [];

    for (const [signature, group] of bySignature) {
      const activities = await this.deps.store.getActivities(group[0].activityIds);
      if (activities.length === 0) continue;

      const candidate = this.rebuildCandidate(cycleType, activities, group[0]);
      const retryDestinations = [...new Set(group.map((p) => p.destination))];
      const entry = await this.planCandidate(candidate, retryDestinations, state, now);

      if (entry && entry.destinations.length > 0) {
        planned.push({ ...entry, signature });
      }
    }

    return planned;
  }

  private rebuildCandidate(cycleType: CycleType, activities: Activity[], post: Post): Candidate {
    if (cycleType === 'daily') {
      return { kind: 'single', activityIds: post.activityIds, activity: activities[0] };
    }

    const start = activities.reduce((min, a) => (a.observedAt < min ? a.observedAt : min), activities[0].observedAt);
    return {
      kind: 'digest',
      activityIds: post.activityIds,
      activities,
      window: { start, end: post.createdAt },
      body: post.content ?? buildDigest(activities, { start, end: post.createdAt }, this.digestOptions()),
      summarized: false,
    };
  }

  /**
   * Work out where a candidate still needs to go. Returns null when every
   * destination already holds a terminal post for it.
   */
  private async planCandidate(
    candidate: Candidate,
    destinations: Destination[],
    state: ScheduleState,
    now: Date
  ): Promise<PlannedCandidate | null> {
    const signature = postSignature(candidate.activityIds);
    const posts = await this.deps.store.findPosts({ signature });

    const terminal = new Set(posts.filter((p) => isTerminal(p.status)).map((p) => p.destination));
    const open = destinations.filter((d) => !terminal.has(d));
    if (open.length === 0) return null;

    const intervalMs = this.deps.schedule.minPostIntervalHours * HOUR_MS;
    const rateLimited = open.filter((d) => elapsedMs(state.lastPostAt[d] ?? null, now) < intervalMs);

    return {
      candidate,
      signature,
      destinations: open.filter((d) => !rateLimited.includes(d)),
      rateLimited,
      previouslyPublished: posts.some((p) => p.status === 'succeeded'),
    };
  }

  private async digestBody(
    activities: Activity[],
    window: ReportingWindow
  ): Promise<{ body: string; summarized: boolean }> {
    const { summarizer } = this.deps;
    if (summarizer) {
      try {
        return { body: await summarizer.summarize(activities, window), summarized: true };
      } catch (error) {
        log.warn('Summarizer failed, using the plain digest', { error: toErrorMessage(error) });
      }
    }
    return { body: buildDigest(activities, window, this.digestOptions()), summarized: false };
  }

  private digestOptions() {
    return { projectName: this.deps.projectName, timeZone: this.deps.schedule.timezone };
  }

  // ============================================================
  // PUBLISHING & RECORDING
  // ============================================================

  private async publishPlanned(
    planned: PlannedCandidate,
    cycleType: CycleType,
    signal?: AbortSignal
  ): Promise<PublishResults> {
    const results: PublishResults =
      planned.destinations.length > 0
        ? await this.deps.coordinator.publish(planned.candidate, planned.destinations, { cycleType, signal })
        : {};

    for (const destination of planned.rateLimited) {
      const limited: PostResult = { destination, status: 'rate_limited', postId: null, attempts: 0 };
      results[destination] = limited;
    }

    return results;
  }

  private publishedToday(state: ScheduleState, now: Date): number {
    return state.postsCountedOn === localDateKey(now, this.deps.schedule.timezone) ? state.postsPublishedToday : 0;
  }

  private buildPatch(
    cycleType: CycleType,
    plan: Extract<CyclePlan, { kind: 'run' }>,
    candidates: Array<{ planned: PlannedCandidate; results: PublishResults }>,
    now: Date
  ): ScheduleStatePatch {
    const nowIso = now.toISOString();
    const patch: ScheduleStatePatch = {};

    if (plan.mode === 'full') {
      if (cycleType === 'daily') patch.lastDailyRunAt = nowIso;
      else patch.lastWeeklyRunAt = nowIso;
    }

    // Terminal outcomes move the per-destination clock; retryable ones do not
    const lastPostAt: Partial<Record<Destination, string>> = {};
    for (const { results } of candidates) {
      for (const result of resultsOf(results)) {
        if (result.status === 'succeeded' || result.status === 'failed_permanent') {
          if (result.postId !== null) lastPostAt[result.destination] = nowIso;
        }
      }
    }
    if (Object.keys(lastPostAt).length > 0) patch.lastPostAt = lastPostAt;

    if (cycleType === 'daily') {
      const newlyPublished = candidates.filter(
        ({ planned, results }) =>
          !planned.previouslyPublished && resultsOf(results).some((r) => r.status === 'succeeded')
      ).length;
      patch.postsPublishedToday = this.publishedToday(plan.state, now) + newlyPublished;
      patch.postsCountedOn = localDateKey(now, this.deps.schedule.timezone);
    }

    return patch;
  }

  private enter(cycleType: CycleType, phase: CyclePhase): void {
    this.phases.set(cycleType, phase);
    log.debug('Phase', { cycleType, phase });
  }
}
