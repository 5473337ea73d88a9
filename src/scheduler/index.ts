/**
 * Herald — Scheduler Module
 */

export { Scheduler, type CyclePlan, type PlannedCandidate, type RunCycleOptions, type SchedulerDeps } from './scheduler';
export { CycleLock } from './lock';
export { EXIT_FAILURE, EXIT_OK, EXIT_PARTIAL, exitCodeFor, resultsOf, summarizeResults } from './outcome';
