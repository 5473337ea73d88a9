/**
 * Herald — Type Exports
 *
 * Re-exports all types from the types module.
 */

// Activities
export {
  ActivitySourceSchema,
  ActivityKindSchema,
  ActivityPayloadSchema,
  RawActivitySchema,
  ACTIVITY_SOURCES,
} from './activity';
export type {
  ActivitySource,
  ActivityKind,
  ActivityPayload,
  RawActivity,
  Activity,
  NewActivity,
  AdmissionResult,
} from './activity';

// Posts, schedule state, cycles
export {
  DestinationSchema,
  CycleTypeSchema,
  PostStatusSchema,
  DESTINATIONS,
  TERMINAL_STATUSES,
  CYCLE_DESTINATIONS,
  isTerminal,
} from './post';
export type {
  Destination,
  CycleType,
  PostStatus,
  Post,
  NewPost,
  PostUpdate,
  PostFilter,
  ReportingWindow,
  Candidate,
  PostResultStatus,
  PostResult,
  PublishResults,
  ScheduleState,
  ScheduleStatePatch,
  CyclePhase,
  CandidateOutcome,
  CycleOutcome,
} from './post';
