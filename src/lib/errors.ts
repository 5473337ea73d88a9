/**
 * Herald — Error Taxonomy
 *
 * Duplicate admissions and skipped cycles are outcomes, not errors, and
 * have no class here.
 */

export type HeraldErrorCode =
  | 'CLASSIFICATION_FAILED'
  | 'PUBLISH_RETRYABLE'
  | 'PUBLISH_PERMANENT'
  | 'CONTENT_TOO_LONG'
  | 'STORE_UNAVAILABLE'
  | 'VALIDATION_FAILED'
  | 'CYCLE_IN_PROGRESS';

export class HeraldError extends Error {
  readonly code: HeraldErrorCode;

  constructor(code: HeraldErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A content filter rule threw. The activity stays unclassified. */
export class ClassificationError extends HeraldError {
  constructor(
    readonly activityId: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('CLASSIFICATION_FAILED', message, options);
  }
}

/** Transient remote or network fault. Retried with backoff. */
export class PublishRetryableError extends HeraldError {
  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super('PUBLISH_RETRYABLE', message, options);
    this.status = options?.status;
  }

  readonly status?: number;
}

/** Authentication, validation or permanent rejection. Never retried. */
export class PublishPermanentError extends HeraldError {
  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super('PUBLISH_PERMANENT', message, options);
    this.status = options?.status;
  }

  readonly status?: number;
}

/** The destination rejected the rendering as too long. */
export class ContentTooLongError extends HeraldError {
  constructor(
    message: string,
    readonly limit?: number
  ) {
    super('CONTENT_TOO_LONG', message);
  }
}

/** The persistence layer is unreachable. Fatal to the current cycle. */
export class StoreUnavailableError extends HeraldError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORE_UNAVAILABLE', message, options);
  }
}

export class ValidationError extends HeraldError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('VALIDATION_FAILED', message, options);
  }
}

export class CycleInProgressError extends HeraldError {
  constructor(cycleType: string) {
    super('CYCLE_IN_PROGRESS', `A ${cycleType} cycle is already running`);
  }
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}
