/**
 * Herald — HTTP Failure Classification
 *
 * Maps remote failures onto the publish error taxonomy:
 * - 429, 5xx and network faults are retryable
 * - 400, 401, 403, 404 and 422 are permanent
 * - a rejection that mentions the length is ContentTooLong
 */

import {
  ContentTooLongError,
  PublishPermanentError,
  PublishRetryableError,
  isAbortError,
  toErrorMessage,
} from '../../lib/errors';

const LENGTH_REJECTION = /too long|character limit|exceeds? (the )?(maximum )?length|text is too/i;

export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/**
 * Build the error for a failed response. `body` is the raw response text.
 */
export function classifyHttpFailure(
  platform: string,
  status: number,
  body: string,
  limit?: number
): PublishRetryableError | PublishPermanentError | ContentTooLongError {
  const detail = body.length > 300 ? `${body.slice(0, 300)}...` : body;
  const message = `${platform} error: ${status}${detail ? ` - ${detail}` : ''}`;

  if (isRetryableStatus(status)) {
    return new PublishRetryableError(message, { status });
  }
  if ((status === 400 || status === 403 || status === 422) && LENGTH_REJECTION.test(body)) {
    return new ContentTooLongError(message, limit);
  }
  return new PublishPermanentError(message, { status });
}

/**
 * Status code carried by a thrown client error (Octokit's RequestError and
 * similar), if any.
 */
export function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/**
 * Classify an error thrown by a client library or by `fetch` itself.
 * Abort errors pass through unchanged.
 */
export function classifyThrown(platform: string, error: unknown, limit?: number): unknown {
  if (isAbortError(error)) return error;
  if (
    error instanceof PublishRetryableError ||
    error instanceof PublishPermanentError ||
    error instanceof ContentTooLongError
  ) {
    return error;
  }

  const status = statusOf(error);
  if (status === undefined) {
    return new PublishRetryableError(`${platform} request failed: ${toErrorMessage(error)}`, { cause: error });
  }
  return classifyHttpFailure(platform, status, toErrorMessage(error), limit);
}

/**
 * POST a JSON body and return the parsed JSON response, throwing a
 * classified error on failure.
 */
export async function postJson(
  platform: string,
  url: string,
  init: { headers: Record<string, string>; body: unknown; signal?: AbortSignal; limit?: number }
): Promise<unknown> {
  let res: Response;
  try {
    res = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...init.headers },
      body: JSON.stringify(init.body),
      signal: init.signal,
    });
  } catch (error) {
    throw classifyThrown(platform, error, init.limit);
  }

  if (!res.ok) {
    throw classifyHttpFailure(platform, res.status, await res.text(), init.limit);
  }

  return res.json();
}
