/**
 * Herald — Supabase Client
 *
 * Service-role client for the background commands. Created lazily so that
 * modules importing the store can load without credentials.
 */

import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { StoreUnavailableError, toErrorMessage } from '../lib/errors';

// PostgreSQL unique_violation
export const UNIQUE_VIOLATION = '23505';

let client: SupabaseClient | null = null;

export function getAdminClient(url: string | undefined, serviceRoleKey: string | undefined): SupabaseClient {
  if (client) return client;

  if (!url) {
    throw new StoreUnavailableError('Missing SUPABASE_URL environment variable');
  }
  if (!serviceRoleKey) {
    throw new StoreUnavailableError('SUPABASE_SERVICE_ROLE_KEY is required for background jobs');
  }

  client = createClient(url, serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
  return client;
}

interface PostgrestLikeError {
  message: string;
  code?: string;
}

function isPostgrestError(error: unknown): error is PostgrestLikeError {
  return typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string';
}

export function isUniqueViolation(error: unknown): boolean {
  return isPostgrestError(error) && error.code === UNIQUE_VIOLATION;
}

/**
 * Map a Supabase failure to StoreUnavailableError. Any failure to read or
 * write is fatal to the running cycle.
 */
export function storeError(operation: string, error: unknown): StoreUnavailableError {
  if (isPostgrestError(error)) {
    const code = error.code ? ` (code: ${error.code})` : '';
    return new StoreUnavailableError(`Supabase error during ${operation}: ${error.message}${code}`, {
      cause: error,
    });
  }
  return new StoreUnavailableError(`Supabase error during ${operation}: ${toErrorMessage(error)}`, {
    cause: error,
  });
}
