import { isServiceError } from '@jobfit/common';

import { DatastoreError, ProviderError } from './errors';

export type MatchFailureKind =
  | 'invalid_request'
  | 'not_found'
  | 'provider_unavailable'
  | 'datastore_unavailable'
  | 'internal';

export interface MatchFailure {
  kind: MatchFailureKind;
  message: string;
  cause?: unknown;
}

export type MatchOutcome<T> = { ok: true; value: T } | { ok: false; error: MatchFailure };

export function matchSuccess<T>(value: T): MatchOutcome<T> {
  return { ok: true, value };
}

export function matchFailure<T>(kind: MatchFailureKind, message: string, cause?: unknown): MatchOutcome<T> {
  return { ok: false, error: { kind, message, cause } };
}

/**
 * Maps an error thrown while matching onto a failure kind. Caller mistakes
 * keep their message. Only provider and store errors count as outages;
 * anything else, dimension mismatches included, is `internal`.
 */
export function classifyMatchError(error: unknown): MatchFailure {
  if (error instanceof ProviderError) {
    return { kind: 'provider_unavailable', message: error.message, cause: error };
  }

  if (error instanceof DatastoreError) {
    return { kind: 'datastore_unavailable', message: error.message, cause: error };
  }

  if (isServiceError(error)) {
    if (error.statusCode === 400) {
      return { kind: 'invalid_request', message: error.message, cause: error };
    }
    if (error.statusCode === 404) {
      return { kind: 'not_found', message: error.message, cause: error };
    }
  }

  const message = error instanceof Error ? error.message : 'Unknown error';
  return { kind: 'internal', message, cause: error };
}
