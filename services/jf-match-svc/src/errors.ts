import { ServiceError } from '@jobfit/common';

export interface ProviderErrorOptions {
  transient: boolean;
  status?: number;
  attempts?: number;
  cause?: unknown;
}

/**
 * Raised when the embedding provider cannot produce vectors. `transient`
 * failures were retried before surfacing; permanent ones never are.
 */
export class ProviderError extends ServiceError {
  public readonly transient: boolean;
  public readonly status?: number;
  public readonly attempts: number;

  constructor(message: string, { transient, status, attempts = 1, cause }: ProviderErrorOptions) {
    super(message, {
      statusCode: 503,
      code: 'provider_unavailable',
      details: { transient, status, attempts },
      cause
    });
    this.name = 'ProviderError';
    this.transient = transient;
    this.status = status;
    this.attempts = attempts;
  }

  withAttempts(attempts: number): ProviderError {
    return new ProviderError(this.message, {
      transient: this.transient,
      status: this.status,
      attempts,
      cause: this.cause
    });
  }
}

export class DimensionMismatchError extends ServiceError {
  constructor(message: string, details: Record<string, unknown>) {
    super(message, { statusCode: 500, code: 'dimension_mismatch', details });
    this.name = 'DimensionMismatchError';
  }
}

/** Raised by the store when Postgres cannot be reached or a query fails. */
export class DatastoreError extends ServiceError {
  constructor(message: string, cause?: unknown) {
    super(message, { statusCode: 503, code: 'datastore_unavailable', cause });
    this.name = 'DatastoreError';
  }
}

export function toDatastoreError(error: unknown): DatastoreError {
  if (error instanceof DatastoreError) {
    return error;
  }
  return new DatastoreError(error instanceof Error ? error.message : 'Datastore request failed.', error);
}
