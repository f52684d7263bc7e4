/**
 * Result values
 *
 * Success/failure union returned across the dispatcher's layer
 * boundaries instead of throwing.
 */

export type FailureKind = 'not-found' | 'resolution' | 'invocation' | 'storage';

export interface Failure {
  kind: FailureKind;
  message: string;
  cause?: unknown;
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; failure: Failure };

/**
 * Create a success result
 */
export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

/**
 * Create a failure result
 */
export function fail<T = never>(kind: FailureKind, message: string, cause?: unknown): Result<T> {
  return { ok: false, failure: { kind, message, cause } };
}

/**
 * Convert a caught value into a failure. Errors that already carry a
 * kind keep it; anything else takes the fallback.
 */
export function toFailure(error: unknown, fallback: FailureKind): Failure {
  if (error instanceof Error) {
    const kind = 'kind' in error && isFailureKind(error.kind) ? error.kind : fallback;
    return { kind, message: error.message, cause: error };
  }
  return { kind: fallback, message: String(error), cause: error };
}

function isFailureKind(value: unknown): value is FailureKind {
  return value === 'not-found' || value === 'resolution' ||
    value === 'invocation' || value === 'storage';
}
