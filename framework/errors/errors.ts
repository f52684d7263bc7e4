/**
 * Framework Errors
 *
 * Error classes thrown by the dispatcher and the entity manager. Every
 * error carries a failure kind so callers can branch without string
 * matching.
 */

import type { FailureKind } from './result.ts';

/**
 * Base error for Trellis
 */
export class TrellisError extends Error {
  constructor(
    message: string,
    public readonly kind: FailureKind,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TrellisError';
  }
}

/**
 * A request value could not be converted to a handler argument
 */
export class ResolutionError extends TrellisError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'resolution', options);
    this.name = 'ResolutionError';
  }
}

/**
 * The storage driver rejected a statement
 */
export class StorageError extends TrellisError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'storage', options);
    this.name = 'StorageError';
  }
}

/**
 * Unit of work used in the wrong state (begin twice, find while inactive)
 */
export class TransactionError extends TrellisError {
  constructor(message: string) {
    super(message, 'storage');
    this.name = 'TransactionError';
  }
}

/**
 * A record was handed to the entity manager in a state it cannot accept
 */
export class EntityStateError extends TrellisError {
  constructor(message: string) {
    super(message, 'storage');
    this.name = 'EntityStateError';
  }
}

/**
 * An entity definition is incomplete
 */
export class MappingError extends TrellisError {
  constructor(message: string) {
    super(message, 'resolution');
    this.name = 'MappingError';
  }
}

/**
 * A lazy reference was touched after its unit of work ended
 */
export class LazyInitializationError extends TrellisError {
  constructor(message: string) {
    super(message, 'storage');
    this.name = 'LazyInitializationError';
  }
}

/**
 * A lazy reference points at a row that does not exist
 */
export class EntityNotFoundError extends TrellisError {
  constructor(message: string) {
    super(message, 'not-found');
    this.name = 'EntityNotFoundError';
  }
}

/**
 * Extract a message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
