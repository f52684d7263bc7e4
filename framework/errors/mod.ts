/**
 * Error taxonomy shared by the dispatcher and the entity manager.
 */

export {
  TrellisError,
  ResolutionError,
  StorageError,
  TransactionError,
  EntityStateError,
  MappingError,
  LazyInitializationError,
  EntityNotFoundError,
  errorMessage,
} from './errors.ts';
export { ok, fail, toFailure, type Result, type Failure, type FailureKind } from './result.ts';
