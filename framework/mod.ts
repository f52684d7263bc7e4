/**
 * Trellis Framework
 *
 * A front-controller dispatcher and a unit-of-work entity manager,
 * both driven by declared metadata.
 *
 * @module trellis
 */

// Layer 1: HTTP
export {
  TrellisRequest,
  TrellisResponse,
  HttpStatus,
  type HttpMethod,
  type CallRecord,
  type ResponseOptions,
} from './http/mod.ts';

// Layer 3: Router
export {
  Router,
  compilePathPattern,
  matchPath,
  buildUrl,
  parsePathParams,
  type RouteDescriptor,
  type RouteMatch,
  type RouteTarget,
  type PathPattern,
  type PatternParams,
} from './router/mod.ts';

// Layer 3b: Dispatcher
export { Dispatcher, toResponse, type DispatcherOptions } from './dispatcher/mod.ts';

// Layer 4: Controller
export {
  defineController,
  pathVariable,
  requestBody,
  request,
  unbound,
  resolveArguments,
  convertValue,
  invokeRoute,
  type ControllerDefinition,
  type ParameterBinding,
  type ParameterKind,
  type RoutedController,
  type UnboundPolicy,
} from './controller/mod.ts';

// Layer 5: ORM/Data
export {
  EntityManager,
  EntityMetadataRegistry,
  IdentityMap,
  SqliteDriver,
  defineEntity,
  manyToOne,
  oneToMany,
  isLazyReference,
  isResolved,
  type EntityId,
  type EntityType,
  type EntityDefinition,
  type EntityDescription,
  type FetchType,
  type StorageDriver,
  type Row,
} from './orm/mod.ts';

// Errors
export {
  TrellisError,
  ResolutionError,
  StorageError,
  TransactionError,
  EntityStateError,
  MappingError,
  LazyInitializationError,
  EntityNotFoundError,
  ok,
  fail,
  toFailure,
  type Result,
  type Failure,
  type FailureKind,
} from './errors/mod.ts';

// Layer 14: Config
export { Config, loadConfig, type ConfigOptions, type TrellisConfig } from './config/mod.ts';

// Layer 18: Telemetry
export { Logger, getLogger, setLogger, createLogger, type LogLevel, type LogEntry } from './telemetry/mod.ts';
