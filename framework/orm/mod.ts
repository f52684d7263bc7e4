/**
 * Layer 5: Domain/Data Layer (ORM)
 *
 * Entity mapping and a unit-of-work entity manager over SQLite.
 *
 * Responsibilities:
 * - Describe entities from their declared mapping tables
 * - Keep one in-memory record per (type, id) within a unit of work
 * - Queue inserts and updates until flush
 * - Defer loading related records behind lazy references
 */

export {
  EntityMetadataRegistry,
  defineEntity,
  manyToOne,
  oneToMany,
  isEntityType,
  type EntityId,
  type EntityType,
  type EntityDefinition,
  type EntityDescription,
  type ColumnDescription,
  type RelationDescription,
  type ColumnDeclaration,
  type RelationDeclaration,
  type IdDeclaration,
  type FetchType,
  type FieldName,
} from './metadata.ts';
export { EntityManager, IdentityMap, type EntityManagerOptions, type UnitOfWorkState } from './session.ts';
export {
  createLazyReference,
  isLazyReference,
  isResolved,
  loadReference,
  referenceId,
  resolvedTarget,
  type LazyOwner,
} from './lazy.ts';
export { SqliteDriver, type SqliteDriverOptions } from './sqlite.ts';
export { isEntityId, type StorageDriver, type Row, type ColumnValues } from './storage.ts';
