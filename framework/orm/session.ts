/**
 * Entity Manager
 *
 * Unit of work over a storage driver. Within one unit of work the
 * identity map guarantees a single in-memory record per (type, id);
 * new and changed records are queued and written on flush.
 */

import {
  EntityStateError,
  StorageError,
  TransactionError,
} from '../errors/errors.ts';
import { getLogger, type Logger } from '../telemetry/logger.ts';
import {
  createLazyReference,
  loadReference,
  referenceId,
  resolvedTarget,
  type LazyOwner,
} from './lazy.ts';
import {
  EntityMetadataRegistry,
  type EntityDescription,
  type EntityId,
  type EntityType,
} from './metadata.ts';
import { isEntityId, type Row, type StorageDriver } from './storage.ts';

export type UnitOfWorkState = 'inactive' | 'active';

export interface EntityManagerOptions {
  driver: StorageDriver;
  metadata?: EntityMetadataRegistry;
  logger?: Logger;
}

/**
 * First-level cache keyed by (type, id). Ids are compared by their text
 * form, so 7, 7n and '7' name the same record. Records are cached under
 * the id as stored, never under the form a caller looked them up by.
 */
export class IdentityMap {
  private records = new Map<EntityType, Map<string, object>>();

  get(type: EntityType, id: EntityId): object | undefined {
    return this.records.get(type)?.get(String(id));
  }

  set(type: EntityType, id: EntityId, record: object): void {
    let byId = this.records.get(type);
    if (!byId) {
      byId = new Map();
      this.records.set(type, byId);
    }
    byId.set(String(id), record);
  }

  /**
   * Whether this exact record instance is tracked
   */
  contains(record: object): boolean {
    for (const byId of this.records.values()) {
      for (const tracked of byId.values()) {
        if (tracked === record) return true;
      }
    }
    return false;
  }

  get size(): number {
    let count = 0;
    for (const byId of this.records.values()) {
      count += byId.size;
    }
    return count;
  }

  clear(): void {
    this.records.clear();
  }
}

/**
 * Entity manager for Trellis
 */
export class EntityManager implements LazyOwner {
  private readonly driver: StorageDriver;
  private readonly _metadata: EntityMetadataRegistry;
  private readonly logger: Logger;
  private readonly identityMap = new IdentityMap();
  private readonly pendingInserts = new Set<object>();
  private readonly pendingUpdates = new Set<object>();
  private _state: UnitOfWorkState = 'inactive';
  private unitOfWork = 0;

  constructor(options: EntityManagerOptions) {
    this.driver = options.driver;
    this._metadata = options.metadata ?? new EntityMetadataRegistry();
    this.logger = (options.logger ?? getLogger()).child({ component: 'entity-manager' });
  }

  get state(): UnitOfWorkState {
    return this._state;
  }

  get metadata(): EntityMetadataRegistry {
    return this._metadata;
  }

  isActive(): boolean {
    return this._state === 'active';
  }

  isCurrent(unitOfWork: number): boolean {
    return this.isActive() && this.unitOfWork === unitOfWork;
  }

  /**
   * Open a unit of work
   */
  begin(): void {
    if (this.isActive()) {
      throw new TransactionError('A unit of work is already active');
    }
    this.driver.begin();
    this.unitOfWork++;
    this._state = 'active';
    this.logger.debug('BEGIN', { unitOfWork: this.unitOfWork });
  }

  /**
   * Queue a new record for insert on the next flush
   */
  persist(entity: object): void {
    this.requireActive('persist');
    const record = resolvedTarget(entity);
    const description = this._metadata.describeRecord(record);

    if (this.identityMap.contains(record)) {
      this.logger.debug('Already managed', { entity: description.type.name });
      return;
    }

    this.pendingInserts.add(record);
    this.logger.debug('Marked for insert', { entity: description.type.name });
  }

  /**
   * Find a record by id. Returns the tracked instance when there is one;
   * otherwise fetches, tracks and returns it, or null when no row exists.
   */
  find<T extends object>(type: EntityType<T>, id: EntityId): T | null {
    this.requireActive('find');
    const description = this._metadata.describe(type);

    const cached = this.identityMap.get(type, id);
    if (cached instanceof type) {
      this.logger.debug('Cache hit', { entity: type.name, id: String(id) });
      return cached;
    }

    const row = this.driver.selectById(description.tableName, description.id.column, id);
    if (!row) {
      this.logger.debug('Not found', { entity: type.name, id: String(id) });
      return null;
    }

    // The row may already be tracked under its stored id when the caller
    // asked with another form of it, e.g. '01' for 1
    const storedId = row[description.id.column];
    const tracked = isEntityId(storedId) ? this.identityMap.get(type, storedId) : undefined;
    if (tracked instanceof type) {
      this.logger.debug('Cache hit', { entity: type.name, id: String(storedId) });
      return tracked;
    }

    return this.materialize(type, description, row);
  }

  /**
   * Queue a tracked record for update on the next flush. A lazy
   * reference is loaded and its record queued.
   */
  markDirty(entity: object): void {
    this.requireActive('markDirty');
    const record = loadReference(entity);
    const description = this._metadata.describeRecord(record);

    if (!this.identityMap.contains(record)) {
      throw new EntityStateError(`${description.type.name} record is not managed by this unit of work`);
    }
    this.pendingUpdates.add(record);
  }

  /**
   * Whether a record, or the record a loaded reference stands for, is
   * tracked by the identity map
   */
  contains(record: object): boolean {
    return this.identityMap.contains(resolvedTarget(record));
  }

  /**
   * Write pending inserts, then pending updates. Both queues are emptied
   * even when a statement fails; statements already run stay applied.
   */
  flush(): void {
    this.requireActive('flush');
    const inserts = [...this.pendingInserts];
    const updates = [...this.pendingUpdates];
    this.logger.debug('Flushing', { inserts: inserts.length, updates: updates.length });

    try {
      for (const record of inserts) {
        this.insertRecord(record);
      }
      for (const record of updates) {
        this.updateRecord(record);
      }
    } finally {
      this.pendingInserts.clear();
      this.pendingUpdates.clear();
    }
  }

  /**
   * Flush and commit. On failure the unit of work is rolled back and the
   * original error is raised.
   */
  commit(): void {
    this.requireActive('commit');

    try {
      this.flush();
      this.driver.commit();
    } catch (error) {
      this.logger.error('Commit failed, rolling back', error);
      try {
        this.rollback();
      } catch (rollbackError) {
        this.logger.error('Rollback after failed commit also failed', rollbackError);
      }
      throw error;
    }

    this.end();
    this.logger.debug('COMMIT');
  }

  /**
   * Discard pending changes and tracked records and end the unit of work
   */
  rollback(): void {
    this.requireActive('rollback');

    try {
      this.driver.rollback();
    } finally {
      this.end();
      this.logger.debug('ROLLBACK');
    }
  }

  /**
   * Detach every tracked record and drop pending changes, keeping the
   * unit of work open
   */
  clear(): void {
    this.identityMap.clear();
    this.pendingInserts.clear();
    this.pendingUpdates.clear();
    this.logger.debug('Cleared');
  }

  private end(): void {
    this.clear();
    this._state = 'inactive';
  }

  private requireActive(operation: string): void {
    if (!this.isActive()) {
      throw new TransactionError(`Cannot ${operation}: no active unit of work`);
    }
  }

  private materialize<T extends object>(type: EntityType<T>, description: EntityDescription, row: Row): T {
    const id = row[description.id.column];
    if (!isEntityId(id)) {
      throw new StorageError(`Row from ${description.tableName} has no usable id in ${description.id.column}`);
    }

    const record = new type();
    Reflect.set(record, description.id.field, id);
    for (const column of description.columns) {
      Reflect.set(record, column.field, row[column.column] ?? null);
    }

    // Track before following relations so cycles end at the cache
    this.identityMap.set(type, id, record);
    this.logger.debug('Cached', { entity: type.name, id: String(id) });

    for (const relation of description.relations) {
      if (relation.kind !== 'many-to-one' || !relation.joinColumn) continue;

      const foreignKey = row[relation.joinColumn];
      if (!isEntityId(foreignKey)) continue;

      if (relation.fetch === 'eager') {
        Reflect.set(record, relation.field, this.find(relation.target, foreignKey));
      } else {
        const target = this._metadata.describe(relation.target);
        Reflect.set(
          record,
          relation.field,
          createLazyReference(relation.target, target.id.field, foreignKey, this, this.unitOfWork)
        );
      }
    }

    return record;
  }

  private insertRecord(record: object): void {
    const description = this._metadata.describeRecord(record);
    const values = this.columnValues(description, record);

    if (!description.id.generated) {
      values[description.id.column] = Reflect.get(record, description.id.field);
    }

    const generated = this.driver.insert(
      description.tableName,
      values,
      description.id.generated ? description.id.column : undefined
    );
    if (generated !== undefined) {
      Reflect.set(record, description.id.field, generated);
    }

    const id: unknown = Reflect.get(record, description.id.field);
    if (isEntityId(id)) {
      this.identityMap.set(description.type, id, record);
    }
    this.logger.debug('Inserted', { entity: description.type.name, id: String(id) });
  }

  private updateRecord(record: object): void {
    const description = this._metadata.describeRecord(record);
    const id: unknown = Reflect.get(record, description.id.field);
    if (!isEntityId(id)) {
      throw new EntityStateError(`${description.type.name} record has no id to update by`);
    }

    this.driver.update(description.tableName, this.columnValues(description, record), description.id.column, id);
    this.logger.debug('Updated', { entity: description.type.name, id: String(id) });
  }

  /**
   * Plain columns plus many-to-one join columns, keyed by column name
   */
  private columnValues(description: EntityDescription, record: object): Record<string, unknown> {
    const values: Record<string, unknown> = {};

    for (const column of description.columns) {
      values[column.column] = Reflect.get(record, column.field);
    }

    for (const relation of description.relations) {
      if (relation.kind !== 'many-to-one' || !relation.joinColumn) continue;

      const related: unknown = Reflect.get(record, relation.field);
      if (typeof related === 'object' && related !== null) {
        const target = this._metadata.describe(relation.target);
        values[relation.joinColumn] = referenceId(related, target.id.field);
      } else {
        values[relation.joinColumn] = null;
      }
    }

    return values;
  }
}
