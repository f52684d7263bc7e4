/**
 * Entity Metadata
 *
 * Entities declare their mapping once, as a static `entity` table built
 * with `defineEntity`. The registry turns that table into a description
 * (table, id, columns, relations) the first time a type is used and
 * keeps it for its own lifetime.
 */

import { MappingError } from '../errors/errors.ts';

export type EntityId = string | number | bigint;

export type FetchType = 'eager' | 'lazy';

/**
 * Data field names of T
 */
export type FieldName<T> = {
  [K in keyof T]: T[K] extends (...args: never[]) => unknown ? never : K;
}[keyof T] & string;

export interface IdDeclaration {
  readonly field: string;
  readonly column?: string;
  readonly generated?: boolean;
}

export interface ColumnDeclaration {
  readonly column?: string;
  readonly transient?: boolean;
}

export interface RelationDeclaration {
  readonly kind: 'many-to-one' | 'one-to-many';
  readonly target: () => EntityType;
  readonly fetch: FetchType;
  readonly joinColumn?: string;
  readonly mappedBy?: string;
}

/**
 * Mapping table of one entity, as declared
 */
export interface EntityDefinition {
  readonly table?: string;
  readonly id: IdDeclaration;
  readonly columns: Readonly<Record<string, ColumnDeclaration>>;
  readonly relations: Readonly<Record<string, RelationDeclaration>>;
}

/**
 * A class the entity manager can load and store
 */
export interface EntityType<T extends object = object> {
  new (): T;
  readonly name: string;
  readonly entity: EntityDefinition;
}

export interface ColumnDescription {
  readonly field: string;
  readonly column: string;
}

export interface RelationDescription {
  readonly field: string;
  readonly kind: 'many-to-one' | 'one-to-many';
  readonly target: EntityType;
  readonly fetch: FetchType;
  /** Foreign key column on this table (many-to-one only) */
  readonly joinColumn?: string;
  /** Owning field on the target (one-to-many only) */
  readonly mappedBy?: string;
}

/**
 * Resolved mapping of one entity type
 */
export interface EntityDescription {
  readonly type: EntityType;
  readonly tableName: string;
  readonly id: ColumnDescription & { readonly generated: boolean };
  readonly columns: readonly ColumnDescription[];
  readonly relations: readonly RelationDescription[];
}

/**
 * Declare an entity's mapping. Field names are checked against T.
 */
export function defineEntity<T>(definition: {
  table?: string;
  id: { field: FieldName<T>; column?: string; generated?: boolean };
  columns?: Partial<Record<FieldName<T>, ColumnDeclaration>>;
  relations?: Partial<Record<FieldName<T>, RelationDeclaration>>;
}): EntityDefinition {
  return Object.freeze({
    table: definition.table,
    id: Object.freeze({ ...definition.id }),
    columns: Object.freeze(compact(definition.columns)),
    relations: Object.freeze(compact(definition.relations)),
  });
}

/**
 * Many records of this type point at one record of the target.
 * Defaults: eager fetch, join column `<field>_id`.
 */
export function manyToOne(
  target: () => EntityType,
  options: { fetch?: FetchType; joinColumn?: string } = {}
): RelationDeclaration {
  return { kind: 'many-to-one', target, fetch: options.fetch ?? 'eager', joinColumn: options.joinColumn };
}

/**
 * One record of this type owns many records of the target.
 * Defaults: lazy fetch.
 */
export function oneToMany(
  target: () => EntityType,
  options: { fetch?: FetchType; mappedBy?: string } = {}
): RelationDeclaration {
  return { kind: 'one-to-many', target, fetch: options.fetch ?? 'lazy', mappedBy: options.mappedBy };
}

/**
 * Check whether a value is a class carrying an entity table
 */
export function isEntityType(value: unknown): value is EntityType {
  return typeof value === 'function' && 'entity' in value &&
    typeof value.entity === 'object' && value.entity !== null && 'id' in value.entity;
}

/**
 * Memoized entity descriptions, one per type
 */
export class EntityMetadataRegistry {
  private descriptions = new Map<EntityType, EntityDescription>();

  /**
   * Describe an entity type, analyzing it on first use
   */
  describe(type: EntityType): EntityDescription {
    let description = this.descriptions.get(type);
    if (!description) {
      description = analyze(type);
      this.descriptions.set(type, description);
    }
    return description;
  }

  /**
   * Describe the type a record was constructed from
   */
  describeRecord(record: object): EntityDescription {
    const type: unknown = record.constructor;
    if (!isEntityType(type)) {
      throw new MappingError(`${record.constructor.name || 'Object'} is not an entity`);
    }
    return this.describe(type);
  }

  /**
   * Whether a type has been analyzed
   */
  has(type: EntityType): boolean {
    return this.descriptions.has(type);
  }
}

function analyze(type: EntityType): EntityDescription {
  const definition = type.entity;
  if (!definition.id?.field) {
    throw new MappingError(`Entity ${type.name} has no id field`);
  }

  const idField = definition.id.field;
  const columns: ColumnDescription[] = [];
  for (const [field, declaration] of Object.entries(definition.columns)) {
    if (field === idField || declaration.transient || field in definition.relations) {
      continue;
    }
    columns.push(Object.freeze({ field, column: declaration.column || field }));
  }

  const relations: RelationDescription[] = [];
  for (const [field, declaration] of Object.entries(definition.relations)) {
    relations.push(Object.freeze({
      field,
      kind: declaration.kind,
      target: declaration.target(),
      fetch: declaration.fetch,
      joinColumn: declaration.kind === 'many-to-one'
        ? declaration.joinColumn || `${field}_id`
        : undefined,
      mappedBy: declaration.mappedBy,
    }));
  }

  return Object.freeze({
    type,
    tableName: definition.table || type.name.toLowerCase(),
    id: Object.freeze({
      field: idField,
      column: definition.id.column || idField,
      generated: definition.id.generated ?? false,
    }),
    columns: Object.freeze(columns),
    relations: Object.freeze(relations),
  });
}

function compact<V>(record: Partial<Record<string, V>> | undefined): Record<string, V> {
  const result: Record<string, V> = {};
  for (const [key, value] of Object.entries(record ?? {})) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}
