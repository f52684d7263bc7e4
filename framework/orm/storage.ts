/**
 * Storage Driver Contract
 *
 * The entity manager issues exactly three statement shapes (point
 * select by id, insert, update by id) plus transaction control.
 */

import type { EntityId } from './metadata.ts';

/** One fetched row, keyed by column name */
export type Row = Readonly<Record<string, unknown>>;

/** Column values to write, keyed by column name */
export type ColumnValues = Readonly<Record<string, unknown>>;

export interface StorageDriver {
  /**
   * Fetch the row whose id column equals `id`
   */
  selectById(table: string, idColumn: string, id: EntityId): Row | undefined;

  /**
   * Insert one row. When `generatedIdColumn` is given the store assigns
   * the id and it is returned.
   */
  insert(table: string, values: ColumnValues, generatedIdColumn?: string): EntityId | undefined;

  /**
   * Update the row whose id column equals `id`. Returns affected rows.
   */
  update(table: string, values: ColumnValues, idColumn: string, id: EntityId): number;

  begin(): void;
  commit(): void;
  rollback(): void;
}

/**
 * Check whether a stored value can serve as an entity id
 */
export function isEntityId(value: unknown): value is EntityId {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'bigint';
}
