/**
 * SQLite Storage Driver
 *
 * better-sqlite3 backed implementation of the storage contract. The
 * driver is synchronous, which lets lazy references load on plain
 * property access.
 */

import Database from 'better-sqlite3';
import { StorageError, errorMessage } from '../errors/errors.ts';
import type { Logger } from '../telemetry/logger.ts';
import { withDbSpan } from '../telemetry/otel.ts';
import type { EntityId } from './metadata.ts';
import type { ColumnValues, Row, StorageDriver } from './storage.ts';

export interface SqliteDriverOptions {
  /** Database file, or ':memory:' */
  path?: string;
  /** An already open handle; takes precedence over `path` */
  database?: Database.Database;
  logger?: Logger;
}

type SqlValue = string | number | bigint | Buffer | null;

/**
 * SQLite driver for the entity manager
 */
export class SqliteDriver implements StorageDriver {
  private db: Database.Database;
  private statements = new Map<string, Database.Statement>();
  private logger?: Logger;

  constructor(options: SqliteDriverOptions = {}) {
    this.db = options.database ?? new Database(options.path ?? ':memory:');
    this.logger = options.logger?.child({ component: 'sqlite' });
  }

  /**
   * Whether a transaction is open
   */
  get inTransaction(): boolean {
    return this.db.inTransaction;
  }

  /**
   * Run DDL or other multi-statement SQL
   */
  exec(sql: string): void {
    this.guard('exec', undefined, sql, () => this.db.exec(sql));
  }

  selectById(table: string, idColumn: string, id: EntityId): Row | undefined {
    const sql = `SELECT * FROM ${quote(table)} WHERE ${quote(idColumn)} = ?`;

    return this.guard('select', table, sql, () => {
      // Read integers as bigint so ids past 2^53 keep every digit
      const row: unknown = this.prepare(sql).safeIntegers(true).get(id);
      if (row === undefined) return undefined;
      if (!isRow(row)) {
        throw new StorageError(`Unexpected row shape from ${table}`);
      }
      return narrowRow(row);
    });
  }

  insert(table: string, values: ColumnValues, generatedIdColumn?: string): EntityId | undefined {
    const columns = Object.keys(values);
    const sql = columns.length === 0
      ? `INSERT INTO ${quote(table)} DEFAULT VALUES`
      : `INSERT INTO ${quote(table)} (${columns.map(quote).join(', ')}) VALUES (${columns.map(() => '?').join(', ')})`;

    return this.guard('insert', table, sql, () => {
      const info = this.prepare(sql).run(...columns.map((column) => toSqlValue(values[column], column)));
      if (!generatedIdColumn) return undefined;
      const id = info.lastInsertRowid;
      return typeof id === 'bigint' ? narrowInteger(id) : id;
    });
  }

  update(table: string, values: ColumnValues, idColumn: string, id: EntityId): number {
    const columns = Object.keys(values);
    if (columns.length === 0) return 0;

    const assignments = columns.map((column) => `${quote(column)} = ?`).join(', ');
    const sql = `UPDATE ${quote(table)} SET ${assignments} WHERE ${quote(idColumn)} = ?`;

    return this.guard('update', table, sql, () => {
      const params = columns.map((column) => toSqlValue(values[column], column));
      return this.prepare(sql).run(...params, id).changes;
    });
  }

  begin(): void {
    this.guard('begin', undefined, 'BEGIN', () => this.db.exec('BEGIN'));
  }

  commit(): void {
    this.guard('commit', undefined, 'COMMIT', () => this.db.exec('COMMIT'));
  }

  rollback(): void {
    // SQLite may already have rolled back after a failed statement
    if (!this.db.inTransaction) return;
    this.guard('rollback', undefined, 'ROLLBACK', () => this.db.exec('ROLLBACK'));
  }

  /**
   * Close the database
   */
  close(): void {
    this.statements.clear();
    this.db.close();
  }

  private prepare(sql: string): Database.Statement {
    let statement = this.statements.get(sql);
    if (!statement) {
      statement = this.db.prepare(sql);
      this.statements.set(sql, statement);
    }
    return statement;
  }

  private guard<T>(operation: string, table: string | undefined, sql: string, fn: () => T): T {
    this.logger?.debug(sql, { operation });
    return withDbSpan(operation, table, () => {
      try {
        return fn();
      } catch (error) {
        if (error instanceof StorageError) throw error;
        const target = table ? ` on ${table}` : '';
        throw new StorageError(`${operation}${target} failed: ${errorMessage(error)}`, { cause: error });
      }
    });
  }
}

function quote(identifier: string): string {
  return `"${identifier.replace(/"/g, '""')}"`;
}

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Integers that fit a number come back as numbers; larger ones stay bigint
 */
function narrowInteger(value: bigint): number | bigint {
  const asNumber = Number(value);
  return Number.isSafeInteger(asNumber) ? asNumber : value;
}

function narrowRow(row: Row): Row {
  const narrowed: Record<string, unknown> = {};
  for (const [column, value] of Object.entries(row)) {
    narrowed[column] = typeof value === 'bigint' ? narrowInteger(value) : value;
  }
  return narrowed;
}

function toSqlValue(value: unknown, column: string): SqlValue {
  if (value === undefined || value === null) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'bigint') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (value instanceof Date) return value.toISOString();
  if (Buffer.isBuffer(value)) return value;
  throw new StorageError(`Column ${column} cannot store a value of type ${typeof value}`);
}
