/**
 * Shared test helpers
 */

import { Logger, type LogEntry } from '../framework/telemetry/logger.ts';
import { SqliteDriver } from '../framework/orm/sqlite.ts';
import { SCHEMA } from '../src/schema.ts';

/**
 * Logger that keeps entries in memory instead of printing them
 */
export function memoryLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new Logger({ level: 'debug', output: (entry) => entries.push(entry) });
  return { logger, entries };
}

/**
 * Fresh in-memory database with the sample schema
 */
export function sampleDriver(logger?: Logger): SqliteDriver {
  const driver = new SqliteDriver({ path: ':memory:', logger });
  driver.exec(SCHEMA);
  return driver;
}
