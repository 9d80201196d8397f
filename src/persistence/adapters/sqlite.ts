/**
 * SQLite Database Adapter
 *
 * Implements DatabaseAdapter using better-sqlite3. Used for local runs and as
 * the in-process database under test.
 *
 * Spatial columns are stored as EWKT text. `ST_AsGeoJSON` is registered as a
 * SQL function so aggregate queries read the same way as on PostGIS.
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { SpatialValue } from '../../core/types/records.js';
import { isSqlRow, type DatabaseAdapter, type SqlRow } from '../../core/types/database.js';
import { spatialTextToGeoJson } from '../../transformation/geometry.js';

/** SQLITE_MAX_VARIABLE_NUMBER default since SQLite 3.32 */
const MAX_BIND_PARAMETERS = 32766;

export const SQLITE_MEMORY_PATH = ':memory:';

/**
 * Convert a bound value to one better-sqlite3 accepts
 */
export function toSqliteValue(value: unknown): unknown {
  if (value === undefined || value === null) {
    return null;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (value instanceof SpatialValue) {
    return value.toEWKT();
  }
  if (typeof value === 'object' && !Buffer.isBuffer(value)) {
    return JSON.stringify(value);
  }
  return value;
}

function asGeoJson(value: unknown): string | null {
  if (typeof value !== 'string' || value === '') {
    return null;
  }
  return JSON.stringify(spatialTextToGeoJson(value));
}

export class SQLiteAdapter implements DatabaseAdapter {
  readonly dialect = 'sqlite';
  readonly maxParameters = MAX_BIND_PARAMETERS;

  private db: Database.Database;
  private transactionDepth = 0;

  constructor(filepath: string) {
    if (filepath !== SQLITE_MEMORY_PATH) {
      mkdirSync(dirname(filepath), { recursive: true });
    }
    this.db = new Database(filepath);

    // WAL mode for better concurrency
    if (filepath !== SQLITE_MEMORY_PATH) {
      this.db.pragma('journal_mode = WAL');
    }

    this.db.function('ST_AsGeoJSON', { deterministic: true }, asGeoJson);
  }

  async queryOne(sql: string, params: ReadonlyArray<unknown> = []): Promise<SqlRow | null> {
    const row: unknown = this.db.prepare(sql).get(...params.map(toSqliteValue));
    return isSqlRow(row) ? row : null;
  }

  async queryMany(sql: string, params: ReadonlyArray<unknown> = []): Promise<ReadonlyArray<SqlRow>> {
    const rows: unknown[] = this.db.prepare(sql).all(...params.map(toSqliteValue));
    return rows.filter(isSqlRow);
  }

  async execute(sql: string, params: ReadonlyArray<unknown> = []): Promise<number> {
    const result = this.db.prepare(sql).run(...params.map(toSqliteValue));
    return result.changes;
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    // Support nested transactions via savepoints
    const savepoint = `sp_${this.transactionDepth}`;
    this.transactionDepth++;

    try {
      if (this.transactionDepth === 1) {
        this.db.exec('BEGIN');
      } else {
        this.db.exec(`SAVEPOINT ${savepoint}`);
      }

      const result = await fn();

      if (this.transactionDepth === 1) {
        this.db.exec('COMMIT');
      } else {
        this.db.exec(`RELEASE SAVEPOINT ${savepoint}`);
      }

      this.transactionDepth--;
      return result;
    } catch (error) {
      if (this.transactionDepth === 1) {
        this.db.exec('ROLLBACK');
      } else {
        this.db.exec(`ROLLBACK TO SAVEPOINT ${savepoint}`);
      }

      this.transactionDepth--;
      throw error;
    }
  }

  async tableColumns(tableName: string): Promise<readonly string[]> {
    const rows = await this.queryMany('SELECT name FROM pragma_table_info(?)', [tableName]);
    return rows.map((row) => String(row.name));
  }

  quoteIdentifier(identifier: string): string {
    return `"${identifier.replace(/"/g, '""')}"`;
  }

  /**
   * Spatial types have no SQLite counterpart; EWKT text stands in for them
   */
  columnType(type: string): string {
    return /^(GEOMETRY|GEOGRAPHY)\b/i.test(type) ? 'TEXT' : type;
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
