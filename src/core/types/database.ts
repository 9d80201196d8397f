/**
 * Database Adapter Types
 *
 * One interface over PostgreSQL (`pg`) and SQLite (`better-sqlite3`).
 * SQL is written with `?` placeholders; the PostgreSQL adapter rewrites them
 * to `$1, $2, ...`.
 */

export type DatabaseDialect = 'postgresql' | 'sqlite';

/** Row as returned by the driver; callers narrow column values */
export type SqlRow = Readonly<Record<string, unknown>>;

export interface DatabaseAdapter {
  readonly dialect: DatabaseDialect;

  /** Maximum bound parameters per statement */
  readonly maxParameters: number;

  /**
   * Execute query returning single row or null.
   */
  queryOne(sql: string, params?: ReadonlyArray<unknown>): Promise<SqlRow | null>;

  /**
   * Execute query returning multiple rows.
   */
  queryMany(sql: string, params?: ReadonlyArray<unknown>): Promise<ReadonlyArray<SqlRow>>;

  /**
   * Execute statement (DDL, INSERT, UPDATE, DELETE).
   * Returns number of affected rows.
   */
  execute(sql: string, params?: ReadonlyArray<unknown>): Promise<number>;

  /**
   * Execute transaction with automatic rollback on error.
   */
  transaction<T>(fn: () => Promise<T>): Promise<T>;

  /**
   * Column names of a table in declaration order; empty when the table
   * does not exist.
   */
  tableColumns(tableName: string): Promise<readonly string[]>;

  quoteIdentifier(identifier: string): string;

  /**
   * Map a descriptor column type to this dialect's DDL type
   */
  columnType(type: string): string;

  /**
   * Close database connection.
   */
  close(): Promise<void>;
}

export function isSqlRow(value: unknown): value is SqlRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
