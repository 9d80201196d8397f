/**
 * SQL statement builders
 *
 * Pure functions from descriptors and column lists to SQL text with `?`
 * placeholders. Every identifier goes through the dialect's quoting; type
 * strings, defaults and table constraints are emitted verbatim.
 */

import type { DatabaseAdapter } from '../core/types/database.js';
import { primaryKeyColumns, type ColumnDefinition, type SchemaDescriptor } from '../core/types/schema.js';

export type SqlDialect = Pick<DatabaseAdapter, 'quoteIdentifier' | 'columnType'>;

/** Rows per multi-row INSERT before the bound-parameter limit applies */
export const DEFAULT_BATCH_SIZE = 1000;

function quoteList(dialect: SqlDialect, identifiers: readonly string[]): string {
  return identifiers.map((identifier) => dialect.quoteIdentifier(identifier)).join(', ');
}

function placeholders(count: number): string {
  return `(${Array.from({ length: count }, () => '?').join(', ')})`;
}

/**
 * `name TYPE [PRIMARY KEY | NOT NULL] [DEFAULT expr]`
 */
export function columnFragment(
  dialect: SqlDialect,
  column: ColumnDefinition,
  inlinePrimaryKey: boolean
): string {
  let fragment = `${dialect.quoteIdentifier(column.name)} ${dialect.columnType(column.type)}`;
  if (column.primaryKey && inlinePrimaryKey) {
    fragment += ' PRIMARY KEY';
  } else if (!column.nullable) {
    fragment += ' NOT NULL';
  }
  if (column.default !== undefined) {
    fragment += ` DEFAULT ${column.default}`;
  }
  return fragment;
}

export function buildCreateTable(dialect: SqlDialect, descriptor: SchemaDescriptor): string {
  const keys = primaryKeyColumns(descriptor);
  const inlinePrimaryKey = keys.length === 1;

  const definitions = descriptor.columns.map((column) => columnFragment(dialect, column, inlinePrimaryKey));
  if (keys.length > 1) {
    definitions.push(`PRIMARY KEY (${quoteList(dialect, keys)})`);
  }
  definitions.push(...descriptor.constraints);

  return `CREATE TABLE IF NOT EXISTS ${dialect.quoteIdentifier(descriptor.tableName)} (\n  ${definitions.join(',\n  ')}\n)`;
}

export function buildCreateIndexes(dialect: SqlDialect, descriptor: SchemaDescriptor): string[] {
  const table = dialect.quoteIdentifier(descriptor.tableName);
  return descriptor.indexes.map(
    (index) =>
      `CREATE INDEX IF NOT EXISTS ${dialect.quoteIdentifier(index.name)} ON ${table} (${quoteList(dialect, index.columns)})`
  );
}

/**
 * Multi-row `INSERT ... VALUES (...), (...)`
 */
export function buildInsert(
  dialect: SqlDialect,
  tableName: string,
  columns: readonly string[],
  rowCount: number
): string {
  const row = placeholders(columns.length);
  const values = Array.from({ length: rowCount }, () => row).join(', ');
  return `INSERT INTO ${dialect.quoteIdentifier(tableName)} (${quoteList(dialect, columns)}) VALUES ${values}`;
}

/**
 * Single-row `INSERT ... ON CONFLICT (keys) DO UPDATE SET col = EXCLUDED.col`.
 * A row with nothing but key columns falls back to `DO NOTHING`.
 */
export function buildUpsert(
  dialect: SqlDialect,
  tableName: string,
  columns: readonly string[],
  conflictColumns: readonly string[]
): string {
  const updates = columns
    .filter((column) => !conflictColumns.includes(column))
    .map((column) => {
      const quoted = dialect.quoteIdentifier(column);
      return `${quoted} = EXCLUDED.${quoted}`;
    });
  const action = updates.length > 0 ? `DO UPDATE SET ${updates.join(', ')}` : 'DO NOTHING';
  return (
    `INSERT INTO ${dialect.quoteIdentifier(tableName)} (${quoteList(dialect, columns)}) ` +
    `VALUES ${placeholders(columns.length)} ` +
    `ON CONFLICT (${quoteList(dialect, conflictColumns)}) ${action}`
  );
}

export function buildDeleteAll(dialect: SqlDialect, tableName: string): string {
  return `DELETE FROM ${dialect.quoteIdentifier(tableName)}`;
}

export function buildCount(dialect: SqlDialect, tableName: string): string {
  return `SELECT COUNT(*) AS count FROM ${dialect.quoteIdentifier(tableName)}`;
}

/**
 * Rows per INSERT so that rows * columns stays within the parameter limit
 */
export function batchSize(
  columnCount: number,
  maxParameters: number,
  preferred: number = DEFAULT_BATCH_SIZE
): number {
  if (columnCount <= 0) {
    return preferred;
  }
  return Math.max(1, Math.min(preferred, Math.floor(maxParameters / columnCount)));
}
