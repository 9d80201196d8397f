/**
 * Data Storage
 *
 * Owns the database engine for one unit of work: emits DDL from schema
 * descriptors, writes cleaned record sets, keeps the per-dataset
 * `dataset_metadata` table current, exports Parquet snapshots and runs read
 * queries.
 *
 * ENGINE LIFECYCLE:
 * - The adapter is created on first use from the configured DATABASE_URL
 * - `close()` disposes it; any later operation creates a fresh one
 *
 * FAILURE SEMANTICS:
 * - Errors are logged with context and re-thrown unchanged, no retries
 * - A failed store or upsert marks the dataset `failure` in the metadata
 *   table when the database is still reachable
 */

import { join } from 'node:path';
import { getSettings } from '../core/config.js';
import { SchemaMismatchError } from '../core/errors.js';
import type { DatabaseAdapter, SqlRow } from '../core/types/database.js';
import type { CleanedRecordSet } from '../core/types/records.js';
import { defineSchema, type SchemaDescriptor } from '../core/types/schema.js';
import { createLogger, errorMetadata } from '../core/utils/logger.js';
import { createDatabaseAdapter } from './adapters/factory.js';
import { writeParquet } from './parquet-export.js';
import {
  batchSize,
  buildCount,
  buildCreateIndexes,
  buildCreateTable,
  buildDeleteAll,
  buildInsert,
  buildUpsert,
} from './sql-builder.js';

const logger = createLogger({ module: 'storage' });

export const METADATA_TABLE = 'dataset_metadata';

export const METADATA_SCHEMA: SchemaDescriptor = defineSchema({
  tableName: METADATA_TABLE,
  columns: [
    { name: 'dataset_id', type: 'VARCHAR(20)', primaryKey: true },
    { name: 'dataset_name', type: 'VARCHAR(255)' },
    { name: 'table_name', type: 'VARCHAR(255)' },
    { name: 'last_ingestion', type: 'TIMESTAMP' },
    { name: 'record_count', type: 'INTEGER' },
    { name: 'status', type: 'VARCHAR(50)' },
  ],
});

export type StoreMode = 'append' | 'replace';

export interface StoreOptions {
  /** `replace` deletes the table's existing rows first (default `append`) */
  readonly mode?: StoreMode;
  readonly datasetName?: string;
}

export interface UpsertOptions {
  readonly datasetName?: string;
}

export interface DatasetMetadata {
  readonly datasetId: string;
  readonly datasetName: string | null;
  readonly tableName: string | null;
  readonly lastIngestion: Date | null;
  readonly recordCount: number | null;
  readonly status: string | null;
}

export interface StorageOptions {
  /** Defaults to the configured DATABASE_URL */
  readonly databaseUrl?: string;
  /** Defaults to the configured processed-data directory */
  readonly processedDir?: string;
  readonly adapterFactory?: (databaseUrl: string) => DatabaseAdapter;
}

function toNullableString(value: unknown): string | null {
  return value === null || value === undefined ? null : String(value);
}

function toNullableNumber(value: unknown): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * PostgreSQL returns Date; SQLite returns `YYYY-MM-DD HH:MM:SS` (UTC) text
 */
function toNullableDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return value;
  }
  if (typeof value !== 'string' || value === '') {
    return null;
  }
  const iso = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/.test(value) ? `${value.replace(' ', 'T')}Z` : value;
  const date = new Date(iso);
  return Number.isNaN(date.getTime()) ? null : date;
}

function toDatasetMetadata(row: SqlRow): DatasetMetadata {
  return {
    datasetId: String(row.dataset_id),
    datasetName: toNullableString(row.dataset_name),
    tableName: toNullableString(row.table_name),
    lastIngestion: toNullableDate(row.last_ingestion),
    recordCount: toNullableNumber(row.record_count),
    status: toNullableString(row.status),
  };
}

export class DataStorage {
  private engine: DatabaseAdapter | null = null;
  private closed = false;

  constructor(private readonly options: StorageOptions = {}) {}

  /**
   * Get or create the database adapter
   */
  getEngine(): DatabaseAdapter {
    if (this.engine === null) {
      const databaseUrl = this.options.databaseUrl ?? getSettings().databaseUrl;
      const factory = this.options.adapterFactory ?? createDatabaseAdapter;
      this.engine = factory(databaseUrl);
      this.closed = false;
      logger.info('Creating database connection', { dialect: this.engine.dialect });
    }
    return this.engine;
  }

  /** True after `close()` until the next operation reconnects */
  get isClosed(): boolean {
    return this.closed;
  }

  async close(): Promise<void> {
    const engine = this.engine;
    this.engine = null;
    this.closed = true;
    if (engine) {
      await engine.close();
      logger.info('Database connection closed');
    }
  }

  // ==========================================================================
  // DDL
  // ==========================================================================

  async createMetadataTable(): Promise<void> {
    await this.createTable(METADATA_SCHEMA);
    logger.info('Dataset metadata table created/verified');
  }

  async createTableFromSchema(descriptor: SchemaDescriptor): Promise<void> {
    logger.info('Creating table', { table: descriptor.tableName });
    await this.createTable(descriptor);
    logger.info('Table created/verified with indexes', {
      table: descriptor.tableName,
      indexes: descriptor.indexes.length,
    });
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  /**
   * Batched multi-row insert in one transaction, then a metadata update
   * carrying the table's new total row count.
   *
   * @returns rows written
   * @throws SchemaMismatchError when the table is missing or lacks a record column
   */
  async storeData(
    records: CleanedRecordSet,
    tableName: string,
    datasetId: string,
    options: StoreOptions = {}
  ): Promise<number> {
    const mode = options.mode ?? 'append';
    logger.info('Storing records', { table: tableName, datasetId, records: records.rows.length, mode });

    try {
      const engine = this.getEngine();
      await this.createTable(METADATA_SCHEMA);
      await this.reconcileColumns(records, tableName);

      const columns = records.columns;
      const size = batchSize(columns.length, engine.maxParameters);

      await engine.transaction(async () => {
        if (mode === 'replace') {
          await engine.execute(buildDeleteAll(engine, tableName));
        }
        for (let start = 0; columns.length > 0 && start < records.rows.length; start += size) {
          const batch = records.rows.slice(start, start + size);
          const params = batch.flatMap((row) => columns.map((column) => row[column] ?? null));
          await engine.execute(buildInsert(engine, tableName, columns, batch.length), params);
        }
      });

      const total = await this.countRows(tableName);
      await this.updateMetadata(datasetId, tableName, total, options.datasetName);

      logger.info('Successfully stored records', { table: tableName, records: records.rows.length, total });
      return records.rows.length;
    } catch (error) {
      logger.error('Failed to store data', { table: tableName, datasetId, ...errorMetadata(error) });
      await this.recordFailure(datasetId, tableName, options.datasetName);
      throw error;
    }
  }

  /**
   * One `INSERT ... ON CONFLICT DO UPDATE` per row, committed once
   *
   * @returns rows written
   */
  async upsertData(
    records: CleanedRecordSet,
    tableName: string,
    datasetId: string,
    uniqueColumns: readonly string[],
    options: UpsertOptions = {}
  ): Promise<number> {
    logger.info('Upserting records', { table: tableName, datasetId, records: records.rows.length });

    try {
      if (uniqueColumns.length === 0) {
        throw new Error(`Upsert into ${tableName} needs at least one unique column`);
      }
      const missingKeys = uniqueColumns.filter((column) => !records.columns.includes(column));
      if (missingKeys.length > 0) {
        throw new Error(`Unique columns not present in records for ${tableName}: ${missingKeys.join(', ')}`);
      }

      const engine = this.getEngine();
      await this.createTable(METADATA_SCHEMA);
      await this.reconcileColumns(records, tableName);

      const columns = records.columns;
      const sql = buildUpsert(engine, tableName, columns, uniqueColumns);
      await engine.transaction(async () => {
        for (const row of records.rows) {
          await engine.execute(
            sql,
            columns.map((column) => row[column] ?? null)
          );
        }
      });

      const total = await this.countRows(tableName);
      await this.updateMetadata(datasetId, tableName, total, options.datasetName);

      logger.info('Successfully upserted records', { table: tableName, records: records.rows.length, total });
      return records.rows.length;
    } catch (error) {
      logger.error('Failed to upsert data', { table: tableName, datasetId, ...errorMetadata(error) });
      await this.recordFailure(datasetId, tableName, options.datasetName);
      throw error;
    }
  }

  // ==========================================================================
  // Metadata
  // ==========================================================================

  async getMetadata(datasetId: string): Promise<DatasetMetadata | null> {
    await this.createTable(METADATA_SCHEMA);
    const engine = this.getEngine();
    const row = await engine.queryOne(
      `SELECT * FROM ${engine.quoteIdentifier(METADATA_TABLE)} WHERE ${engine.quoteIdentifier('dataset_id')} = ?`,
      [datasetId]
    );
    return row ? toDatasetMetadata(row) : null;
  }

  async listMetadata(): Promise<DatasetMetadata[]> {
    await this.createTable(METADATA_SCHEMA);
    const engine = this.getEngine();
    const rows = await engine.queryMany(
      `SELECT * FROM ${engine.quoteIdentifier(METADATA_TABLE)} ORDER BY ${engine.quoteIdentifier('dataset_id')}`
    );
    return rows.map(toDatasetMetadata);
  }

  // ==========================================================================
  // Export and reads
  // ==========================================================================

  /**
   * Write a SNAPPY-compressed Parquet snapshot
   *
   * @returns the file written, `<processed dir>/<datasetId>.parquet` by default
   */
  async exportToParquet(
    records: CleanedRecordSet,
    datasetId: string,
    outputPath?: string
  ): Promise<string> {
    const path =
      outputPath ?? join(this.options.processedDir ?? getSettings().paths.processed, `${datasetId}.parquet`);
    logger.info('Exporting to Parquet', { datasetId, path });

    try {
      const written = await writeParquet(records, path);
      logger.info('Successfully exported records to Parquet', { datasetId, records: written });
      return path;
    } catch (error) {
      logger.error('Failed to export to Parquet', { datasetId, path, ...errorMetadata(error) });
      throw error;
    }
  }

  /**
   * Run a read query. Bind values with `?`; on PostgreSQL a query that has
   * parameters must not contain any other `?`, such as one in a string
   * literal or the jsonb `?` operator.
   */
  async queryData(sql: string, params: ReadonlyArray<unknown> = []): Promise<ReadonlyArray<SqlRow>> {
    try {
      return await this.getEngine().queryMany(sql, params);
    } catch (error) {
      logger.error('Query failed', errorMetadata(error));
      throw error;
    }
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async createTable(descriptor: SchemaDescriptor): Promise<void> {
    const engine = this.getEngine();
    await engine.execute(buildCreateTable(engine, descriptor));
    for (const statement of buildCreateIndexes(engine, descriptor)) {
      await engine.execute(statement);
    }
  }

  private async reconcileColumns(records: CleanedRecordSet, tableName: string): Promise<void> {
    const tableColumns = await this.getEngine().tableColumns(tableName);
    if (tableColumns.length === 0) {
      throw new SchemaMismatchError(tableName, [], false);
    }
    const known = new Set(tableColumns);
    const unknown = records.columns.filter((column) => !known.has(column));
    if (unknown.length > 0) {
      throw new SchemaMismatchError(tableName, unknown, true);
    }
  }

  private async countRows(tableName: string): Promise<number> {
    const engine = this.getEngine();
    const row = await engine.queryOne(buildCount(engine, tableName));
    return toNullableNumber(row?.count) ?? 0;
  }

  private async updateMetadata(
    datasetId: string,
    tableName: string,
    recordCount: number,
    datasetName: string | undefined
  ): Promise<void> {
    const engine = this.getEngine();
    const table = engine.quoteIdentifier(METADATA_TABLE);
    await engine.execute(
      `INSERT INTO ${table} (dataset_id, dataset_name, table_name, last_ingestion, record_count, status)
       VALUES (?, ?, ?, CURRENT_TIMESTAMP, ?, 'success')
       ON CONFLICT (dataset_id) DO UPDATE SET
         dataset_name = COALESCE(EXCLUDED.dataset_name, ${table}.dataset_name),
         table_name = EXCLUDED.table_name,
         last_ingestion = EXCLUDED.last_ingestion,
         record_count = EXCLUDED.record_count,
         status = EXCLUDED.status`,
      [datasetId, datasetName ?? null, tableName, recordCount]
    );
  }

  /**
   * Best effort; the caller re-throws the original error either way
   */
  private async recordFailure(
    datasetId: string,
    tableName: string,
    datasetName: string | undefined
  ): Promise<void> {
    try {
      await this.createTable(METADATA_SCHEMA);
      const engine = this.getEngine();
      const table = engine.quoteIdentifier(METADATA_TABLE);
      await engine.execute(
        `INSERT INTO ${table} (dataset_id, dataset_name, table_name, last_ingestion, record_count, status)
         VALUES (?, ?, ?, CURRENT_TIMESTAMP, NULL, 'failure')
         ON CONFLICT (dataset_id) DO UPDATE SET
           last_ingestion = EXCLUDED.last_ingestion,
           status = EXCLUDED.status`,
        [datasetId, datasetName ?? null, tableName]
      );
    } catch (error) {
      logger.warn('Could not record ingestion failure', { datasetId, ...errorMetadata(error) });
    }
  }
}
