/**
 * Ingestion Pipeline
 *
 * extract (Socrata) -> transform (dataset transformer) -> create table ->
 * store | upsert -> optional Parquet snapshot
 *
 * One dataset snapshot per run. The caller owns the storage and closes it.
 */

import type { RawTable } from '../core/types/records.js';
import { primaryKeyColumns } from '../core/types/schema.js';
import { createLogger } from '../core/utils/logger.js';
import type { SocrataClient } from '../extraction/socrata-client.js';
import type { DataStorage } from '../persistence/storage.js';
import type { DatasetTransformer } from '../transformation/base-transformer.js';
import { loadDatasetConfig } from '../transformation/dataset-config.js';
import { getTransformer } from '../transformation/registry.js';

const logger = createLogger({ module: 'pipeline' });

export type IngestMode = 'append' | 'replace' | 'upsert';

export interface IngestOptions {
  readonly storage: DataStorage;
  /** Default `replace` */
  readonly mode?: IngestMode;
  /** Conflict target for `upsert`; defaults to the schema's primary key */
  readonly uniqueColumns?: readonly string[];
  /** `true` for the default location, or an explicit file path */
  readonly exportParquet?: boolean | string;
  /** Descriptor directory, when not the configured one */
  readonly configDir?: string;
  readonly now?: () => Date;
  /** Use this transformer instead of the registered one */
  readonly transformer?: DatasetTransformer;
}

export interface IngestResult {
  readonly datasetId: string;
  readonly tableName: string;
  readonly mode: IngestMode;
  readonly recordsRead: number;
  readonly recordsWritten: number;
  readonly parquetPath: string | null;
}

/**
 * Transform a raw extract and load it into the dataset's table
 */
export async function ingestDataset(
  datasetId: string,
  raw: RawTable,
  options: IngestOptions
): Promise<IngestResult> {
  const { storage } = options;
  const mode = options.mode ?? 'replace';
  const transformer =
    options.transformer ?? getTransformer(datasetId, { configDir: options.configDir, now: options.now });

  const schema = transformer.getSchema();
  const records = transformer.transform(raw);

  await storage.createMetadataTable();
  await storage.createTableFromSchema(schema);

  let recordsWritten: number;
  if (mode === 'upsert') {
    const uniqueColumns = options.uniqueColumns ?? primaryKeyColumns(schema);
    recordsWritten = await storage.upsertData(records, schema.tableName, datasetId, uniqueColumns, {
      datasetName: transformer.datasetName,
    });
  } else {
    recordsWritten = await storage.storeData(records, schema.tableName, datasetId, {
      mode,
      datasetName: transformer.datasetName,
    });
  }

  let parquetPath: string | null = null;
  if (options.exportParquet !== undefined && options.exportParquet !== false) {
    parquetPath = await storage.exportToParquet(
      records,
      datasetId,
      typeof options.exportParquet === 'string' ? options.exportParquet : undefined
    );
  }

  logger.info('Ingestion complete', {
    datasetId,
    table: schema.tableName,
    mode,
    recordsRead: raw.rows.length,
    recordsWritten,
  });

  return {
    datasetId,
    tableName: schema.tableName,
    mode,
    recordsRead: raw.rows.length,
    recordsWritten,
    parquetPath,
  };
}

export interface ExtractOptions {
  readonly client: SocrataClient;
  readonly limit?: number;
  readonly configDir?: string;
}

/**
 * Fetch a dataset's rows from its configured Socrata resource
 */
export async function extractDataset(datasetId: string, options: ExtractOptions): Promise<RawTable> {
  const config =
    options.configDir === undefined ? loadDatasetConfig(datasetId) : loadDatasetConfig(datasetId, options.configDir);
  if (!config.socrataId) {
    throw new Error(`Dataset ${datasetId} has no Socrata resource id configured`);
  }
  logger.info('Extracting dataset', { datasetId, resourceId: config.socrataId });
  return options.client.fetchRows(config.socrataId, { limit: options.limit });
}
