/**
 * Ingest Command
 *
 * Fetch a dataset from NYC Open Data (or read a local JSON export), clean
 * it and load it into the configured database.
 *
 * Usage:
 *   food-gap-atlas ingest <dataset-id> [options]
 *
 * Options:
 *   --mode <m>         append | replace | upsert (default: replace)
 *   --limit <n>        Max rows to fetch
 *   --input <file>     Read rows from a JSON array file instead of Socrata
 *   --parquet [path]   Also write a Parquet snapshot
 *   --json             JSON output mode
 *
 * Examples:
 *   food-gap-atlas ingest ntas_2020
 *   food-gap-atlas ingest food_supply_gaps --mode upsert --parquet
 */

import { readFile } from 'node:fs/promises';
import type { Command } from 'commander';
import { z } from 'zod';
import { getSettings } from '../../core/config.js';
import { tableFromRows, type RawTable } from '../../core/types/records.js';
import { SocrataClient } from '../../extraction/socrata-client.js';
import { extractDataset, ingestDataset, type IngestMode } from '../../ingestion/pipeline.js';
import { DataStorage } from '../../persistence/storage.js';

const ingestOptionsSchema = z.object({
  mode: z.enum(['append', 'replace', 'upsert']).default('replace'),
  limit: z.coerce.number().int().positive().optional(),
  input: z.string().optional(),
  parquet: z.union([z.boolean(), z.string()]).optional(),
  json: z.boolean().optional(),
});

const rowsFileSchema = z.array(z.record(z.unknown()));

export interface IngestCommandOptions {
  readonly mode: IngestMode;
  readonly limit?: number;
  readonly input?: string;
  readonly parquet?: boolean | string;
  readonly json?: boolean;
}

/**
 * Register the ingest command
 */
export function registerIngestCommand(program: Command): void {
  program
    .command('ingest <dataset-id>')
    .description('Fetch, clean and load one dataset')
    .option('-m, --mode <mode>', 'append | replace | upsert', 'replace')
    .option('-l, --limit <n>', 'Max rows to fetch')
    .option('-i, --input <file>', 'Read rows from a JSON array file instead of Socrata')
    .option('--parquet [path]', 'Also write a Parquet snapshot')
    .option('--json', 'Output result as JSON')
    .action(async (datasetId: string, rawOptions: unknown) => {
      const parsed = ingestOptionsSchema.safeParse(rawOptions);
      if (!parsed.success) {
        console.error(`\nError: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`);
        process.exitCode = 1;
        return;
      }
      await executeIngest(datasetId, parsed.data);
    });
}

async function readRowsFile(path: string): Promise<RawTable> {
  const document: unknown = JSON.parse(await readFile(path, 'utf-8'));
  const parsed = rowsFileSchema.safeParse(document);
  if (!parsed.success) {
    throw new Error(`${path} is not a JSON array of row objects`);
  }
  return tableFromRows(parsed.data);
}

/**
 * Execute the ingest command
 */
export async function executeIngest(datasetId: string, options: IngestCommandOptions): Promise<void> {
  const settings = getSettings();
  const storage = new DataStorage();

  try {
    const raw = options.input
      ? await readRowsFile(options.input)
      : await extractDataset(datasetId, {
          client: new SocrataClient(settings.socrata),
          limit: options.limit,
        });

    const result = await ingestDataset(datasetId, raw, {
      storage,
      mode: options.mode,
      exportParquet: options.parquet,
    });

    if (options.json) {
      console.log(JSON.stringify({ success: true, ...result }, null, 2));
    } else {
      console.log(`\nIngested ${result.datasetId} into ${result.tableName}`);
      console.log(`  Mode: ${result.mode}`);
      console.log(`  Rows read: ${result.recordsRead}`);
      console.log(`  Rows written: ${result.recordsWritten}`);
      if (result.parquetPath) {
        console.log(`  Parquet: ${result.parquetPath}`);
      }
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (options.json) {
      console.log(JSON.stringify({ success: false, datasetId, error: message }, null, 2));
    } else {
      console.error(`\nError: ${message}`);
    }
    process.exitCode = 1;
  } finally {
    await storage.close();
  }
}
