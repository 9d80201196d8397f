/**
 * Datasets Command
 *
 * List the registered datasets and their destination tables.
 */

import type { Command } from 'commander';
import { loadDatasetConfig } from '../../transformation/dataset-config.js';
import { listDatasets } from '../../transformation/registry.js';

export interface DatasetSummary {
  readonly datasetId: string;
  readonly datasetName: string;
  readonly tableName: string;
  readonly socrataId: string | null;
}

export function describeDatasets(configDir?: string): DatasetSummary[] {
  return listDatasets().map((datasetId) => {
    const config = configDir === undefined ? loadDatasetConfig(datasetId) : loadDatasetConfig(datasetId, configDir);
    return {
      datasetId,
      datasetName: config.datasetName,
      tableName: config.schema.tableName,
      socrataId: config.socrataId ?? null,
    };
  });
}

export function registerDatasetsCommand(program: Command): void {
  program
    .command('datasets')
    .description('List registered datasets')
    .option('--json', 'Output as JSON')
    .action((options: { json?: boolean }) => {
      const datasets = describeDatasets();
      if (options.json) {
        console.log(JSON.stringify(datasets, null, 2));
        return;
      }
      for (const dataset of datasets) {
        console.log(`${dataset.datasetId.padEnd(20)} ${dataset.tableName.padEnd(20)} ${dataset.socrataId ?? '-'}  ${dataset.datasetName}`);
      }
    });
}
