/**
 * Transformer Registry
 *
 * Maps dataset ids to transformer factories. Adding a dataset means adding a
 * YAML descriptor under `config/datasets/` and one entry here.
 */

import { UnknownDatasetError } from '../core/errors.js';
import type { DatasetTransformer, TransformerOptions } from './base-transformer.js';
import { loadDatasetConfig, type DatasetConfig } from './dataset-config.js';
import { FOOD_SUPPLY_GAPS_DATASET_ID, FoodSupplyGapsTransformer } from './datasets/food-supply-gaps.js';
import { NTAS_2020_DATASET_ID, Ntas2020Transformer } from './datasets/ntas-2020.js';

type TransformerFactory = (config: DatasetConfig, options: TransformerOptions) => DatasetTransformer;

const FACTORIES: ReadonlyMap<string, TransformerFactory> = new Map<string, TransformerFactory>([
  [NTAS_2020_DATASET_ID, (config, options) => new Ntas2020Transformer(config, options)],
  [FOOD_SUPPLY_GAPS_DATASET_ID, (config, options) => new FoodSupplyGapsTransformer(config, options)],
]);

export interface GetTransformerOptions extends TransformerOptions {
  /** Directory holding `<dataset_id>.yaml` descriptors */
  readonly configDir?: string;
}

/**
 * Registered dataset ids, sorted
 */
export function listDatasets(): string[] {
  return [...FACTORIES.keys()].sort();
}

export function isRegisteredDataset(datasetId: string): boolean {
  return FACTORIES.has(datasetId);
}

/**
 * Build the transformer for a dataset from its YAML descriptor
 *
 * @throws UnknownDatasetError for an unregistered id
 */
export function getTransformer(
  datasetId: string,
  options: GetTransformerOptions = {}
): DatasetTransformer {
  const factory = FACTORIES.get(datasetId);
  if (!factory) {
    throw new UnknownDatasetError(datasetId, listDatasets());
  }
  const { configDir, ...transformerOptions } = options;
  const config = configDir === undefined ? loadDatasetConfig(datasetId) : loadDatasetConfig(datasetId, configDir);
  return factory(config, transformerOptions);
}
