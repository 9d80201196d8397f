/**
 * Food Gap Atlas
 *
 * NYC Open Data ingestion (Socrata -> cleaned record sets -> PostgreSQL/PostGIS
 * or SQLite) and the food supply gap GeoJSON API.
 */

export * from './core/errors.js';
export * from './core/types/schema.js';
export * from './core/types/records.js';
export type { DatabaseAdapter, DatabaseDialect, SqlRow } from './core/types/database.js';
export { loadSettings, getSettings, type Settings } from './core/config.js';
export { logger, createLogger } from './core/utils/logger.js';

export {
  BaseDatasetTransformer,
  METADATA_COLUMNS,
  standardizeColumnName,
  type DatasetTransformer,
  type TransformerOptions,
} from './transformation/base-transformer.js';
export { loadDatasetConfig, parseDatasetConfig, type DatasetConfig } from './transformation/dataset-config.js';
export { geoJsonToSpatialValue, spatialTextToGeoJson, WGS84_SRID } from './transformation/geometry.js';
export { getTransformer, listDatasets } from './transformation/registry.js';
export { Ntas2020Transformer } from './transformation/datasets/ntas-2020.js';
export { FoodSupplyGapsTransformer } from './transformation/datasets/food-supply-gaps.js';

export { DataStorage, type DatasetMetadata, type StoreOptions, type StoreMode } from './persistence/storage.js';
export { createDatabaseAdapter, parseDatabaseUrl } from './persistence/adapters/factory.js';

export { SocrataClient } from './extraction/socrata-client.js';
export { ingestDataset, extractDataset, type IngestResult, type IngestMode } from './ingestion/pipeline.js';

export { FoodGapService, type FoodGapCollection } from './serving/food-gap-service.js';
export { FoodGapAPI } from './serving/api.js';
