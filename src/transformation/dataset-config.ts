/**
 * Dataset Configuration Loader
 *
 * Each dataset ships a YAML file under `config/datasets/<dataset_id>.yaml`
 * declaring its identity, Socrata source and destination table schema.
 * Column order in the YAML mapping is the DDL column order.
 *
 * @module transformation/dataset-config
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { getSettings } from '../core/config.js';
import { SchemaDefinitionError } from '../core/errors.js';
import { defineSchema, type SchemaDescriptor } from '../core/types/schema.js';

const columnSchema = z.object({
  type: z.string().min(1),
  nullable: z.boolean().optional(),
  required: z.boolean().optional(),
  primary_key: z.boolean().optional(),
  default: z.union([z.string(), z.number()]).optional(),
});

const datasetFileSchema = z.object({
  dataset_id: z.string().min(1),
  dataset_name: z.string().min(1),
  source: z
    .object({
      socrata_id: z.string().regex(/^[a-z0-9]{4}-[a-z0-9]{4}$/, 'expected a Socrata 4x4 id').optional(),
    })
    .default({}),
  data_schema: z.object({
    table_name: z.string().min(1),
    columns: z.record(columnSchema),
    indexes: z
      .array(z.object({ name: z.string().min(1), columns: z.array(z.string()).min(1) }))
      .default([]),
    constraints: z.array(z.string()).default([]),
  }),
});

export interface DatasetConfig {
  readonly datasetId: string;
  readonly datasetName: string;
  readonly socrataId?: string;
  readonly schema: SchemaDescriptor;
}

/**
 * Validate parsed YAML into a dataset configuration
 *
 * @throws SchemaDefinitionError when the document or its schema is malformed
 */
export function parseDatasetConfig(document: unknown, source = '(inline)'): DatasetConfig {
  const parsed = datasetFileSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new SchemaDefinitionError(`Invalid dataset configuration ${source}`, null, issues);
  }

  const { data_schema: dataSchema } = parsed.data;
  const schema = defineSchema({
    tableName: dataSchema.table_name,
    columns: Object.entries(dataSchema.columns).map(([name, column]) => ({
      name,
      type: column.type,
      nullable: column.nullable,
      required: column.required,
      primaryKey: column.primary_key,
      default: column.default === undefined ? undefined : String(column.default),
    })),
    indexes: dataSchema.indexes,
    constraints: dataSchema.constraints,
  });

  return {
    datasetId: parsed.data.dataset_id,
    datasetName: parsed.data.dataset_name,
    ...(parsed.data.source.socrata_id ? { socrataId: parsed.data.source.socrata_id } : {}),
    schema,
  };
}

/**
 * Read `<dir>/<datasetId>.yaml`
 */
export function loadDatasetConfig(
  datasetId: string,
  dir: string = getSettings().paths.datasets
): DatasetConfig {
  const path = join(dir, `${datasetId}.yaml`);
  let document: unknown;
  try {
    document = parseYaml(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new SchemaDefinitionError(
      `Failed to read dataset configuration ${path}: ${error instanceof Error ? error.message : String(error)}`,
      null
    );
  }

  const config = parseDatasetConfig(document, path);
  if (config.datasetId !== datasetId) {
    throw new SchemaDefinitionError(
      `Dataset configuration ${path} declares dataset_id ${config.datasetId}, expected ${datasetId}`,
      config.schema.tableName
    );
  }
  return config;
}
