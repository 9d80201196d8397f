/**
 * Parquet snapshot writer
 *
 * Column types are inferred from the cleaned values: numbers as DOUBLE,
 * dates as TIMESTAMP_MILLIS, booleans as BOOLEAN, text and EWKT geometry as
 * UTF8. A column holding more than one kind of value is written as UTF8.
 * Every field is optional and SNAPPY-compressed.
 */

import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { ParquetSchema, ParquetWriter } from '@dsnp/parquetjs';
import { SpatialValue, type CellValue, type CleanedRecordSet } from '../core/types/records.js';

type ParquetSchemaDefinition = ConstructorParameters<typeof ParquetSchema>[0];
type ParquetFieldDefinition = ParquetSchemaDefinition[string];

export type ParquetColumnType = 'DOUBLE' | 'UTF8' | 'BOOLEAN' | 'TIMESTAMP_MILLIS';

function valueType(value: Exclude<CellValue, null>): ParquetColumnType {
  if (typeof value === 'number') {
    return 'DOUBLE';
  }
  if (typeof value === 'boolean') {
    return 'BOOLEAN';
  }
  if (value instanceof Date) {
    return 'TIMESTAMP_MILLIS';
  }
  return 'UTF8';
}

/**
 * Parquet type for a column; all-null columns default to UTF8
 */
export function inferColumnType(records: CleanedRecordSet, column: string): ParquetColumnType {
  const types = new Set<ParquetColumnType>();
  for (const row of records.rows) {
    const value = row[column];
    if (value !== null && value !== undefined) {
      types.add(valueType(value));
    }
  }
  const [only] = types;
  return types.size === 1 && only !== undefined ? only : 'UTF8';
}

function toParquetValue(value: Exclude<CellValue, null>, type: ParquetColumnType): unknown {
  if (type !== 'UTF8') {
    return value;
  }
  if (value instanceof SpatialValue) {
    return value.toEWKT();
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

export function buildParquetSchema(
  records: CleanedRecordSet
): { schema: ParquetSchema; types: ReadonlyMap<string, ParquetColumnType> } {
  const types = new Map<string, ParquetColumnType>();
  const definition: Record<string, ParquetFieldDefinition> = {};
  for (const column of records.columns) {
    const type = inferColumnType(records, column);
    types.set(column, type);
    definition[column] = { type, optional: true, compression: 'SNAPPY' };
  }
  return { schema: new ParquetSchema(definition), types };
}

/**
 * Write a record set to `path`, creating parent directories
 *
 * @returns rows written
 */
export async function writeParquet(records: CleanedRecordSet, path: string): Promise<number> {
  if (records.columns.length === 0) {
    throw new Error('Cannot export a record set with no columns to Parquet');
  }

  const { schema, types } = buildParquetSchema(records);
  await mkdir(dirname(path), { recursive: true });

  const writer = await ParquetWriter.openFile(schema, path);
  try {
    for (const row of records.rows) {
      const record: Record<string, unknown> = {};
      for (const [column, type] of types) {
        const value = row[column];
        // Absent keys are written as nulls for optional fields
        if (value !== null && value !== undefined) {
          record[column] = toParquetValue(value, type);
        }
      }
      await writer.appendRow(record);
    }
  } finally {
    await writer.close();
  }
  return records.rows.length;
}
