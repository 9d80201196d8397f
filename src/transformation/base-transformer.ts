/**
 * Dataset Transformer Base
 *
 * ARCHITECTURE:
 * - `DatasetTransformer` is the capability every dataset implements
 *   (`transform`, `getSchema`)
 * - `BaseDatasetTransformer` supplies the cleaning pipeline as a fixed
 *   sequence of protected steps; a dataset overrides the steps it needs
 * - The registry maps dataset ids to transformer factories
 *
 * Pipeline order:
 *   1. renameColumns          explicit source -> destination names
 *   2. dropPlatformColumns    Socrata bookkeeping columns (`:id`, `:updated_at`)
 *   3. coerceNumericColumns   unparseable values become null, rows are kept
 *   4. convertGeometries      GeoJSON -> SRID 4326 WKT, bad rows become null
 *   5. addMetadata            dataset_id + one ingestion_timestamp per batch
 *   6. validateRequiredColumns
 *
 * The input table is never mutated: every step returns new rows.
 */

import { DatasetValidationError } from '../core/errors.js';
import {
  SpatialValue,
  type CellValue,
  type CleanedRecord,
  type CleanedRecordSet,
  type RawRecord,
  type RawTable,
} from '../core/types/records.js';
import {
  extendSchema,
  requiredColumns,
  type ColumnInput,
  type SchemaDescriptor,
} from '../core/types/schema.js';
import { createLogger } from '../core/utils/logger.js';
import type { DatasetConfig } from './dataset-config.js';
import { geoJsonToSpatialValue } from './geometry.js';

const logger = createLogger({ module: 'transformer' });

/** Prefix Socrata puts on platform-injected columns */
export const PLATFORM_COLUMN_PREFIX = ':';

/** Metadata columns appended to every dataset's schema */
export const METADATA_COLUMNS: readonly ColumnInput[] = [
  { name: 'dataset_id', type: 'VARCHAR(20)', nullable: false },
  {
    name: 'ingestion_timestamp',
    type: 'TIMESTAMP',
    nullable: false,
    default: 'CURRENT_TIMESTAMP',
  },
];

export interface DatasetTransformer {
  readonly datasetId: string;
  readonly datasetName: string;

  /**
   * Clean a raw extract into a storage-ready record set.
   *
   * @throws DatasetValidationError when required columns are missing
   */
  transform(raw: RawTable): CleanedRecordSet;

  /**
   * Destination table schema, including the metadata columns
   */
  getSchema(): SchemaDescriptor;
}

export interface TransformerOptions {
  /** Clock for the batch ingestion timestamp */
  readonly now?: () => Date;
}

export interface StandardizeOptions {
  /** Columns to leave untouched */
  readonly skip?: (column: string) => boolean;
}

export function isPlatformColumn(column: string): boolean {
  return column.startsWith(PLATFORM_COLUMN_PREFIX);
}

/**
 * Generic column-name normalizer: lowercase, strip punctuation, collapse
 * whitespace runs to `_`.
 */
export function standardizeColumnName(column: string): string {
  return column
    .toLowerCase()
    .replace(/[^\w\s]/g, '')
    .replace(/\s+/g, '_');
}

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse a numeric cell. Anything that is not a finite number or decimal
 * text yields null.
 */
export function coerceNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return DECIMAL_PATTERN.test(trimmed) ? Number(trimmed) : null;
  }
  return null;
}

function isBlank(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

function toCellValue(value: unknown): CellValue {
  if (value === undefined || value === null) {
    return null;
  }
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date ||
    value instanceof SpatialValue
  ) {
    return value;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  // Nested Socrata values (location objects, URL objects) are kept as JSON text
  return JSON.stringify(value);
}

function mapRows(
  table: RawTable,
  column: string,
  fn: (value: unknown, index: number) => unknown
): RawRecord[] {
  return table.rows.map((row, index) => ({ ...row, [column]: fn(row[column], index) }));
}

export abstract class BaseDatasetTransformer implements DatasetTransformer {
  /** Source column name -> destination column name */
  protected abstract readonly columnMapping: Readonly<Record<string, string>>;

  /** Destination columns holding numbers */
  protected abstract readonly numericColumns: readonly string[];

  protected readonly now: () => Date;

  constructor(
    protected readonly config: DatasetConfig,
    options: TransformerOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  get datasetId(): string {
    return this.config.datasetId;
  }

  get datasetName(): string {
    return this.config.datasetName;
  }

  transform(raw: RawTable): CleanedRecordSet {
    logger.info('Transforming dataset', {
      datasetId: this.datasetId,
      records: raw.rows.length,
    });

    let table = this.renameColumns(raw);
    table = this.dropPlatformColumns(table);
    table = this.coerceNumericColumns(table);
    table = this.convertGeometries(table);
    const cleaned = this.addMetadata(table);

    this.validateRequiredColumns(cleaned, requiredColumns(this.config.schema));

    logger.info('Transformed dataset', {
      datasetId: this.datasetId,
      records: cleaned.rows.length,
      columns: cleaned.columns.length,
    });
    return cleaned;
  }

  getSchema(): SchemaDescriptor {
    return extendSchema(this.config.schema, METADATA_COLUMNS);
  }

  // ==========================================================================
  // Pipeline Steps
  // ==========================================================================

  /**
   * Apply the explicit column mapping. Unmapped columns keep their names; when
   * two columns end up with the same name the first one wins.
   */
  protected renameColumns(table: RawTable): RawTable {
    return this.renameWith(table, (column) => this.columnMapping[column] ?? column);
  }

  protected dropPlatformColumns(table: RawTable): RawTable {
    const dropped = table.columns.filter(isPlatformColumn);
    if (dropped.length === 0) {
      return table;
    }
    const columns = table.columns.filter((column) => !isPlatformColumn(column));
    const rows = table.rows.map((row) => {
      const kept: Record<string, unknown> = {};
      for (const column of columns) {
        if (column in row) {
          kept[column] = row[column];
        }
      }
      return kept;
    });
    logger.debug('Dropped platform columns', { datasetId: this.datasetId, dropped });
    return { columns, rows };
  }

  protected coerceNumericColumns(table: RawTable): RawTable {
    let rows = table.rows;
    for (const column of this.numericColumns) {
      if (!table.columns.includes(column)) {
        continue;
      }
      let coercedToNull = 0;
      rows = mapRows({ columns: table.columns, rows }, column, (value) => {
        const parsed = coerceNumber(value);
        if (parsed === null && !isBlank(value)) {
          coercedToNull++;
        }
        return parsed;
      });
      if (coercedToNull > 0) {
        logger.warn('Non-numeric values set to null', {
          datasetId: this.datasetId,
          column,
          count: coercedToNull,
        });
      }
    }
    return { columns: table.columns, rows };
  }

  protected convertGeometries(table: RawTable): RawTable {
    let rows = table.rows;
    for (const column of this.geometryColumns()) {
      if (!table.columns.includes(column)) {
        continue;
      }
      const promoteToMulti = /MULTIPOLYGON/i.test(this.columnType(column) ?? '');
      rows = mapRows({ columns: table.columns, rows }, column, (value, index) => {
        try {
          return geoJsonToSpatialValue(value, { promoteToMulti });
        } catch (error) {
          logger.warn('Failed to convert geometry', {
            datasetId: this.datasetId,
            column,
            row: index,
            error: error instanceof Error ? error.message : String(error),
          });
          return null;
        }
      });
    }
    return { columns: table.columns, rows };
  }

  protected addMetadata(table: RawTable): CleanedRecordSet {
    const ingestionTimestamp = this.now();
    const columns = [
      ...table.columns.filter((column) => column !== 'dataset_id' && column !== 'ingestion_timestamp'),
      'dataset_id',
      'ingestion_timestamp',
    ];
    const rows = table.rows.map((row): CleanedRecord => {
      const record: Record<string, CellValue> = {};
      for (const column of columns) {
        record[column] = toCellValue(row[column]);
      }
      record.dataset_id = this.datasetId;
      record.ingestion_timestamp = ingestionTimestamp;
      return record;
    });
    return { columns, rows };
  }

  /**
   * Column presence check (set difference); row-level nulls are not checked.
   *
   * @throws DatasetValidationError naming the dataset and the missing columns
   */
  protected validateRequiredColumns(
    table: { readonly columns: readonly string[] },
    required: readonly string[]
  ): void {
    const present = new Set(table.columns);
    const missing = [...new Set(required)].filter((column) => !present.has(column)).sort();
    if (missing.length > 0) {
      throw new DatasetValidationError(this.datasetId, this.datasetName, missing);
    }
  }

  // ==========================================================================
  // Helpers for subclasses
  // ==========================================================================

  /**
   * Geometry columns of the destination schema
   */
  protected geometryColumns(): readonly string[] {
    return this.config.schema.columns
      .filter((column) => /^(GEOMETRY|GEOGRAPHY)\b/i.test(column.type))
      .map((column) => column.name);
  }

  protected columnType(column: string): string | undefined {
    return this.config.schema.columns.find((definition) => definition.name === column)?.type;
  }

  protected standardizeColumnNames(table: RawTable, options: StandardizeOptions = {}): RawTable {
    return this.renameWith(table, (column) =>
      options.skip?.(column) ? column : standardizeColumnName(column)
    );
  }

  protected renameWith(table: RawTable, rename: (column: string) => string): RawTable {
    const sources = new Map<string, string>();
    for (const column of table.columns) {
      const target = rename(column);
      if (!sources.has(target)) {
        sources.set(target, column);
      }
    }
    const rows = table.rows.map((row) => {
      const renamed: Record<string, unknown> = {};
      for (const [target, source] of sources) {
        if (source in row) {
          renamed[target] = row[source];
        }
      }
      return renamed;
    });
    return { columns: [...sources.keys()], rows };
  }
}
