/**
 * Food Gap Atlas Error Types
 *
 * Structural failures raised by the transformation and storage layers.
 * Row-level data quality problems never surface here: they degrade to null.
 */

/**
 * Thrown when a transformed dataset lacks columns its schema marks
 * required or primary-key. Raised before any storage is attempted.
 */
export class DatasetValidationError extends Error {
  constructor(
    public readonly datasetId: string,
    public readonly datasetName: string,
    public readonly missingColumns: readonly string[]
  ) {
    super(`Missing required columns for ${datasetName}: ${missingColumns.join(', ')}`);
    this.name = 'DatasetValidationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DatasetValidationError);
    }
  }
}

/**
 * Thrown when a schema descriptor is malformed (duplicate columns, index on
 * an unknown column, unparseable dataset configuration).
 */
export class SchemaDefinitionError extends Error {
  constructor(
    message: string,
    public readonly tableName: string | null,
    public readonly issues: readonly string[] = []
  ) {
    super(message);
    this.name = 'SchemaDefinitionError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SchemaDefinitionError);
    }
  }
}

/**
 * Thrown when a record set does not fit its destination table.
 *
 * RECOVERY:
 * - Create the table from the transformer's schema before storing
 * - Check the rename map for columns the table does not declare
 */
export class SchemaMismatchError extends Error {
  constructor(
    public readonly tableName: string,
    public readonly unknownColumns: readonly string[],
    public readonly tableExists: boolean
  ) {
    super(
      tableExists
        ? `Columns not present in table ${tableName}: ${unknownColumns.join(', ')}`
        : `Destination table ${tableName} does not exist`
    );
    this.name = 'SchemaMismatchError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SchemaMismatchError);
    }
  }
}

/**
 * Thrown when no transformer is registered for a dataset id
 */
export class UnknownDatasetError extends Error {
  constructor(
    public readonly datasetId: string,
    public readonly knownDatasets: readonly string[]
  ) {
    super(`Unknown dataset: ${datasetId}. Known datasets: ${knownDatasets.join(', ')}`);
    this.name = 'UnknownDatasetError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UnknownDatasetError);
    }
  }
}

export class ConfigurationError extends Error {
  constructor(message: string, public readonly issues: readonly string[] = []) {
    super(message);
    this.name = 'ConfigurationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigurationError);
    }
  }
}

/**
 * Thrown when the open data portal answers with a non-2xx status or a body
 * that is not an array of row objects
 */
export class ExtractionError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status: number | null = null
  ) {
    super(message);
    this.name = 'ExtractionError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ExtractionError);
    }
  }
}
