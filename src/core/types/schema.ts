/**
 * Schema Descriptor Types
 *
 * Declarative table definition produced by each dataset transformer and
 * consumed by the storage layer to emit DDL. Descriptors are validated and
 * frozen at construction, so DDL generation never sees a malformed one.
 *
 * TYPE SAFETY: readonly everywhere. A descriptor is immutable once built.
 */

import { SchemaDefinitionError } from '../errors.js';

// ============================================================================
// Descriptor Types
// ============================================================================

export interface ColumnDefinition {
  readonly name: string;
  /** DDL type string, e.g. `VARCHAR(20)`, `NUMERIC`, `GEOMETRY(MULTIPOLYGON, 4326)` */
  readonly type: string;
  readonly nullable: boolean;
  /** Must be present in every transformed record set */
  readonly required: boolean;
  readonly primaryKey: boolean;
  /** Literal or SQL expression, emitted verbatim after DEFAULT */
  readonly default?: string;
}

export interface IndexDefinition {
  readonly name: string;
  readonly columns: readonly string[];
}

export interface SchemaDescriptor {
  readonly tableName: string;
  readonly columns: readonly ColumnDefinition[];
  readonly indexes: readonly IndexDefinition[];
  readonly constraints: readonly string[];
}

/**
 * Column input with optional flags (defaults: nullable, not required, not key)
 */
export interface ColumnInput {
  readonly name: string;
  readonly type: string;
  readonly nullable?: boolean;
  readonly required?: boolean;
  readonly primaryKey?: boolean;
  readonly default?: string;
}

export interface SchemaInput {
  readonly tableName: string;
  readonly columns: readonly ColumnInput[];
  readonly indexes?: readonly IndexDefinition[];
  readonly constraints?: readonly string[];
}

// ============================================================================
// Construction
// ============================================================================

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Build a validated, frozen schema descriptor.
 *
 * @throws SchemaDefinitionError listing every problem found
 */
export function defineSchema(input: SchemaInput): SchemaDescriptor {
  const issues: string[] = [];

  if (!IDENTIFIER_PATTERN.test(input.tableName)) {
    issues.push(`invalid table name "${input.tableName}"`);
  }
  if (input.columns.length === 0) {
    issues.push('at least one column is required');
  }

  const seen = new Set<string>();
  for (const column of input.columns) {
    if (!IDENTIFIER_PATTERN.test(column.name)) {
      issues.push(`invalid column name "${column.name}"`);
    }
    if (seen.has(column.name)) {
      issues.push(`duplicate column "${column.name}"`);
    }
    if (column.type.trim() === '') {
      issues.push(`column "${column.name}" has no type`);
    }
    seen.add(column.name);
  }

  const indexNames = new Set<string>();
  for (const index of input.indexes ?? []) {
    if (!IDENTIFIER_PATTERN.test(index.name)) {
      issues.push(`invalid index name "${index.name}"`);
    }
    if (indexNames.has(index.name)) {
      issues.push(`duplicate index "${index.name}"`);
    }
    indexNames.add(index.name);
    if (index.columns.length === 0) {
      issues.push(`index "${index.name}" has no columns`);
    }
    for (const column of index.columns) {
      if (!seen.has(column)) {
        issues.push(`index "${index.name}" references unknown column "${column}"`);
      }
    }
  }

  if (issues.length > 0) {
    throw new SchemaDefinitionError(
      `Invalid schema for ${input.tableName}: ${issues.join('; ')}`,
      input.tableName,
      issues
    );
  }

  const columns = input.columns.map((column): ColumnDefinition => {
    const primaryKey = column.primaryKey ?? false;
    return Object.freeze({
      name: column.name,
      type: column.type.trim(),
      nullable: primaryKey ? false : (column.nullable ?? true),
      required: column.required ?? false,
      primaryKey,
      ...(column.default !== undefined ? { default: column.default } : {}),
    });
  });

  return Object.freeze({
    tableName: input.tableName,
    columns: Object.freeze(columns),
    indexes: Object.freeze(
      (input.indexes ?? []).map((index) =>
        Object.freeze({ name: index.name, columns: Object.freeze([...index.columns]) })
      )
    ),
    constraints: Object.freeze([...(input.constraints ?? [])]),
  });
}

/**
 * Return a new descriptor with extra columns appended after the declared ones.
 * Columns already declared are kept as they are.
 */
export function extendSchema(
  descriptor: SchemaDescriptor,
  extraColumns: readonly ColumnInput[]
): SchemaDescriptor {
  const existing = new Set(descriptor.columns.map((column) => column.name));
  return defineSchema({
    tableName: descriptor.tableName,
    columns: [
      ...descriptor.columns,
      ...extraColumns.filter((column) => !existing.has(column.name)),
    ],
    indexes: descriptor.indexes,
    constraints: descriptor.constraints,
  });
}

// ============================================================================
// Accessors
// ============================================================================

export function primaryKeyColumns(descriptor: SchemaDescriptor): readonly string[] {
  return descriptor.columns.filter((column) => column.primaryKey).map((column) => column.name);
}

/**
 * Columns that every transformed record set must contain
 */
export function requiredColumns(descriptor: SchemaDescriptor): readonly string[] {
  return descriptor.columns
    .filter((column) => column.required || column.primaryKey)
    .map((column) => column.name);
}

export function findColumn(
  descriptor: SchemaDescriptor,
  name: string
): ColumnDefinition | undefined {
  return descriptor.columns.find((column) => column.name === name);
}
