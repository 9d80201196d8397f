/**
 * Schema descriptor construction tests
 */

import { describe, it, expect } from 'vitest';
import { SchemaDefinitionError } from '../../../core/errors.js';
import {
  defineSchema,
  extendSchema,
  findColumn,
  primaryKeyColumns,
  requiredColumns,
} from '../../../core/types/schema.js';

describe('defineSchema', () => {
  it('fills flag defaults and forces primary keys non-nullable', () => {
    const schema = defineSchema({
      tableName: 'places',
      columns: [
        { name: 'id', type: 'VARCHAR(10)', primaryKey: true, nullable: true },
        { name: 'label', type: ' TEXT ' },
      ],
    });

    expect(schema.columns).toEqual([
      { name: 'id', type: 'VARCHAR(10)', nullable: false, required: false, primaryKey: true },
      { name: 'label', type: 'TEXT', nullable: true, required: false, primaryKey: false },
    ]);
    expect(schema.indexes).toEqual([]);
    expect(schema.constraints).toEqual([]);
  });

  it('returns a frozen descriptor', () => {
    const schema = defineSchema({ tableName: 't', columns: [{ name: 'a', type: 'INTEGER' }] });

    expect(Object.isFrozen(schema)).toBe(true);
    expect(Object.isFrozen(schema.columns)).toBe(true);
    expect(Object.isFrozen(schema.columns[0])).toBe(true);
  });

  it('rejects duplicate columns and indexes on unknown columns', () => {
    let caught: unknown;
    try {
      defineSchema({
        tableName: 't',
        columns: [
          { name: 'a', type: 'INTEGER' },
          { name: 'a', type: 'TEXT' },
        ],
        indexes: [{ name: 'idx_t_b', columns: ['b'] }],
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SchemaDefinitionError);
    if (caught instanceof SchemaDefinitionError) {
      expect(caught.tableName).toBe('t');
      expect(caught.issues).toEqual([
        'duplicate column "a"',
        'index "idx_t_b" references unknown column "b"',
      ]);
    }
  });

  it('rejects identifiers that would need quoting tricks', () => {
    expect(() =>
      defineSchema({ tableName: 'bad name', columns: [{ name: 'a', type: 'INTEGER' }] })
    ).toThrow('invalid table name "bad name"');
  });
});

describe('schema accessors', () => {
  const schema = defineSchema({
    tableName: 'gaps',
    columns: [
      { name: 'nta_code', type: 'VARCHAR(10)', primaryKey: true },
      { name: 'year', type: 'INTEGER', primaryKey: true },
      { name: 'supply_gap_lbs', type: 'DOUBLE PRECISION', required: true },
      { name: 'rank', type: 'INTEGER' },
    ],
  });

  it('lists primary key and required columns in declaration order', () => {
    expect(primaryKeyColumns(schema)).toEqual(['nta_code', 'year']);
    expect(requiredColumns(schema)).toEqual(['nta_code', 'year', 'supply_gap_lbs']);
  });

  it('extends with new columns only', () => {
    const extended = extendSchema(schema, [
      { name: 'rank', type: 'TEXT' },
      { name: 'dataset_id', type: 'VARCHAR(20)', nullable: false },
    ]);

    expect(extended.columns.map((column) => column.name)).toEqual([
      'nta_code',
      'year',
      'supply_gap_lbs',
      'rank',
      'dataset_id',
    ]);
    expect(findColumn(extended, 'rank')?.type).toBe('INTEGER');
    expect(findColumn(extended, 'dataset_id')?.nullable).toBe(false);
    expect(schema.columns).toHaveLength(4);
  });
});
