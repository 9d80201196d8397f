/**
 * SQL builder tests
 */

import { describe, expect, it } from 'vitest';
import { defineSchema } from '../../../core/types/schema.js';
import {
  batchSize,
  buildCount,
  buildCreateIndexes,
  buildCreateTable,
  buildDeleteAll,
  buildInsert,
  buildUpsert,
  type SqlDialect,
} from '../../../persistence/sql-builder.js';

const dialect: SqlDialect = {
  quoteIdentifier: (identifier) => `"${identifier.replace(/"/g, '""')}"`,
  columnType: (type) => (type.startsWith('GEOMETRY') ? 'TEXT' : type),
};

const schema = defineSchema({
  tableName: 'ntas',
  columns: [
    { name: 'nta2020', type: 'VARCHAR(10)', primaryKey: true },
    { name: 'boro_code', type: 'INTEGER', nullable: false },
    { name: 'geom', type: 'GEOMETRY(MULTIPOLYGON, 4326)' },
    { name: 'loaded_at', type: 'TIMESTAMP', nullable: false, default: 'CURRENT_TIMESTAMP' },
  ],
  indexes: [{ name: 'idx_ntas_boro', columns: ['boro_code', 'nta2020'] }],
  constraints: ['CHECK (boro_code BETWEEN 1 AND 5)'],
});

describe('buildCreateTable', () => {
  it('emits one fragment per column plus constraints', () => {
    expect(buildCreateTable(dialect, schema)).toBe(
      [
        'CREATE TABLE IF NOT EXISTS "ntas" (',
        '  "nta2020" VARCHAR(10) PRIMARY KEY,',
        '  "boro_code" INTEGER NOT NULL,',
        '  "geom" TEXT,',
        '  "loaded_at" TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP,',
        '  CHECK (boro_code BETWEEN 1 AND 5)',
        ')',
      ].join('\n')
    );
  });

  it('emits one index statement per index', () => {
    expect(buildCreateIndexes(dialect, schema)).toEqual([
      'CREATE INDEX IF NOT EXISTS "idx_ntas_boro" ON "ntas" ("boro_code", "nta2020")',
    ]);
  });
});

describe('write statements', () => {
  it('builds a multi-row insert', () => {
    expect(buildInsert(dialect, 'ntas', ['nta2020', 'boro_code'], 2)).toBe(
      'INSERT INTO "ntas" ("nta2020", "boro_code") VALUES (?, ?), (?, ?)'
    );
  });

  it('builds an upsert that updates non-key columns', () => {
    expect(buildUpsert(dialect, 'gaps', ['nta_code', 'year', 'rank'], ['nta_code', 'year'])).toBe(
      'INSERT INTO "gaps" ("nta_code", "year", "rank") VALUES (?, ?, ?) ' +
        'ON CONFLICT ("nta_code", "year") DO UPDATE SET "rank" = EXCLUDED."rank"'
    );
  });

  it('falls back to DO NOTHING when only key columns are written', () => {
    expect(buildUpsert(dialect, 'gaps', ['nta_code'], ['nta_code'])).toBe(
      'INSERT INTO "gaps" ("nta_code") VALUES (?) ON CONFLICT ("nta_code") DO NOTHING'
    );
  });

  it('builds delete and count statements', () => {
    expect(buildDeleteAll(dialect, 'ntas')).toBe('DELETE FROM "ntas"');
    expect(buildCount(dialect, 'ntas')).toBe('SELECT COUNT(*) AS count FROM "ntas"');
  });

  it('quotes identifiers through the dialect', () => {
    expect(buildDeleteAll(dialect, 'odd"name')).toBe('DELETE FROM "odd""name"');
  });
});

describe('batchSize', () => {
  it('uses 1000 rows unless the parameter limit is lower', () => {
    expect(batchSize(10, 65535)).toBe(1000);
    expect(batchSize(14, 32766)).toBe(1000);
    expect(batchSize(50, 32766)).toBe(655);
    expect(batchSize(40000, 32766)).toBe(1);
  });
});
