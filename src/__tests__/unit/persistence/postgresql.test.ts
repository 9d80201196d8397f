/**
 * PostgreSQL adapter tests (no server; statement text only)
 */

import { describe, expect, it } from 'vitest';
import { parameterize, PostgreSQLAdapter } from '../../../persistence/adapters/postgresql.js';

describe('parameterize', () => {
  it('numbers placeholders in order', () => {
    expect(parameterize('SELECT * FROM ntas_2020 WHERE boro_code = ? AND nta2020 = ?', 2)).toBe(
      'SELECT * FROM ntas_2020 WHERE boro_code = $1 AND nta2020 = $2'
    );
  });

  it('leaves SQL without parameters untouched', () => {
    expect(parameterize("SELECT '?' AS mark, tags ? 'food' AS tagged FROM pantries", 0)).toBe(
      "SELECT '?' AS mark, tags ? 'food' AS tagged FROM pantries"
    );
  });
});

describe('PostgreSQLAdapter', () => {
  it('quotes identifiers and keeps column types', async () => {
    const adapter = new PostgreSQLAdapter({ connectionString: 'postgresql://loader@localhost:5432/gaps' });

    expect(adapter.quoteIdentifier('odd"name')).toBe('"odd""name"');
    expect(adapter.columnType('GEOMETRY(MULTIPOLYGON, 4326)')).toBe('GEOMETRY(MULTIPOLYGON, 4326)');
    await adapter.close();
  });
});
