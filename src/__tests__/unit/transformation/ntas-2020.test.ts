/**
 * NTA 2020 transformer tests
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DatasetValidationError } from '../../../core/errors.js';
import { SpatialValue, tableFromRows } from '../../../core/types/records.js';
import { primaryKeyColumns } from '../../../core/types/schema.js';
import { loadDatasetConfig } from '../../../transformation/dataset-config.js';
import { Ntas2020Transformer } from '../../../transformation/datasets/ntas-2020.js';
import { DATASETS_DIR, FIXED_NOW, SQUARE_POLYGON } from '../../utils/fixtures.js';

function createTransformer(): Ntas2020Transformer {
  return new Ntas2020Transformer(loadDatasetConfig('ntas_2020', DATASETS_DIR), { now: () => FIXED_NOW });
}

describe('Ntas2020Transformer', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('renames, coerces, converts geometry and stamps metadata', () => {
    const raw = tableFromRows([
      {
        ':id': 'row-1',
        nta2020: 'MN0701',
        borocode: '1',
        boroname: 'Manhattan',
        countyfips: '061',
        ntaname: 'Upper West Side (Central)',
        shape_leng: '1000.5',
        shape_area: 'abc',
        the_geom: SQUARE_POLYGON,
      },
    ]);

    const cleaned = createTransformer().transform(raw);

    expect(cleaned.columns).toEqual([
      'nta2020',
      'boro_code',
      'boro_name',
      'county_fips',
      'nta_name',
      'shape_leng',
      'shape_area',
      'geom',
      'dataset_id',
      'ingestion_timestamp',
    ]);
    expect(cleaned.rows).toHaveLength(1);

    const [row] = cleaned.rows;
    expect(row?.boro_code).toBe(1);
    expect(row?.shape_leng).toBe(1000.5);
    expect(row?.shape_area).toBeNull();
    expect(row?.dataset_id).toBe('ntas_2020');
    expect(row?.ingestion_timestamp).toEqual(FIXED_NOW);

    const geom = row?.geom;
    expect(geom).toBeInstanceOf(SpatialValue);
    expect(String(geom)).toBe('SRID=4326;MULTIPOLYGON(((0 0,1 0,1 1,0 0)))');
  });

  it('nulls an invalid geometry and keeps the row', () => {
    const raw = tableFromRows([
      {
        nta2020: 'BK0101',
        borocode: '3',
        boroname: 'Brooklyn',
        ntaname: 'Greenpoint',
        the_geom: { type: 'Polygon', coordinates: [] },
      },
      {
        nta2020: 'BK0102',
        borocode: '3',
        boroname: 'Brooklyn',
        ntaname: 'Williamsburg',
        the_geom: SQUARE_POLYGON,
      },
    ]);

    const cleaned = createTransformer().transform(raw);

    expect(cleaned.rows.map((row) => row.nta2020)).toEqual(['BK0101', 'BK0102']);
    expect(cleaned.rows[0]?.geom).toBeNull();
    expect(cleaned.rows[1]?.geom).toBeInstanceOf(SpatialValue);

    const geometryWarnings = vi.mocked(console.warn).mock.calls.filter(([line]) =>
      String(line).includes('WARN food-gap-atlas:transformer: Failed to convert geometry')
    );
    expect(geometryWarnings).toHaveLength(1);
  });

  it('nulls a degenerate ring and closes an open one', () => {
    const raw = tableFromRows([
      {
        nta2020: 'SI0101',
        borocode: '5',
        boroname: 'Staten Island',
        ntaname: 'Stapleton',
        the_geom: {
          type: 'Polygon',
          coordinates: [
            [
              [0, 0],
              [1, 0],
            ],
          ],
        },
      },
      {
        nta2020: 'SI0102',
        borocode: '5',
        boroname: 'Staten Island',
        ntaname: 'Tompkinsville',
        the_geom: {
          type: 'Polygon',
          coordinates: [
            [
              [0, 0],
              [1, 0],
              [1, 1],
              [0, 1],
            ],
          ],
        },
      },
    ]);

    const cleaned = createTransformer().transform(raw);

    expect(cleaned.rows).toHaveLength(2);
    expect(cleaned.rows[0]?.geom).toBeNull();
    expect(String(cleaned.rows[1]?.geom)).toBe('SRID=4326;MULTIPOLYGON(((0 0,1 0,1 1,0 1,0 0)))');

    const geometryWarnings = vi.mocked(console.warn).mock.calls.filter(([line]) =>
      String(line).includes('WARN food-gap-atlas:transformer: Failed to convert geometry')
    );
    expect(geometryWarnings).toHaveLength(1);
    expect(String(geometryWarnings[0]?.[0])).toContain('polygon ring must have at least four positions');
  });

  it('reports every missing required column', () => {
    const raw = tableFromRows([
      { countyfips: '061', ntaname: 'Upper West Side (Central)', the_geom: SQUARE_POLYGON },
    ]);

    let caught: unknown;
    try {
      createTransformer().transform(raw);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(DatasetValidationError);
    if (caught instanceof DatasetValidationError) {
      expect(caught.missingColumns).toEqual(['boro_code', 'boro_name', 'nta2020']);
      expect(caught.message).toBe(
        'Missing required columns for 2020 Neighborhood Tabulation Areas (NTAs): boro_code, boro_name, nta2020'
      );
    }
  });

  it('does not mutate its input', () => {
    const rows = [
      { ':id': 'row-1', nta2020: 'QN0101', borocode: '4', boroname: 'Queens', ntaname: 'Astoria', the_geom: '' },
    ];
    const before = structuredClone(rows);

    createTransformer().transform(tableFromRows(rows));

    expect(rows).toEqual(before);
  });

  it('exposes the schema with metadata columns appended', () => {
    const schema = createTransformer().getSchema();

    expect(schema.tableName).toBe('ntas_2020');
    expect(primaryKeyColumns(schema)).toEqual(['nta2020']);
    expect(schema.columns.slice(-2)).toEqual([
      { name: 'dataset_id', type: 'VARCHAR(20)', nullable: false, required: false, primaryKey: false },
      {
        name: 'ingestion_timestamp',
        type: 'TIMESTAMP',
        nullable: false,
        required: false,
        primaryKey: false,
        default: 'CURRENT_TIMESTAMP',
      },
    ]);
    expect(schema.indexes.map((index) => index.name)).toEqual([
      'idx_ntas_2020_boro_code',
      'idx_ntas_2020_cdta2020',
    ]);
  });
});
