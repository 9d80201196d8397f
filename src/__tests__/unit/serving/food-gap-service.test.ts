/**
 * Food gap aggregate query tests
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { tableFromRows } from '../../../core/types/records.js';
import { ingestDataset } from '../../../ingestion/pipeline.js';
import type { DataStorage } from '../../../persistence/storage.js';
import { FoodGapService, foodGapsQuery, parseFeatureCollection } from '../../../serving/food-gap-service.js';
import { getTransformer } from '../../../transformation/registry.js';
import { createTempDatabase, DATASETS_DIR, FIXED_NOW, SQUARE_POLYGON, type TempDatabase } from '../../utils/fixtures.js';

const SQUARE_MULTIPOLYGON = {
  type: 'MultiPolygon',
  coordinates: [
    [
      [
        [0, 0],
        [1, 0],
        [1, 1],
        [0, 0],
      ],
    ],
  ],
};

async function loadNtas(storage: DataStorage): Promise<void> {
  await ingestDataset(
    'ntas_2020',
    tableFromRows([
      { nta2020: 'BK0101', borocode: '3', boroname: 'Brooklyn', ntaname: 'Greenpoint', the_geom: SQUARE_POLYGON },
      { nta2020: 'BK0102', borocode: '3', boroname: 'Brooklyn', ntaname: 'Williamsburg', the_geom: SQUARE_POLYGON },
      { nta2020: 'QN0101', borocode: '4', boroname: 'Queens', ntaname: 'Astoria' },
    ]),
    { storage, configDir: DATASETS_DIR, now: () => FIXED_NOW }
  );
}

async function loadGaps(storage: DataStorage, rows: ReadonlyArray<Record<string, unknown>>): Promise<void> {
  await ingestDataset('food_supply_gaps', tableFromRows(rows), {
    storage,
    configDir: DATASETS_DIR,
    now: () => FIXED_NOW,
  });
}

describe('FoodGapService', () => {
  let database: TempDatabase;
  let storage: DataStorage;

  beforeEach(() => {
    database = createTempDatabase();
    storage = database.storage();
  });

  afterEach(async () => {
    await storage.close();
    database.cleanup();
    vi.restoreAllMocks();
  });

  it('joins the latest year of gaps to neighborhood geometry', async () => {
    await loadNtas(storage);
    await loadGaps(storage, [
      { nta_code: 'BK0101', year: '2022', supply_gap_lbs: '100', food_insecure_pct: '0.2' },
      { nta_code: 'BK0101', year: '2023', supply_gap_lbs: '200', food_insecure_pct: '0.1' },
      { nta_code: 'BK0102', year: '2023', supply_gap_lbs: '50.5', food_insecure_pct: '0.3' },
    ]);

    const service = new FoodGapService({ storageFactory: () => database.storage() });
    const collection = await service.getFoodGaps();

    expect(collection.type).toBe('FeatureCollection');
    const features = [...collection.features].sort((a, b) =>
      String(a.properties?.nta_code).localeCompare(String(b.properties?.nta_code))
    );
    expect(features).toEqual([
      {
        type: 'Feature',
        geometry: SQUARE_MULTIPOLYGON,
        properties: {
          nta_code: 'BK0101',
          nta_name: 'Greenpoint',
          boro_name: 'Brooklyn',
          supply_gap_lbs: 200,
          food_insecure_pct: 0.1,
          vulnerable_pop_score: null,
          unemployment_rate: null,
        },
      },
      {
        type: 'Feature',
        geometry: SQUARE_MULTIPOLYGON,
        properties: {
          nta_code: 'BK0102',
          nta_name: 'Williamsburg',
          boro_name: 'Brooklyn',
          supply_gap_lbs: 50.5,
          food_insecure_pct: 0.3,
          vulnerable_pop_score: null,
          unemployment_rate: null,
        },
      },
    ]);
  });

  it('returns an empty collection when there are no gap rows', async () => {
    await loadNtas(storage);
    await storage.createTableFromSchema(
      getTransformer('food_supply_gaps', { configDir: DATASETS_DIR }).getSchema()
    );

    const collection = await new FoodGapService({ storageFactory: () => database.storage() }).getFoodGaps();

    expect(collection).toEqual({ type: 'FeatureCollection', features: [] });
  });

  it('closes its storage after each request, even on failure', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const opened: DataStorage[] = [];
    const service = new FoodGapService({
      storageFactory: () => {
        const created = database.storage();
        opened.push(created);
        return created;
      },
    });

    await expect(service.getFoodGaps()).rejects.toThrow('no such table: ntas_2020');

    expect(opened).toHaveLength(1);
    expect(opened[0]?.isClosed).toBe(true);
  });
});

describe('foodGapsQuery', () => {
  it('uses the PostGIS JSON builders on PostgreSQL', () => {
    const sql = foodGapsQuery('postgresql');

    expect(sql).toContain("'geometry', ST_AsGeoJSON(n.geom)::json");
    expect(sql).toContain("COALESCE(json_agg(");
    expect(sql).toContain('WHERE f.year = (SELECT MAX(year) FROM food_supply_gaps)');
  });

  it('uses the SQLite JSON functions on SQLite', () => {
    const sql = foodGapsQuery('sqlite');

    expect(sql).toContain("'features', json_group_array(");
    expect(sql).toContain('LEFT JOIN food_supply_gaps f ON n.nta2020 = f.nta_code');
  });
});

describe('parseFeatureCollection', () => {
  it('accepts JSON text and parsed objects alike', () => {
    const value = {
      type: 'FeatureCollection',
      features: [{ type: 'Feature', geometry: null, properties: { nta_code: 'MN0101' } }],
    };

    expect(parseFeatureCollection(JSON.stringify(value))).toEqual(value);
    expect(parseFeatureCollection(value)).toEqual(value);
  });

  it('treats missing features as empty', () => {
    expect(parseFeatureCollection({ type: 'FeatureCollection', features: null })).toEqual({
      type: 'FeatureCollection',
      features: [],
    });
  });

  it('rejects anything that is not a FeatureCollection', () => {
    expect(() => parseFeatureCollection(null)).toThrow('Aggregate query did not return a FeatureCollection');
    expect(() => parseFeatureCollection({ type: 'FeatureCollection', features: [{ type: 'Point' }] })).toThrow(
      'Aggregate query returned a malformed feature'
    );
  });
});
