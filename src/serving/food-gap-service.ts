/**
 * Food Gap Aggregate Query
 *
 * Joins neighborhood geometry (`ntas_2020`) to supply-gap metrics
 * (`food_supply_gaps`) for the most recent year and assembles the GeoJSON
 * FeatureCollection inside the database, one scalar per request.
 */

import type { Feature, FeatureCollection, GeoJsonProperties, Geometry } from 'geojson';
import type { DatabaseDialect } from '../core/types/database.js';
import { createLogger, errorMetadata } from '../core/utils/logger.js';
import { DataStorage } from '../persistence/storage.js';
import { parseGeometryPayload } from '../transformation/geometry.js';

const logger = createLogger({ module: 'food-gaps' });

export type FoodGapCollection = FeatureCollection<Geometry | null, GeoJsonProperties>;

const POSTGRES_FOOD_GAPS_QUERY = `
  SELECT json_build_object(
    'type', 'FeatureCollection',
    'features', COALESCE(json_agg(
      json_build_object(
        'type', 'Feature',
        'geometry', ST_AsGeoJSON(n.geom)::json,
        'properties', json_build_object(
          'nta_code', n.nta2020,
          'nta_name', n.nta_name,
          'boro_name', n.boro_name,
          'supply_gap_lbs', f.supply_gap_lbs,
          'food_insecure_pct', f.food_insecure_pct,
          'vulnerable_pop_score', f.vulnerable_pop_score,
          'unemployment_rate', f.unemployment_rate
        )
      )
    ), '[]'::json)
  ) AS geojson
  FROM ntas_2020 n
  LEFT JOIN food_supply_gaps f ON n.nta2020 = f.nta_code
  WHERE f.year = (SELECT MAX(year) FROM food_supply_gaps)
`;

const SQLITE_FOOD_GAPS_QUERY = `
  SELECT json_object(
    'type', 'FeatureCollection',
    'features', json_group_array(
      json_object(
        'type', 'Feature',
        'geometry', json(ST_AsGeoJSON(n.geom)),
        'properties', json_object(
          'nta_code', n.nta2020,
          'nta_name', n.nta_name,
          'boro_name', n.boro_name,
          'supply_gap_lbs', f.supply_gap_lbs,
          'food_insecure_pct', f.food_insecure_pct,
          'vulnerable_pop_score', f.vulnerable_pop_score,
          'unemployment_rate', f.unemployment_rate
        )
      )
    )
  ) AS geojson
  FROM ntas_2020 n
  LEFT JOIN food_supply_gaps f ON n.nta2020 = f.nta_code
  WHERE f.year = (SELECT MAX(year) FROM food_supply_gaps)
`;

export function foodGapsQuery(dialect: DatabaseDialect): string {
  return dialect === 'postgresql' ? POSTGRES_FOOD_GAPS_QUERY : SQLITE_FOOD_GAPS_QUERY;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseFeature(value: unknown): Feature<Geometry | null, GeoJsonProperties> {
  if (!isRecord(value) || value.type !== 'Feature') {
    throw new Error('Aggregate query returned a malformed feature');
  }
  return {
    type: 'Feature',
    geometry: value.geometry === null || value.geometry === undefined ? null : parseGeometryPayload(value.geometry),
    properties: isRecord(value.properties) ? value.properties : null,
  };
}

/**
 * Narrow the query's scalar (JSON text on SQLite, parsed JSON on PostgreSQL)
 */
export function parseFeatureCollection(value: unknown): FoodGapCollection {
  const parsed: unknown = typeof value === 'string' ? JSON.parse(value) : value;
  if (!isRecord(parsed) || parsed.type !== 'FeatureCollection') {
    throw new Error('Aggregate query did not return a FeatureCollection');
  }
  const features = Array.isArray(parsed.features) ? parsed.features.map(parseFeature) : [];
  return { type: 'FeatureCollection', features };
}

export interface FoodGapServiceOptions {
  /** Storage per request; defaults to one on the configured DATABASE_URL */
  readonly storageFactory?: () => DataStorage;
}

export class FoodGapService {
  private readonly storageFactory: () => DataStorage;

  constructor(options: FoodGapServiceOptions = {}) {
    this.storageFactory = options.storageFactory ?? (() => new DataStorage());
  }

  /**
   * Latest-year food supply gaps by NTA as a FeatureCollection
   */
  async getFoodGaps(): Promise<FoodGapCollection> {
    const storage = this.storageFactory();
    try {
      const engine = storage.getEngine();
      const row = await engine.queryOne(foodGapsQuery(engine.dialect));
      const collection = parseFeatureCollection(row?.geojson ?? null);
      logger.debug('Fetched food gaps', { features: collection.features.length });
      return collection;
    } catch (error) {
      logger.error('Error fetching food gaps', errorMetadata(error));
      throw error;
    } finally {
      await storage.close();
    }
  }
}
