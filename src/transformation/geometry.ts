/**
 * GeoJSON to well-known text conversion
 *
 * Socrata delivers geometry columns as GeoJSON geometry objects in JSON
 * exports and as serialized GeoJSON text in CSV exports. Both become a
 * SpatialValue tagged with SRID 4326 (WGS84 longitude/latitude).
 */

import type { Geometry, MultiPolygon, Polygon, Position } from 'geojson';
import wkx from 'wkx';
import { SpatialValue } from '../core/types/records.js';

export const WGS84_SRID = 4326;

export interface GeometryConversionOptions {
  /** Promote Polygon payloads to MultiPolygon (for MULTIPOLYGON columns) */
  readonly promoteToMulti?: boolean;
}

/**
 * Thrown for a payload that is present but cannot be read as GeoJSON geometry
 */
export class GeometryParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GeometryParseError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parsePosition(value: unknown): Position {
  if (!Array.isArray(value) || value.length < 2) {
    throw new GeometryParseError('position must have at least two coordinates');
  }
  const position: number[] = [];
  for (const ordinate of value) {
    if (typeof ordinate !== 'number' || !Number.isFinite(ordinate)) {
      throw new GeometryParseError(`invalid coordinate ${JSON.stringify(ordinate)}`);
    }
    position.push(ordinate);
  }
  return position;
}

function parseList<T>(value: unknown, parseItem: (item: unknown) => T): T[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new GeometryParseError('coordinate list is empty');
  }
  return value.map((item: unknown) => parseItem(item));
}

const parsePositions = (value: unknown): Position[] => parseList(value, parsePosition);

function samePosition(a: Position, b: Position): boolean {
  return a.length === b.length && a.every((ordinate, index) => ordinate === b[index]);
}

function parseLine(value: unknown): Position[] {
  const line = parsePositions(value);
  if (line.length < 2) {
    throw new GeometryParseError('line must have at least two positions');
  }
  return line;
}

/**
 * An open ring is closed by repeating its first position; a closed ring
 * needs at least four positions
 */
function parseRing(value: unknown): Position[] {
  const ring = parsePositions(value);
  const first = ring[0];
  const last = ring[ring.length - 1];
  if (first !== undefined && last !== undefined && !samePosition(first, last)) {
    ring.push([...first]);
  }
  if (ring.length < 4) {
    throw new GeometryParseError('polygon ring must have at least four positions');
  }
  return ring;
}

const parseLines = (value: unknown): Position[][] => parseList(value, parseLine);
const parseRings = (value: unknown): Position[][] => parseList(value, parseRing);

/**
 * Narrow an unknown payload (object or JSON text) to a GeoJSON geometry with
 * finite coordinates. Lines have two or more positions; polygon rings are
 * closed and have four or more.
 */
export function parseGeometryPayload(payload: unknown): Geometry {
  const value: unknown = typeof payload === 'string' ? JSON.parse(payload) : payload;

  if (!isRecord(value) || typeof value.type !== 'string') {
    throw new GeometryParseError('geometry payload is not a GeoJSON object');
  }

  const { coordinates } = value;
  switch (value.type) {
    case 'Point':
      return { type: 'Point', coordinates: parsePosition(coordinates) };
    case 'MultiPoint':
      return { type: 'MultiPoint', coordinates: parsePositions(coordinates) };
    case 'LineString':
      return { type: 'LineString', coordinates: parseLine(coordinates) };
    case 'MultiLineString':
      return { type: 'MultiLineString', coordinates: parseLines(coordinates) };
    case 'Polygon':
      return { type: 'Polygon', coordinates: parseRings(coordinates) };
    case 'MultiPolygon':
      return { type: 'MultiPolygon', coordinates: parseList(coordinates, parseRings) };
    case 'GeometryCollection':
      return {
        type: 'GeometryCollection',
        geometries: parseList(value.geometries, parseGeometryPayload),
      };
    default:
      throw new GeometryParseError(`unsupported geometry type "${value.type}"`);
  }
}

function promote(geometry: Geometry): Geometry {
  if (geometry.type !== 'Polygon') {
    return geometry;
  }
  const polygon: Polygon = geometry;
  const multi: MultiPolygon = { type: 'MultiPolygon', coordinates: [polygon.coordinates] };
  return multi;
}

/**
 * Convert a GeoJSON payload (object or JSON text) to a SRID 4326 SpatialValue.
 *
 * Returns null for an absent payload (null, undefined, empty string, `{}`).
 *
 * @throws GeometryParseError or SyntaxError for a malformed payload
 */
export function geoJsonToSpatialValue(
  payload: unknown,
  options: GeometryConversionOptions = {}
): SpatialValue | null {
  if (payload === null || payload === undefined || payload === '') {
    return null;
  }
  if (isRecord(payload) && Object.keys(payload).length === 0) {
    return null;
  }

  let geometry = parseGeometryPayload(payload);
  if (options.promoteToMulti) {
    geometry = promote(geometry);
  }

  let wkt: string;
  try {
    wkt = wkx.Geometry.parseGeoJSON(geometry).toWkt();
  } catch (error) {
    throw new GeometryParseError(
      `invalid ${geometry.type} coordinates: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return new SpatialValue(wkt, WGS84_SRID);
}

/**
 * Convert an EWKT or WKT string back to a GeoJSON geometry
 */
export function spatialTextToGeoJson(text: string): Geometry {
  const wkt = text.replace(/^SRID=\d+;/i, '');
  const parsed: unknown = wkx.Geometry.parse(wkt).toGeoJSON();
  return parseGeometryPayload(parsed);
}
