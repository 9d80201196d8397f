/**
 * Tabular record types shared by the transformation and storage layers.
 *
 * A table is an ordered column list plus rows keyed by those columns. Column
 * presence is decided by `columns`, not by the keys of individual rows, so a
 * column whose every value is missing is still present.
 */

/**
 * Geometry in well-known text tagged with a spatial reference id.
 *
 * Serializes as EWKT (`SRID=4326;MULTIPOLYGON(...)`), which PostGIS accepts
 * as input for a geometry column. `toPostgres` is picked up by `pg` when the
 * value is bound as a query parameter.
 */
export class SpatialValue {
  constructor(
    public readonly wkt: string,
    public readonly srid: number
  ) {}

  toEWKT(): string {
    return `SRID=${this.srid};${this.wkt}`;
  }

  toPostgres(): string {
    return this.toEWKT();
  }

  toJSON(): string {
    return this.toEWKT();
  }

  toString(): string {
    return this.toEWKT();
  }
}

export type CellValue = string | number | boolean | Date | SpatialValue | null;

export type RawRecord = Readonly<Record<string, unknown>>;

export type CleanedRecord = Readonly<Record<string, CellValue>>;

export interface RawTable {
  readonly columns: readonly string[];
  readonly rows: readonly RawRecord[];
}

/**
 * Storage-ready record set produced by a transformer
 */
export interface CleanedRecordSet {
  readonly columns: readonly string[];
  readonly rows: readonly CleanedRecord[];
}

/**
 * Build a table from row objects. Columns appear in first-seen order across
 * all rows, so sparse rows (Socrata omits null fields) still contribute.
 */
export function tableFromRows(rows: readonly RawRecord[]): RawTable {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }
  return { columns, rows };
}

