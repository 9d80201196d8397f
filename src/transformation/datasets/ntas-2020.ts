/**
 * 2020 Neighborhood Tabulation Areas (NTAs)
 *
 * Source columns are Socrata's abbreviated names (`borocode`, `ntaname`,
 * `the_geom`), so the mapping is explicit rather than normalized.
 */

import { BaseDatasetTransformer } from '../base-transformer.js';

export const NTAS_2020_DATASET_ID = 'ntas_2020';

export class Ntas2020Transformer extends BaseDatasetTransformer {
  protected readonly columnMapping: Readonly<Record<string, string>> = {
    borocode: 'boro_code',
    boroname: 'boro_name',
    countyfips: 'county_fips',
    nta2020: 'nta2020',
    ntaname: 'nta_name',
    ntaabbrev: 'nta_abbrev',
    ntatype: 'nta_type',
    cdta2020: 'cdta2020',
    cdtaname: 'cdta_name',
    shape_leng: 'shape_leng',
    shape_area: 'shape_area',
    the_geom: 'geom',
  };

  protected readonly numericColumns: readonly string[] = ['boro_code', 'shape_leng', 'shape_area'];
}
