/**
 * Emergency Food Supply Gap by NTA
 *
 * Column headers in this dataset are long-form labels ("Supply Gap (lbs.)",
 * "Food Insecure Percentage"). They go through the generic normalizer first;
 * the explicit map then shortens the normalized names to the table's names.
 */

import type { RawTable } from '../../core/types/records.js';
import { BaseDatasetTransformer, isPlatformColumn } from '../base-transformer.js';

export const FOOD_SUPPLY_GAPS_DATASET_ID = 'food_supply_gaps';

export class FoodSupplyGapsTransformer extends BaseDatasetTransformer {
  protected readonly columnMapping: Readonly<Record<string, string>> = {
    nta: 'nta_code',
    ntacode: 'nta_code',
    nta_code: 'nta_code',
    ntaname: 'nta_name',
    nta_name: 'nta_name',
    year: 'year',
    supply_gap_lbs: 'supply_gap_lbs',
    food_insecure_percentage: 'food_insecure_pct',
    vulnerable_population_score: 'vulnerable_pop_score',
    unemployment_rate: 'unemployment_rate',
    unemployment: 'unemployment_rate',
    weighted_score: 'weighted_score',
    rank: 'rank',
  };

  protected readonly numericColumns: readonly string[] = [
    'year',
    'supply_gap_lbs',
    'food_insecure_pct',
    'vulnerable_pop_score',
    'unemployment_rate',
    'weighted_score',
    'rank',
  ];

  protected override renameColumns(table: RawTable): RawTable {
    // Platform columns keep their prefix so the next step can drop them
    const normalized = this.standardizeColumnNames(table, { skip: isPlatformColumn });
    return super.renameColumns(normalized);
  }
}
