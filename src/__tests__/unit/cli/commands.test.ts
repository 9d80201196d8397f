/**
 * CLI command tests
 *
 * Settings are loaded once per process, so the database location is set in
 * the environment before the first command runs.
 */

import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { describeDatasets } from '../../../cli/commands/datasets.js';
import { executeIngest } from '../../../cli/commands/ingest.js';
import { createTempDatabase, DATASETS_DIR, SQUARE_POLYGON, type TempDatabase } from '../../utils/fixtures.js';

describe('describeDatasets', () => {
  it('lists every registered dataset with its table and resource', () => {
    expect(describeDatasets(DATASETS_DIR)).toEqual([
      {
        datasetId: 'food_supply_gaps',
        datasetName: 'Emergency Food Supply Gap',
        tableName: 'food_supply_gaps',
        socrataId: '4kc9-zrs2',
      },
      {
        datasetId: 'ntas_2020',
        datasetName: '2020 Neighborhood Tabulation Areas (NTAs)',
        tableName: 'ntas_2020',
        socrataId: '9nt8-h7nd',
      },
    ]);
  });
});

describe('executeIngest', () => {
  let database: TempDatabase;

  beforeAll(() => {
    database = createTempDatabase();
    process.env.DATABASE_URL = database.url;
    process.env.FOOD_GAPS_PROCESSED_DIR = join(database.dir, 'processed');
  });

  afterAll(() => {
    delete process.env.DATABASE_URL;
    delete process.env.FOOD_GAPS_PROCESSED_DIR;
    database.cleanup();
  });

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    process.exitCode = undefined;
    vi.restoreAllMocks();
  });

  it('loads rows from a JSON file and reports the result', async () => {
    const input = join(database.dir, 'ntas.json');
    writeFileSync(
      input,
      JSON.stringify([
        { nta2020: 'MN0101', borocode: '1', boroname: 'Manhattan', ntaname: 'Financial District', the_geom: SQUARE_POLYGON },
        { nta2020: 'MN0102', borocode: '1', boroname: 'Manhattan', ntaname: 'Tribeca', the_geom: SQUARE_POLYGON },
      ])
    );

    await executeIngest('ntas_2020', { mode: 'replace', input, json: true });

    expect(process.exitCode).toBeUndefined();
    const [output] = vi.mocked(console.log).mock.calls[0] ?? [];
    expect(JSON.parse(String(output))).toEqual({
      success: true,
      datasetId: 'ntas_2020',
      tableName: 'ntas_2020',
      mode: 'replace',
      recordsRead: 2,
      recordsWritten: 2,
      parquetPath: null,
    });
  });

  it('reports a failure and sets the exit code', async () => {
    const input = join(database.dir, 'not-rows.json');
    writeFileSync(input, JSON.stringify({ rows: [] }));

    await executeIngest('ntas_2020', { mode: 'replace', input, json: true });

    expect(process.exitCode).toBe(1);
    const [output] = vi.mocked(console.log).mock.calls[0] ?? [];
    expect(JSON.parse(String(output))).toEqual({
      success: false,
      datasetId: 'ntas_2020',
      error: `${input} is not a JSON array of row objects`,
    });
  });
});
