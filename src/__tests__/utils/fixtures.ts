/**
 * Shared test fixtures: temporary SQLite databases and descriptor paths
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PROJECT_ROOT } from '../../core/config.js';
import { DataStorage } from '../../persistence/storage.js';

export const DATASETS_DIR = join(PROJECT_ROOT, 'config/datasets');

export const FIXED_NOW = new Date('2024-03-01T12:00:00.000Z');

export interface TempDatabase {
  readonly dir: string;
  readonly path: string;
  readonly url: string;
  storage(): DataStorage;
  cleanup(): void;
}

/**
 * File-backed SQLite database in a fresh temp directory. File-backed so that
 * separate DataStorage instances see the same data.
 */
export function createTempDatabase(): TempDatabase {
  const dir = mkdtempSync(join(tmpdir(), 'food-gap-atlas-'));
  const path = join(dir, 'test.db');
  const url = `sqlite://${path}`;
  return {
    dir,
    path,
    url,
    storage: () => new DataStorage({ databaseUrl: url, processedDir: join(dir, 'processed') }),
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

export const SQUARE_POLYGON = {
  type: 'Polygon',
  coordinates: [
    [
      [0, 0],
      [1, 0],
      [1, 1],
      [0, 0],
    ],
  ],
} as const;
