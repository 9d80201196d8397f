/**
 * Status Command
 *
 * Show the ingestion metadata recorded for each dataset.
 */

import type { Command } from 'commander';
import { DataStorage } from '../../persistence/storage.js';

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show ingestion status per dataset')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }) => {
      const storage = new DataStorage();
      try {
        const metadata = await storage.listMetadata();
        if (options.json) {
          console.log(JSON.stringify(metadata, null, 2));
          return;
        }
        if (metadata.length === 0) {
          console.log('No datasets ingested yet');
          return;
        }
        for (const entry of metadata) {
          console.log(
            `${entry.datasetId.padEnd(20)} ${(entry.status ?? '-').padEnd(8)} ` +
              `${String(entry.recordCount ?? '-').padStart(8)} rows  ` +
              `${entry.lastIngestion?.toISOString() ?? 'never'}`
          );
        }
      } catch (error) {
        console.error(`\nError: ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = 1;
      } finally {
        await storage.close();
      }
    });
}
