/**
 * Serve Command
 *
 * Start the food gap HTTP API
 */

import type { Command } from 'commander';
import { getSettings } from '../../core/config.js';
import { logger } from '../../core/utils/logger.js';
import { FoodGapAPI } from '../../serving/api.js';
import { FoodGapService } from '../../serving/food-gap-service.js';

export interface ServeOptions {
  readonly port?: string;
  readonly host?: string;
}

export async function serveCommand(options: ServeOptions): Promise<void> {
  const settings = getSettings();
  const port = options.port !== undefined ? Number.parseInt(options.port, 10) : settings.api.port;
  const host = options.host ?? settings.api.host;

  try {
    const api = new FoodGapAPI(new FoodGapService(), {
      port,
      host,
      corsOrigin: settings.api.corsOrigin,
    });
    await api.start();

    // Graceful shutdown
    const shutdown = (): void => {
      logger.info('Received shutdown signal, stopping server...');
      api.stop().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error('Failed to stop server', {
            error: error instanceof Error ? error.message : String(error),
          });
          process.exit(1);
        }
      );
    };

    process.on('SIGTERM', shutdown);
    process.on('SIGINT', shutdown);
  } catch (error) {
    logger.error('Failed to start server', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exitCode = 1;
  }
}

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the HTTP API')
    .option('-p, --port <port>', 'Port to listen on')
    .option('--host <host>', 'Interface to bind')
    .action(async (options: ServeOptions) => {
      await serveCommand(options);
    });
}
