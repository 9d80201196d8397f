/**
 * CLI Commands Index
 */

import type { Command } from 'commander';
import { registerDatasetsCommand } from './datasets.js';
import { registerIngestCommand } from './ingest.js';
import { registerServeCommand } from './serve.js';
import { registerStatusCommand } from './status.js';

export function registerCommands(program: Command): void {
  registerIngestCommand(program);
  registerDatasetsCommand(program);
  registerStatusCommand(program);
  registerServeCommand(program);
}
