#!/usr/bin/env node
/**
 * Food Gap Atlas CLI Entry Point
 *
 * @module cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { PROJECT_ROOT } from '../core/config.js';
import { registerCommands } from './commands/index.js';

export const CLI_NAME = 'food-gap-atlas';

function getVersion(): string {
  try {
    const packageJson: unknown = JSON.parse(readFileSync(join(PROJECT_ROOT, 'package.json'), 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      return String(packageJson.version);
    }
  } catch (error) {
    console.error(`Could not read package version: ${error instanceof Error ? error.message : String(error)}`);
  }
  return '0.0.0';
}

export function createProgram(): Command {
  const program = new Command();
  program
    .name(CLI_NAME)
    .description('NYC Open Data ingestion and food supply gap API')
    .version(getVersion());
  registerCommands(program);
  return program;
}

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`\nError: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  });
