#!/usr/bin/env tsx
/**
 * Focus Model CLI Entry Point
 *
 * Query the HST focus model from the command line and annotate FITS images
 * with the mean model focus.
 *
 * @module focus-model-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { registerCommands } from '../src/cli/commands/index.js';
import { EXIT_CODES, initializeContext, runAction } from '../src/cli/lib/context.js';

function getVersion(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  const packageJsonPath = join(__dirname, '..', 'package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      return String(packageJson.version);
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('focus-model')
    .description('HST Focus Model client: model defocus tables, plots and FITS header annotation')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--timeout <ms>', 'Per-request timeout in milliseconds', (value: string) => parseInt(value, 10))
    .hook('preAction', (thisCommand) => {
      const options = thisCommand.opts<{ verbose?: boolean; json?: boolean; timeout?: number }>();
      try {
        initializeContext(options);
      } catch (error) {
        console.error(`Configuration error: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(EXIT_CODES.INVALID_INPUT);
      }
    });

  registerCommands(program, runAction);

  return program;
}

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(EXIT_CODES.ERRORS);
  });
