/**
 * Command Registration
 *
 * - query: fetch model focus data (table and/or plot)
 * - annotate: write mean focus into FITS headers
 */

import type { Command } from 'commander';
import type { ActionRunner } from '../lib/context.js';
import { registerAnnotateCommand } from './annotate.js';
import { registerQueryCommand } from './query.js';

export function registerCommands(program: Command, run: ActionRunner): void {
  registerQueryCommand(program, run);
  registerAnnotateCommand(program, run);
}
