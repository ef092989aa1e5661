/**
 * Query Command
 *
 * Fetch model focus data for a time range on one day.
 *
 * Usage:
 *   focus-model query <YYYY/MM/DD> <HH:MM-HH:MM> [options]
 *
 * Options:
 *   -c, --camera <camera>   UVIS1|UVIS2|WFC1|WFC2|HRC|PC (default: UVIS1)
 *   -f, --format <fmt>      TEXT|PNG|BOTH (default: TEXT)
 *   -o, --output <file>     Where to write the plot (required for PNG and BOTH)
 *
 * Examples:
 *   focus-model query 2010/01/15 00:00-01:00
 *   focus-model query 2010/01/15 00:00-01:00 --camera WFC1 --format both -o focus.png
 *
 * @module cli/commands/query
 */

import { writeFile } from 'node:fs/promises';
import type { Command } from 'commander';
import { z } from 'zod';
import { FocusModelClient } from '../../client/focus-model-client.js';
import { InvalidParameterError } from '../../core/errors.js';
import type { FocusTable, ImageArtifact, QueryInput } from '../../core/types.js';
import { parseCamera, parseOutputFormat } from '../../validation/query-validator.js';
import { toClientConfig } from '../lib/config.js';
import { getGlobalContext, type ActionRunner } from '../lib/context.js';
import { formatBytes } from '../lib/logger.js';

interface QueryOptions {
  readonly camera?: string;
  readonly format: string;
  readonly output?: string;
}

const ObservationDateArgSchema = z
  .string()
  .regex(/^\d{4}\/\d{2}\/\d{2}$/, 'Date must be in YYYY/MM/DD format');

const TimeRangeArgSchema = z
  .string()
  .regex(/^\d{2}:\d{2}-\d{2}:\d{2}$/, 'Time range must be in HH:MM-HH:MM format');

/**
 * Split the positional arguments into query fields
 *
 * Only the shape is checked here; the query itself is validated by the client.
 *
 * @throws {InvalidParameterError} For malformed arguments
 */
export function parseQueryArguments(
  dateArg: string,
  rangeArg: string
): Pick<QueryInput, 'year' | 'date' | 'startTime' | 'endTime'> {
  const date = ObservationDateArgSchema.safeParse(dateArg);
  const range = TimeRangeArgSchema.safeParse(rangeArg);

  const issues = [
    ...(date.success ? [] : [{ path: 'date', message: date.error.issues[0]?.message ?? 'Invalid date' }]),
    ...(range.success ? [] : [{ path: 'range', message: range.error.issues[0]?.message ?? 'Invalid range' }]),
  ];
  if (!date.success || !range.success) {
    throw new InvalidParameterError('Invalid query arguments', issues);
  }

  const [year, monthDay] = splitOnce(date.data, '/');
  const [startTime, endTime] = splitOnce(range.data, '-');

  return { year, date: monthDay, startTime, endTime };
}

function splitOnce(value: string, separator: string): [string, string] {
  const index = value.indexOf(separator);
  return [value.slice(0, index), value.slice(index + 1)];
}

/**
 * Register the query command
 */
export function registerQueryCommand(program: Command, run: ActionRunner): void {
  program
    .command('query <date> <range>')
    .description('Fetch model focus data for a time range (date YYYY/MM/DD, range HH:MM-HH:MM)')
    .option('-c, --camera <camera>', 'Camera: UVIS1|UVIS2|WFC1|WFC2|HRC|PC')
    .option('-f, --format <fmt>', 'Output format: TEXT|PNG|BOTH', 'TEXT')
    .option('-o, --output <file>', 'Plot output path (PNG and BOTH)')
    .action(async (dateArg: string, rangeArg: string, options: QueryOptions) => {
      await run(() => executeQuery(dateArg, rangeArg, options));
    });
}

/**
 * Execute the query command
 */
export async function executeQuery(dateArg: string, rangeArg: string, options: QueryOptions): Promise<void> {
  const { config, logger } = getGlobalContext();

  const window = parseQueryArguments(dateArg, rangeArg);
  const format = parseOutputFormat(options.format);
  const camera = options.camera ? parseCamera(options.camera) : undefined;
  const plotPath = format === 'TEXT' ? '' : requireOutput(format, options.output);

  logger.commandStart('query', { ...window, camera, format });

  const client = new FocusModelClient(toClientConfig(config));

  const savePlot = async (plot: ImageArtifact, path: string): Promise<void> => {
    await writeFile(path, plot.bytes);
    logger.info('Plot written', { path, size: formatBytes(plot.bytes.byteLength) });
  };

  switch (format) {
    case 'TEXT':
      printTable(await client.getModelData({ ...window, camera, format: 'TEXT' }), config.json);
      break;
    case 'PNG':
      await savePlot(await client.getModelData({ ...window, camera, format: 'PNG' }), plotPath);
      break;
    case 'BOTH': {
      const [table, plot] = await client.getModelData({ ...window, camera, format: 'BOTH' });
      printTable(table, config.json);
      await savePlot(plot, plotPath);
      break;
    }
  }

  logger.commandEnd(true);
}

function requireOutput(format: string, output: string | undefined): string {
  if (!output) {
    throw new InvalidParameterError(`--output is required for ${format} output`, [
      { path: 'output', message: 'Missing plot output path' },
    ]);
  }
  return output;
}

function printTable(table: FocusTable, json: boolean): void {
  if (json) {
    console.log(JSON.stringify({ columns: table.columns, rows: table.rows }, null, 2));
    return;
  }
  console.log(table.raw.trimEnd());
}
