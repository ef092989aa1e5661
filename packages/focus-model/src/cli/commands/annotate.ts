/**
 * Annotate Command
 *
 * Write the mean model focus over each exposure into its FITS header. The
 * query window comes from DATE-OBS / TIME-OBS / EXPTIME of each file.
 *
 * Usage:
 *   focus-model annotate <fits-file...> [options]
 *
 * Options:
 *   -c, --camera <camera>   Override the camera read from DETECTOR/CCDCHIP
 *   -k, --keyword <name>    Header keyword to write (default: MEANFOC)
 *
 * Files are processed one at a time; the first failure stops the run.
 *
 * @module cli/commands/annotate
 */

import type { Command } from 'commander';
import { z } from 'zod';
import { FocusModelClient } from '../../client/focus-model-client.js';
import { MEAN_FOCUS_KEYWORD } from '../../core/constants.js';
import { InvalidParameterError } from '../../core/errors.js';
import { addMeanFocusToHeader, type AnnotationResult } from '../../header/header-annotator.js';
import { parseCamera } from '../../validation/query-validator.js';
import { toClientConfig } from '../lib/config.js';
import { getGlobalContext, type ActionRunner } from '../lib/context.js';

interface AnnotateOptions {
  readonly camera?: string;
  readonly keyword: string;
}

export const KeywordSchema = z
  .string()
  .transform((value) => value.toUpperCase())
  .pipe(z.string().regex(/^[A-Z0-9_-]{1,8}$/, 'Keyword must be 1-8 characters of A-Z, 0-9, _ or -'));

/**
 * Register the annotate command
 */
export function registerAnnotateCommand(program: Command, run: ActionRunner): void {
  program
    .command('annotate <files...>')
    .description('Write the mean model focus into FITS headers')
    .option('-c, --camera <camera>', 'Camera: UVIS1|UVIS2|WFC1|WFC2|HRC|PC (default: from header)')
    .option('-k, --keyword <name>', 'Header keyword to write', MEAN_FOCUS_KEYWORD)
    .action(async (files: string[], options: AnnotateOptions) => {
      await run(() => executeAnnotate(files, options));
    });
}

/**
 * Execute the annotate command
 */
export async function executeAnnotate(files: readonly string[], options: AnnotateOptions): Promise<void> {
  const { config, logger } = getGlobalContext();

  const camera = options.camera ? parseCamera(options.camera) : undefined;
  const keyword = KeywordSchema.safeParse(options.keyword);
  if (!keyword.success) {
    throw new InvalidParameterError(`Invalid keyword: ${options.keyword}`, [
      { path: 'keyword', message: keyword.error.issues[0]?.message ?? 'Invalid keyword' },
    ]);
  }

  logger.commandStart('annotate', { files: files.length, camera, keyword: keyword.data });

  const client = new FocusModelClient(toClientConfig(config));
  const results: Array<AnnotationResult & { readonly file: string }> = [];

  for (const file of files) {
    const result = await addMeanFocusToHeader(file, { camera, keyword: keyword.data, client });
    results.push({ file, ...result });

    if (!config.json) {
      console.log(`${file}: ${result.keyword} = ${result.mean} (${result.rowCount} rows)`);
    }
  }

  if (config.json) {
    console.log(JSON.stringify(results, null, 2));
  }

  logger.commandEnd(true, { files: results.length });
}
