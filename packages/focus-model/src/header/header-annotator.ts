/**
 * Header Annotator
 *
 * Writes the mean model focus over an exposure into an image header. When no
 * table is supplied the query window comes from the header itself
 * (DATE-OBS / TIME-OBS / EXPTIME).
 */

import { access, constants as fsConstants, readFile } from 'node:fs/promises';
import { FocusModelClient, getFocusModelClient } from '../client/focus-model-client.js';
import {
  MEAN_FOCUS_COMMENT,
  MEAN_FOCUS_KEYWORD,
  MODEL_CADENCE_MINUTES,
  type Camera,
} from '../core/constants.js';
import { EmptyTableError, InvalidParameterError, MetadataWriteError, toError } from '../core/errors.js';
import type { FocusTable, QueryInput } from '../core/types.js';
import { atomicWriteFile } from '../core/utils/atomic-write.js';
import { createLogger } from '../core/utils/logger.js';
import { formatHourMinute, parseCalendarDate, parseClock } from '../core/utils/time.js';
import { FitsHeader } from './fits-header.js';
import { getNumber, getString, type HeaderStore } from './header-store.js';

const log = createLogger('header');

const LAST_MINUTE_OF_DAY = 24 * 60 - 1;

export interface AnnotateOptions {
  /** Pre-fetched table; skips the query */
  readonly table?: FocusTable;
  /** Camera for the derived query (default: from DETECTOR/CCDCHIP, then the client default) */
  readonly camera?: Camera;
  /** Keyword receiving the mean (default: MEANFOC) */
  readonly keyword?: string;
  /** Client for the derived query (default: shared client) */
  readonly client?: FocusModelClient;
}

export interface AnnotationResult {
  readonly keyword: string;
  readonly mean: number;
  readonly rowCount: number;
}

/**
 * Arithmetic mean of the defocus column
 *
 * @throws {EmptyTableError} For a table without rows
 */
export function computeMeanFocus(table: FocusTable): number {
  if (table.rows.length === 0) {
    throw new EmptyTableError();
  }
  const total = table.rows.reduce((sum, row) => sum + row.defocus, 0);
  return total / table.rows.length;
}

/**
 * Write the mean model focus into a header
 *
 * @param target - Path of a FITS file (rewritten in place) or a caller-owned header
 * @throws {EmptyTableError} When the table has no rows; nothing is written
 * @throws {MetadataWriteError} When the target cannot be opened, recognised or written
 * @throws {InvalidParameterError} When the header lacks a usable observation date/time
 * @throws {NetworkError | ParseError} From the derived query
 */
export async function addMeanFocusToHeader(
  target: string | HeaderStore,
  options: AnnotateOptions = {}
): Promise<AnnotationResult> {
  const keyword = (options.keyword ?? MEAN_FOCUS_KEYWORD).toUpperCase();

  // Reject an empty table before touching the target
  if (options.table) {
    computeMeanFocus(options.table);
  }

  if (typeof target !== 'string') {
    const result = await annotate(target, keyword, options);
    log.info('Header annotated', { keyword, mean: result.mean, rows: result.rowCount });
    return result;
  }

  const { header, data } = await openFits(target);
  const result = await annotate(header, keyword, options, target);

  try {
    await atomicWriteFile(target, concatBytes(header.toBytes(), data));
  } catch (error) {
    throw new MetadataWriteError(`Cannot write header of ${target}: ${toError(error).message}`, target, {
      cause: error,
    });
  }

  log.info('FITS header updated', { file: target, keyword, mean: result.mean, rows: result.rowCount });
  return result;
}

async function annotate(
  header: HeaderStore,
  keyword: string,
  options: AnnotateOptions,
  targetName = '<header>'
): Promise<AnnotationResult> {
  const client = options.client ?? getFocusModelClient();
  const table =
    options.table ??
    (await client.getModelData(
      queryFromHeader(header, { camera: options.camera, defaultCamera: client.config.defaultCamera })
    ));

  const mean = computeMeanFocus(table);

  try {
    header.set(keyword, mean, MEAN_FOCUS_COMMENT);
  } catch (error) {
    throw new MetadataWriteError(`Cannot set ${keyword}: ${toError(error).message}`, targetName, {
      cause: error,
    });
  }

  return { keyword, mean, rowCount: table.rows.length };
}

async function openFits(path: string): Promise<{ header: FitsHeader; data: Uint8Array }> {
  let bytes: Uint8Array;
  try {
    await access(path, fsConstants.R_OK | fsConstants.W_OK);
    bytes = await readFile(path);
  } catch (error) {
    throw new MetadataWriteError(`Cannot open ${path} for writing: ${toError(error).message}`, path, {
      cause: error,
    });
  }

  try {
    const { header, headerLength } = FitsHeader.parse(bytes);
    return { header, data: bytes.subarray(headerLength) };
  } catch (error) {
    throw new MetadataWriteError(`Unsupported image format in ${path}: ${toError(error).message}`, path, {
      cause: error,
    });
  }
}

function concatBytes(head: Uint8Array, tail: Uint8Array): Uint8Array {
  const out = new Uint8Array(head.byteLength + tail.byteLength);
  out.set(head, 0);
  out.set(tail, head.byteLength);
  return out;
}

// ============================================================================
// Query From Header
// ============================================================================

/**
 * Camera named by DETECTOR (+ CCDCHIP) / INSTRUME, if recognised
 */
export function cameraFromHeader(header: HeaderStore): Camera | undefined {
  const detector = getString(header, 'DETECTOR')?.toUpperCase();
  const chip = getNumber(header, 'CCDCHIP') === 2 ? 2 : 1;

  switch (detector) {
    case 'UVIS':
      return chip === 2 ? 'UVIS2' : 'UVIS1';
    case 'WFC':
      return chip === 2 ? 'WFC2' : 'WFC1';
    case 'HRC':
      return 'HRC';
    case 'PC':
      return 'PC';
  }

  return getString(header, 'INSTRUME')?.toUpperCase() === 'WFPC2' ? 'PC' : undefined;
}

/**
 * DATE-OBS as YYYY-MM-DD; accepts ISO dates (with or without a time part)
 * and the legacy DD/MM/YY form
 */
function observationDate(header: HeaderStore): string | undefined {
  const raw = getString(header, 'DATE-OBS');
  if (!raw) return undefined;

  const legacy = /^(\d{2})\/(\d{2})\/(\d{2})$/.exec(raw);
  if (legacy) {
    return parseCalendarDate(`19${legacy[3]}-${legacy[2]}-${legacy[1]}`);
  }

  return parseCalendarDate(raw.split('T')[0]);
}

function observationSeconds(header: HeaderStore): number | undefined {
  const time = getString(header, 'TIME-OBS');
  if (time) {
    return parseClock(time);
  }

  const isoTime = getString(header, 'DATE-OBS')?.split('T')[1];
  return isoTime ? parseClock(isoTime) : undefined;
}

/**
 * Build the TEXT query covering an exposure
 *
 * Window: start minute of TIME-OBS (floored) to TIME-OBS + EXPTIME rounded up,
 * at least one model cadence long, clamped to the end of the day.
 *
 * @throws {InvalidParameterError} When DATE-OBS or TIME-OBS is missing or unreadable
 */
export function queryFromHeader(
  header: HeaderStore,
  options: { readonly camera?: Camera; readonly defaultCamera: Camera }
): QueryInput<'TEXT'> {
  const date = observationDate(header);
  const seconds = observationSeconds(header);

  const issues = [
    ...(date === undefined ? [{ path: 'DATE-OBS', message: 'Missing or unreadable observation date' }] : []),
    ...(seconds === undefined ? [{ path: 'TIME-OBS', message: 'Missing or unreadable observation time' }] : []),
  ];
  if (date === undefined || seconds === undefined) {
    throw new InvalidParameterError('Header has no usable observation date/time', issues);
  }

  const exposure = Math.max(0, getNumber(header, 'EXPTIME') ?? 0);
  const startMinute = Math.floor(seconds / 60);
  const endMinute = Math.min(
    LAST_MINUTE_OF_DAY,
    Math.max(Math.ceil((seconds + exposure) / 60), startMinute + MODEL_CADENCE_MINUTES)
  );

  const [year, month, day] = date.split('-');

  return {
    year: Number(year),
    date: `${month}/${day}`,
    startTime: formatHourMinute(startMinute),
    endTime: formatHourMinute(endMinute),
    camera: options.camera ?? cameraFromHeader(header) ?? options.defaultCamera,
    format: 'TEXT',
  };
}
