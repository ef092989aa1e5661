/**
 * Literal fixtures shared by the unit tests
 *
 * All values are made up; the table follows the service layout
 * `julian-date date time defocus`.
 */

import { FitsHeader, BLOCK_LENGTH } from '../../header/fits-header.js';
import type { HeaderValue } from '../../header/header-store.js';

export const ORIGIN = 'https://focustool.stsci.edu';
export const ENDPOINT = `${ORIGIN}/cgi-bin/control3.py`;
export const TABLE_URL = `${ORIGIN}/images/focusdata2010.01.15_0000-0100.txt`;
export const PLOT_URL = `${ORIGIN}/images/focusplot2010.01.15_0000-0100.png`;

/**
 * Three rows, mean defocus exactly -1.5
 */
export const TABLE_TEXT = [
  '# Focus model UVIS1 2010.01.15 00:00-01:00',
  '# JulianDate Date Time Model',
  '55211.00000 2010.01.15 00:00:00 -1.25',
  '55211.00347 2010.01.15 00:05:00 -1.50',
  '55211.00694 2010.01.15 00:10:00 -1.75',
  '',
].join('\n');

export const RESULTS_PAGE = [
  '<html><body>',
  '<h1>Focus Model Results</h1>',
  '<a href="/images/focusdata2010.01.15_0000-0100.txt">Model table</a>',
  '<img src="/images/focusplot2010.01.15_0000-0100.png" alt="Model plot">',
  '</body></html>',
].join('\n');

export const EMPTY_PAGE = '<html><body><p>Done</p></body></html>';

export const PNG_BYTES = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00, 0x00, 0x0d]);

/**
 * Minimal FITS file: primary header plus one block of data bytes
 */
export function buildFitsFile(
  entries: ReadonlyArray<readonly [string, HeaderValue, string?]>,
  dataFill = 7
): Uint8Array {
  const header = FitsHeader.fromEntries([['SIMPLE', true, 'conforms to FITS standard'], ...entries]).toBytes();
  const data = new Uint8Array(BLOCK_LENGTH).fill(dataFill);

  const file = new Uint8Array(header.byteLength + data.byteLength);
  file.set(header, 0);
  file.set(data, header.byteLength);
  return file;
}

export const OBSERVATION_ENTRIES: ReadonlyArray<readonly [string, HeaderValue, string?]> = [
  ['BITPIX', 8],
  ['NAXIS', 1],
  ['NAXIS1', BLOCK_LENGTH],
  ['INSTRUME', 'WFC3'],
  ['DETECTOR', 'UVIS'],
  ['CCDCHIP', 1],
  ['DATE-OBS', '2010-01-15'],
  ['TIME-OBS', '00:02:30'],
  ['EXPTIME', 420.0],
];
