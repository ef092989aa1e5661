/**
 * CLI command tests
 *
 * Commands run against a stubbed fetch; stdout is captured through a
 * console.log spy, log lines (stderr) are silenced.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { executeAnnotate, KeywordSchema } from '../../../cli/commands/annotate.js';
import { executeQuery, parseQueryArguments } from '../../../cli/commands/query.js';
import { initializeContext } from '../../../cli/lib/context.js';
import { InvalidParameterError } from '../../../core/errors.js';
import { parseFocusTable } from '../../../parsing/response-parser.js';
import {
  EMPTY_PAGE,
  ENDPOINT,
  OBSERVATION_ENTRIES,
  ORIGIN,
  PLOT_URL,
  PNG_BYTES,
  RESULTS_PAGE,
  TABLE_TEXT,
  TABLE_URL,
  buildFitsFile,
  stubFetch,
  type MockRoute,
} from '../../utils/index.js';

const ROUTES: MockRoute[] = [
  { url: ENDPOINT, method: 'POST', contentType: 'text/html', body: RESULTS_PAGE },
  { url: TABLE_URL, contentType: 'text/plain', body: TABLE_TEXT },
  { url: PLOT_URL, contentType: 'image/png', body: PNG_BYTES },
];

describe('parseQueryArguments', () => {
  it('should split the date and time range', () => {
    expect(parseQueryArguments('2010/01/15', '00:00-01:00')).toEqual({
      year: '2010',
      date: '01/15',
      startTime: '00:00',
      endTime: '01:00',
    });
  });

  it('should report both malformed arguments', () => {
    let caught: unknown;
    try {
      parseQueryArguments('2010-01-15', '0000-0100');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidParameterError);
    if (caught instanceof InvalidParameterError) {
      expect(caught.issues).toEqual([
        { path: 'date', message: 'Date must be in YYYY/MM/DD format' },
        { path: 'range', message: 'Time range must be in HH:MM-HH:MM format' },
      ]);
    }
  });
});

describe('KeywordSchema', () => {
  it('should upper-case valid keywords and reject long ones', () => {
    expect(KeywordSchema.parse('focmean')).toBe('FOCMEAN');
    expect(KeywordSchema.safeParse('TOOLONGKEY').success).toBe(false);
  });
});

describe('commands', () => {
  let dir: string;
  let stdout: MockInstance<typeof console.log>;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'focus-model-cli-'));
    stdout = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('query', () => {
    it('should print the raw table', async () => {
      initializeContext({});
      stubFetch(ROUTES);

      await executeQuery('2010/01/15', '00:00-01:00', { format: 'TEXT' });

      expect(stdout).toHaveBeenCalledWith(TABLE_TEXT.trimEnd());
    });

    it('should print columns and rows as JSON', async () => {
      initializeContext({ json: true });
      stubFetch(ROUTES);

      await executeQuery('2010/01/15', '00:00-01:00', { format: 'txt', camera: 'uvis2' });

      const table = parseFocusTable(TABLE_TEXT);
      expect(stdout).toHaveBeenCalledWith(JSON.stringify({ columns: table.columns, rows: table.rows }, null, 2));
    });

    it('should write the plot for BOTH', async () => {
      initializeContext({});
      stubFetch(ROUTES);
      const output = join(dir, 'focus.png');

      await executeQuery('2010/01/15', '00:00-01:00', { format: 'both', output });

      expect(Array.from(await readFile(output))).toEqual(Array.from(PNG_BYTES));
      expect(stdout).toHaveBeenCalledWith(TABLE_TEXT.trimEnd());
    });

    it('should require an output path for plots before querying', async () => {
      initializeContext({});
      const mock = stubFetch(ROUTES);

      await expect(executeQuery('2010/01/15', '00:00-01:00', { format: 'PNG' })).rejects.toThrow(
        '--output is required for PNG output'
      );
      expect(mock).not.toHaveBeenCalled();
    });
  });

  describe('annotate', () => {
    it('should report the mean written to each file', async () => {
      initializeContext({});
      stubFetch([
        { url: ENDPOINT, method: 'POST', contentType: 'text/html', body: EMPTY_PAGE },
        {
          url: `${ORIGIN}/images/focusdata2010.01.15_0002-0010.txt`,
          contentType: 'text/plain',
          body: '00:05:00 -2.0\n00:10:00 -1.0\n',
        },
      ]);
      const path = join(dir, 'exposure.fits');
      await writeFile(path, buildFitsFile(OBSERVATION_ENTRIES));

      await executeAnnotate([path], { keyword: 'MEANFOC' });

      expect(stdout).toHaveBeenCalledWith(`${path}: MEANFOC = -1.5 (2 rows)`);
    });

    it('should reject an invalid keyword', async () => {
      initializeContext({});

      await expect(executeAnnotate(['x.fits'], { keyword: 'TOOLONGKEY' })).rejects.toBeInstanceOf(
        InvalidParameterError
      );
    });
  });
});
