/**
 * Response Parser
 *
 * All knowledge of the service's output formats lives here:
 * - how a form submission response maps onto the requested artifacts
 * - the text table layout
 * - the PNG plot check
 *
 * Tests drive this module with literal fixture strings.
 */

import { PNG_SIGNATURE, type OutputFormat } from '../core/constants.js';
import { ParseError } from '../core/errors.js';
import type { HTTPResponse } from '../core/http-client.js';
import type { FocusRow, FocusTable, ImageArtifact } from '../core/types.js';
import { formatClock, parseCalendarDate, parseClock } from '../core/utils/time.js';

// ============================================================================
// Submission Response
// ============================================================================

/**
 * Where an artifact comes from: the submission body itself, or a generated
 * file that still has to be fetched
 */
export type ArtifactSource =
  | { readonly kind: 'inline'; readonly url: string; readonly body: Uint8Array }
  | { readonly kind: 'remote'; readonly url: string };

export interface ArtifactPlan {
  readonly table?: ArtifactSource;
  readonly plot?: ArtifactSource;
}

export interface FallbackUrls {
  readonly table: string;
  readonly plot: string;
}

const TABLE_REFERENCE = /(?:^|\/)focusdata[^/]*\.txt$/i;
const PLOT_REFERENCE = /(?:^|\/)focusplot[^/]*\.png$/i;
const REFERENCE_ATTRIBUTE = /\b(?:href|src)\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'>]+))/gi;

/**
 * Decide how to obtain the requested artifacts from the form submission response
 *
 * - text/plain body, TEXT requested: the body is the table
 * - image/png body, PNG requested: the body is the plot
 * - anything else (the results page): generated files referenced by
 *   href/src attributes, or the conventional paths when none are referenced
 *
 * @throws {ParseError} When a direct body does not serve the requested format,
 *   or the page references more than one candidate for an artifact
 */
export function interpretSubmission(
  response: HTTPResponse,
  format: OutputFormat,
  fallback: FallbackUrls
): ArtifactPlan {
  if (response.contentType === 'text/plain') {
    if (format !== 'TEXT') {
      throw new ParseError(`Expected ${format} output but the service returned a bare text body`, {
        url: response.url,
      });
    }
    return { table: { kind: 'inline', url: response.url, body: response.body } };
  }

  if (response.contentType === 'image/png') {
    if (format !== 'PNG') {
      throw new ParseError(`Expected ${format} output but the service returned a bare image body`, {
        url: response.url,
      });
    }
    return { plot: { kind: 'inline', url: response.url, body: response.body } };
  }

  const references = extractReferences(decodeText(response.body, response.url), response.url);
  const wantsTable = format === 'TEXT' || format === 'BOTH';
  const wantsPlot = format === 'PNG' || format === 'BOTH';

  return {
    ...(wantsTable && {
      table: selectReference(references, TABLE_REFERENCE, 'table', fallback.table, response.url),
    }),
    ...(wantsPlot && {
      plot: selectReference(references, PLOT_REFERENCE, 'plot', fallback.plot, response.url),
    }),
  };
}

/**
 * Absolute URLs of every href/src attribute in a page, in document order
 */
export function extractReferences(html: string, baseUrl: string): string[] {
  const urls: string[] = [];

  for (const match of html.matchAll(REFERENCE_ATTRIBUTE)) {
    const value = match[1] ?? match[2] ?? match[3] ?? '';
    if (value === '') continue;

    try {
      urls.push(new URL(value, baseUrl).toString());
    } catch {
      // Unresolvable attribute values (e.g. "javascript:" fragments) are not artifact links
      continue;
    }
  }

  return urls;
}

function selectReference(
  references: readonly string[],
  pattern: RegExp,
  label: 'table' | 'plot',
  fallbackUrl: string,
  pageUrl: string
): ArtifactSource {
  const candidates = [
    ...new Set(references.filter((reference) => pattern.test(new URL(reference).pathname))),
  ];

  if (candidates.length > 1) {
    throw new ParseError(
      `Ambiguous ${label} reference in service response: ${candidates.join(', ')}`,
      { url: pageUrl }
    );
  }

  return { kind: 'remote', url: candidates[0] ?? fallbackUrl };
}

// ============================================================================
// Text Table
// ============================================================================

const NUMBER_TOKEN = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;
const DATA_ROW_START = /^[-+.\d]/;

const decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode a response body as UTF-8
 *
 * @throws {ParseError} When the body holds malformed byte sequences
 */
export function decodeText(bytes: Uint8Array, url?: string): string {
  try {
    return decoder.decode(bytes);
  } catch (error) {
    if (error instanceof TypeError) {
      throw new ParseError('Response is not valid UTF-8', { url });
    }
    throw error;
  }
}

/**
 * Parse one numeric token strictly (no partial parses, no NaN)
 */
export function parseNumber(token: string): number | undefined {
  if (!NUMBER_TOKEN.test(token)) {
    return undefined;
  }
  const value = Number(token);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Parse the model output table
 *
 * Header and comment lines (first token not numeric-looking) may precede the
 * data; the last one before the first row names the columns. Each data row is
 * `[julian-date] [date] time defocus`.
 *
 * @throws {ParseError} On a malformed row or decreasing timestamps
 */
export function parseFocusTable(text: string, options: { url?: string } = {}): FocusTable {
  const rows: FocusRow[] = [];
  let columns: string[] = [];
  let previous: FocusRow | undefined;

  const lines = text.split(/\r?\n/);

  for (let index = 0; index < lines.length; index++) {
    const trimmed = lines[index].trim();
    if (trimmed === '') continue;

    const lineNumber = index + 1;

    if (trimmed.startsWith('#') || !DATA_ROW_START.test(trimmed)) {
      if (rows.length > 0) {
        throw new ParseError(`Unexpected non-data line after table rows: "${trimmed}"`, {
          line: lineNumber,
          url: options.url,
        });
      }
      const names = trimmed.replace(/^#+/, '').trim();
      if (names !== '') {
        columns = names.split(/\s+/);
      }
      continue;
    }

    const row = parseRow(trimmed.split(/\s+/), lineNumber, options.url);

    if (previous && compareRows(row, previous) < 0) {
      throw new ParseError(
        `Timestamp ${row.timestamp} is earlier than the preceding row (${previous.timestamp})`,
        { line: lineNumber, url: options.url }
      );
    }

    rows.push(row);
    previous = row;
  }

  return { columns, rows, raw: text };
}

function parseRow(tokens: readonly string[], line: number, url: string | undefined): FocusRow {
  if (tokens.length < 2) {
    throw new ParseError(`Expected a timestamp and a defocus value, got "${tokens.join(' ')}"`, {
      line,
      url,
    });
  }

  const defocusToken = tokens[tokens.length - 1];
  const defocus = parseNumber(defocusToken);
  if (defocus === undefined) {
    throw new ParseError(`Malformed defocus value "${defocusToken}"`, { line, url });
  }

  let secondsOfDay: number | undefined;
  let date: string | undefined;
  let julianDate: number | undefined;

  for (let position = 0; position < tokens.length - 1; position++) {
    const token = tokens[position];

    const clock = parseClock(token);
    if (clock !== undefined && secondsOfDay === undefined) {
      secondsOfDay = clock;
      continue;
    }

    const calendar = parseCalendarDate(token);
    if (calendar !== undefined && date === undefined) {
      date = calendar;
      continue;
    }

    const numeric = position === 0 ? parseNumber(token) : undefined;
    if (numeric !== undefined) {
      julianDate = numeric;
      continue;
    }

    throw new ParseError(`Unexpected token "${token}"`, { line, url });
  }

  if (secondsOfDay === undefined) {
    throw new ParseError(`Row has no timestamp: "${tokens.join(' ')}"`, { line, url });
  }

  return {
    timestamp: formatClock(secondsOfDay),
    secondsOfDay,
    ...(date !== undefined && { date }),
    ...(julianDate !== undefined && { julianDate }),
    defocus,
  };
}

function compareRows(a: FocusRow, b: FocusRow): number {
  if (a.date !== undefined && b.date !== undefined && a.date !== b.date) {
    return a.date < b.date ? -1 : 1;
  }
  return a.secondsOfDay - b.secondsOfDay;
}

// ============================================================================
// Plot
// ============================================================================

/**
 * Wrap plot bytes after checking they are a PNG
 *
 * @throws {ParseError} For empty or non-PNG payloads
 */
export function parseImage(bytes: Uint8Array, url: string): ImageArtifact {
  if (bytes.byteLength === 0) {
    throw new ParseError('Plot response is empty', { url });
  }

  const isPng =
    bytes.byteLength >= PNG_SIGNATURE.length &&
    PNG_SIGNATURE.every((byte, index) => bytes[index] === byte);

  if (!isPng) {
    throw new ParseError('Plot response is not a PNG image', { url });
  }

  return { contentType: 'image/png', bytes, url };
}
