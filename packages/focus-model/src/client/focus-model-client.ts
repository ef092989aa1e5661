/**
 * Focus Model Client
 *
 * Queries the STScI HST Focus Model by submitting its web form, then reads
 * the generated table and/or plot. For a given time window the model
 * estimates the defocus at one camera from telemetered temperatures plus a
 * long-term secular term and per-camera zero points.
 *
 * Requests run one after another and are never retried; the first failure
 * aborts the whole query.
 *
 * USAGE:
 * ```typescript
 * const client = new FocusModelClient();
 * const table = await client.getModelData({
 *   year: 2010,
 *   date: '01/15',
 *   startTime: '00:00',
 *   endTime: '01:00',
 *   camera: 'UVIS2',
 * });
 * ```
 */

import { createConfig, getEndpointUrl, type FocusModelConfig } from '../core/config.js';
import { ParseError } from '../core/errors.js';
import { HTTPClient } from '../core/http-client.js';
import type { FocusTable, ImageArtifact, QueryInput, QueryParameters } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { parseClock, toIsoDate } from '../core/utils/time.js';
import {
  decodeText,
  interpretSubmission,
  parseFocusTable,
  parseImage,
  type ArtifactSource,
} from '../parsing/response-parser.js';
import { validateQuery } from '../validation/query-validator.js';
import { FORM_CONTENT_TYPE, buildArtifactPaths, buildFormBody } from './request-builder.js';

const log = createLogger('client');

export type ModelDataResult = FocusTable | ImageArtifact | readonly [FocusTable, ImageArtifact];

export class FocusModelClient {
  readonly config: FocusModelConfig;
  private readonly http: HTTPClient;

  constructor(config: Partial<FocusModelConfig> = {}) {
    this.config = createConfig(config);
    this.http = new HTTPClient({
      timeoutMs: this.config.timeoutMs,
      userAgent: this.config.userAgent,
    });
  }

  /**
   * Retrieve model focus data for a time window on one day
   *
   * Make sure the camera was on the telescope at the requested time; the
   * model happily produces values for any period.
   *
   * @returns The table (TEXT, default), the plot (PNG), or both in that order (BOTH)
   * @throws {InvalidParameterError} Before any request, for a malformed query
   * @throws {NetworkError} On transport failure, timeout or non-2xx status
   * @throws {ParseError} When a response does not have the expected shape
   */
  getModelData(input: QueryInput<'PNG'> & { readonly format: 'PNG' }): Promise<ImageArtifact>;
  getModelData(
    input: QueryInput<'BOTH'> & { readonly format: 'BOTH' }
  ): Promise<readonly [FocusTable, ImageArtifact]>;
  getModelData(input: QueryInput<'TEXT'>): Promise<FocusTable>;
  getModelData(input: QueryInput): Promise<ModelDataResult>;
  async getModelData(input: QueryInput): Promise<ModelDataResult> {
    const query = validateQuery(input, { defaultCamera: this.config.defaultCamera });
    const endpoint = getEndpointUrl(this.config);

    log.info('Submitting focus model query', {
      year: query.year,
      date: query.date,
      start: query.startTime,
      stop: query.endTime,
      camera: query.camera,
      format: query.format,
    });

    const submission = await this.http.request(endpoint, {
      method: 'POST',
      body: buildFormBody(query),
      headers: { 'Content-Type': FORM_CONTENT_TYPE },
    });

    const paths = buildArtifactPaths(query);
    const plan = interpretSubmission(submission, query.format, {
      table: new URL(paths.table, this.config.origin).toString(),
      plot: new URL(paths.plot, this.config.origin).toString(),
    });

    const table = plan.table ? await this.readTable(plan.table, query) : undefined;
    const plot = plan.plot ? await this.readPlot(plan.plot) : undefined;

    switch (query.format) {
      case 'TEXT':
        if (table) return table;
        break;
      case 'PNG':
        if (plot) return plot;
        break;
      case 'BOTH':
        if (table && plot) return [table, plot] as const;
        break;
    }

    throw new ParseError(`Service response did not provide the requested ${query.format} output`, {
      url: endpoint,
    });
  }

  private async readTable(source: ArtifactSource, query: QueryParameters): Promise<FocusTable> {
    const body =
      source.kind === 'inline'
        ? source.body
        : (await this.http.request(source.url, { headers: { Accept: 'text/plain' } })).body;

    const table = parseFocusTable(decodeText(body, source.url), { url: source.url });
    assertWithinWindow(table, query, source.url);

    log.debug('Parsed focus table', { url: source.url, rows: table.rows.length });
    return table;
  }

  private async readPlot(source: ArtifactSource): Promise<ImageArtifact> {
    const body =
      source.kind === 'inline'
        ? source.body
        : (await this.http.request(source.url, { headers: { Accept: 'image/png' } })).body;

    return parseImage(body, source.url);
  }
}

/**
 * Every row must fall on the query's date and inside [start, end] of its
 * window (minute resolution). Rows without a date column are checked by
 * time of day only.
 *
 * @throws {ParseError} For the first row outside the window
 */
export function assertWithinWindow(table: FocusTable, query: QueryParameters, url?: string): void {
  const [month, day] = query.date.split('/').map(Number);
  const isoDate = toIsoDate(query.year, month, day);
  const start = parseClock(query.startTime) ?? 0;
  const end = (parseClock(query.endTime) ?? 0) + 59;

  for (const row of table.rows) {
    if (row.date !== undefined && row.date !== isoDate) {
      throw new ParseError(`Row dated ${row.date} lies outside the requested date ${isoDate}`, {
        url,
      });
    }
    if (row.secondsOfDay < start || row.secondsOfDay > end) {
      throw new ParseError(
        `Row at ${row.timestamp} lies outside the requested window ${query.startTime}-${query.endTime}`,
        { url }
      );
    }
  }
}

// ============================================================================
// Convenience Functions
// ============================================================================

let defaultClient: FocusModelClient | null = null;

/**
 * Get or create the default client
 */
export function getFocusModelClient(): FocusModelClient {
  if (!defaultClient) {
    defaultClient = new FocusModelClient();
  }
  return defaultClient;
}

/**
 * Convenience: query with the default client
 */
export function getModelData(input: QueryInput<'PNG'> & { readonly format: 'PNG' }): Promise<ImageArtifact>;
export function getModelData(
  input: QueryInput<'BOTH'> & { readonly format: 'BOTH' }
): Promise<readonly [FocusTable, ImageArtifact]>;
export function getModelData(input: QueryInput<'TEXT'>): Promise<FocusTable>;
export function getModelData(input: QueryInput): Promise<ModelDataResult>;
export function getModelData(input: QueryInput): Promise<ModelDataResult> {
  return getFocusModelClient().getModelData(input);
}
