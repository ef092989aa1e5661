/**
 * Request Builder
 *
 * Mirrors the controls of the STScI focus model web form. Submitting the form
 * makes the server generate a table and a plot under /images/; the paths of
 * those files follow from the query alone.
 */

import { PLOT_PATH_TEMPLATE, TABLE_PATH_TEMPLATE } from '../core/constants.js';
import type { QueryParameters } from '../core/types.js';

export const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

/**
 * Form controls in the order the web form posts them
 */
export function buildFormFields(query: QueryParameters): ReadonlyArray<readonly [string, string]> {
  return [
    ['Output', 'Model'],
    ['Year', String(query.year)],
    ['Camera', query.camera],
    ['Date', query.date],
    ['Start', query.startTime],
    ['Stop', query.endTime],
  ];
}

/**
 * application/x-www-form-urlencoded body
 */
export function buildFormBody(query: QueryParameters): string {
  const params = new URLSearchParams();
  for (const [name, value] of buildFormFields(query)) {
    params.append(name, value);
  }
  return params.toString();
}

export interface ArtifactPaths {
  readonly table: string;
  readonly plot: string;
}

/**
 * Paths of the files the server generates for a query
 *
 * MM/DD becomes MM.DD and HH:MM becomes HHMM, e.g.
 * /images/focusdata2010.01.15_0000-0100.txt
 */
export function buildArtifactPaths(query: QueryParameters): ArtifactPaths {
  const values: Record<string, string> = {
    year: String(query.year),
    date: query.date.replace(/\//g, '.'),
    start: query.startTime.replace(/:/g, ''),
    stop: query.endTime.replace(/:/g, ''),
  };

  const fill = (template: string): string =>
    template.replace(/\{(\w+)\}/g, (placeholder: string, key: string) => values[key] ?? placeholder);

  return {
    table: fill(TABLE_PATH_TEMPLATE),
    plot: fill(PLOT_PATH_TEMPLATE),
  };
}
