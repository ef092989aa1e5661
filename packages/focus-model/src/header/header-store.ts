/**
 * Image header abstraction
 *
 * The annotator only needs to read a handful of keywords and write one.
 * FitsHeader implements this for FITS files; callers holding headers from
 * elsewhere can pass any implementation.
 */

export type HeaderValue = string | number | boolean;

export interface HeaderStore {
  get(keyword: string): HeaderValue | undefined;
  /**
   * Add or overwrite one keyword, leaving every other entry untouched
   *
   * When comment is omitted an existing comment is kept.
   */
  set(keyword: string, value: HeaderValue, comment?: string): void;
}

export function getString(store: HeaderStore, keyword: string): string | undefined {
  const value = store.get(keyword);
  return typeof value === 'string' ? value.trim() : undefined;
}

export function getNumber(store: HeaderStore, keyword: string): number | undefined {
  const value = store.get(keyword);
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}
