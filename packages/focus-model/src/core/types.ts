/**
 * Core domain types for focus model queries and results
 */

import type { Camera, OutputFormat } from './constants.js';

// ============================================================================
// Query
// ============================================================================

/**
 * Query as supplied by a caller (unvalidated)
 *
 * camera falls back to the client's default camera, format to TEXT.
 */
export interface QueryInput<F extends OutputFormat = OutputFormat> {
  /** Year of observation; a 4-digit string is accepted */
  readonly year: number | string;
  /** MM/DD */
  readonly date: string;
  /** 24-hour HH:MM */
  readonly startTime: string;
  /** 24-hour HH:MM, not before startTime */
  readonly endTime: string;
  readonly camera?: Camera;
  readonly format?: F;
}

/**
 * Validated query, all fields resolved
 */
export interface QueryParameters {
  readonly year: number;
  readonly date: string;
  readonly startTime: string;
  readonly endTime: string;
  readonly camera: Camera;
  readonly format: OutputFormat;
}

// ============================================================================
// Results
// ============================================================================

export interface FocusRow {
  /** Time of day, normalised to HH:MM:SS */
  readonly timestamp: string;
  readonly secondsOfDay: number;
  /** Calendar date as YYYY-MM-DD, when the row carries one */
  readonly date?: string;
  /** Leading Julian / Modified Julian date column, when present */
  readonly julianDate?: number;
  /** Model defocus (microns) */
  readonly defocus: number;
}

/**
 * Parsed text table, rows in service order
 */
export interface FocusTable {
  readonly columns: readonly string[];
  readonly rows: readonly FocusRow[];
  /** Body exactly as received */
  readonly raw: string;
}

/**
 * Plot bytes, returned verbatim
 */
export interface ImageArtifact {
  readonly contentType: 'image/png';
  readonly bytes: Uint8Array;
  readonly url: string;
}

