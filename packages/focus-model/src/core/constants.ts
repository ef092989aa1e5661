/**
 * Shared constants for the HST Focus Model client
 *
 * Values describing the remote service and the cameras it models. These are
 * process-wide and never mutated at runtime.
 */

// ============================================================================
// Service
// ============================================================================

/**
 * Origin of the STScI focus model service
 */
export const FOCUS_TOOL_ORIGIN = 'https://focustool.stsci.edu';

/**
 * CGI script behind the web form (generates the table and plot on the server)
 */
export const FOCUS_REQUEST_PATH = '/cgi-bin/control3.py';

/**
 * Generated-file path templates. Placeholders: {year} {date} {start} {stop},
 * with date as MM.DD and times as HHMM.
 */
export const TABLE_PATH_TEMPLATE = '/images/focusdata{year}.{date}_{start}-{stop}.txt';
export const PLOT_PATH_TEMPLATE = '/images/focusplot{year}.{date}_{start}-{stop}.png';

/**
 * Per-request timeout (ms)
 */
export const DEFAULT_TIMEOUT_MS = 60_000;

export const DEFAULT_USER_AGENT = 'hst-focus-model/1.0';

// ============================================================================
// Query Domain
// ============================================================================

/**
 * First year covered by the 5-minute temperature telemetry the model uses
 */
export const FIRST_TELEMETRY_YEAR = 2003;

/**
 * Cameras and channels the model has zero-point offsets for
 *
 * - UVIS1, UVIS2: WFC3/UVIS chips
 * - WFC1, WFC2: ACS/WFC chips
 * - HRC: ACS/HRC
 * - PC: WFPC2 planetary camera
 */
export const CAMERAS = ['UVIS1', 'UVIS2', 'WFC1', 'WFC2', 'HRC', 'PC'] as const;

export type Camera = (typeof CAMERAS)[number];

export const OUTPUT_FORMATS = ['TEXT', 'PNG', 'BOTH'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const DEFAULT_FORMAT: OutputFormat = 'TEXT';

/**
 * Model sampling cadence in minutes (telemetry interval)
 */
export const MODEL_CADENCE_MINUTES = 5;

// ============================================================================
// Header Annotation
// ============================================================================

/**
 * FITS keyword receiving the mean model focus
 */
export const MEAN_FOCUS_KEYWORD = 'MEANFOC';

export const MEAN_FOCUS_COMMENT = 'Mean HST focus model defocus (microns)';

export const PNG_SIGNATURE = Object.freeze([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
