/**
 * Focus Model Client Configuration
 *
 * Explicit configuration struct with one documented default per field.
 * Clients take a partial override at construction; the defaults themselves
 * are frozen.
 */

import {
  DEFAULT_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
  FOCUS_REQUEST_PATH,
  FOCUS_TOOL_ORIGIN,
  type Camera,
} from './constants.js';

export interface FocusModelConfig {
  /** Service origin; generated files are resolved against it (default: https://focustool.stsci.edu) */
  readonly origin: string;

  /** Form handler path (default: /cgi-bin/control3.py) */
  readonly requestPath: string;

  /** Timeout applied to each HTTP request in milliseconds (default: 60000) */
  readonly timeoutMs: number;

  /** User-Agent header (default: 'hst-focus-model/1.0') */
  readonly userAgent: string;

  /** Camera used when a query names none (default: UVIS1) */
  readonly defaultCamera: Camera;
}

export const DEFAULT_CONFIG: FocusModelConfig = Object.freeze({
  origin: FOCUS_TOOL_ORIGIN,
  requestPath: FOCUS_REQUEST_PATH,
  timeoutMs: DEFAULT_TIMEOUT_MS,
  userAgent: DEFAULT_USER_AGENT,
  defaultCamera: 'UVIS1',
});

/**
 * Merge overrides onto the defaults
 *
 * @throws Error if the timeout is not a positive finite number
 */
export function createConfig(overrides: Partial<FocusModelConfig> = {}): FocusModelConfig {
  const config: FocusModelConfig = {
    ...DEFAULT_CONFIG,
    ...overrides,
  };

  if (!Number.isFinite(config.timeoutMs) || config.timeoutMs <= 0) {
    throw new Error(`Timeout must be a positive number of milliseconds, got ${config.timeoutMs}`);
  }

  return Object.freeze(config);
}

/**
 * Full URL of the form handler
 */
export function getEndpointUrl(config: FocusModelConfig): string {
  return new URL(config.requestPath, config.origin).toString();
}
