/**
 * Global Test Setup for the focus model client
 *
 * - Library logs are limited to errors unless LOG_LEVEL is set explicitly
 * - Any fetch stub left behind by a test is removed
 *
 * TYPE SAFETY: No `any`, no loose casts.
 */

import { afterEach, vi } from 'vitest';

// Loggers read LOG_LEVEL when their module loads, which happens after this file runs
process.env.LOG_LEVEL ??= 'error';

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});
