/**
 * HTTP client for the focus model service
 *
 * Thin wrapper over native fetch:
 * - One attempt per request (no retry, no backoff)
 * - Bounded timeout via AbortController
 * - Failures classified into NetworkError / HTTPTimeoutError / HTTPStatusError
 *
 * USAGE:
 * ```typescript
 * const client = new HTTPClient({ timeoutMs: 30000 });
 * const page = await client.request('https://focustool.stsci.edu/cgi-bin/control3.py', {
 *   method: 'POST',
 *   body: form.toString(),
 *   headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
 * });
 * ```
 */

import { DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT } from './constants.js';
import { HTTPStatusError, HTTPTimeoutError, NetworkError, toError } from './errors.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('http');

// ============================================================================
// Configuration Types
// ============================================================================

export interface HTTPClientConfig {
  /** Request timeout in milliseconds (default: 60000) */
  readonly timeoutMs: number;

  /** User-Agent header (default: 'hst-focus-model/1.0') */
  readonly userAgent: string;
}

/**
 * Per-request options
 */
export interface RequestOptions {
  /** HTTP method (default: 'GET') */
  readonly method?: 'GET' | 'POST';

  /** Additional HTTP headers */
  readonly headers?: Record<string, string>;

  /** Request body for POST */
  readonly body?: string;
}

/**
 * Fully read response
 */
export interface HTTPResponse {
  readonly url: string;
  readonly status: number;
  /** Media type without parameters, lower-cased ('' when absent) */
  readonly contentType: string;
  readonly body: Uint8Array;
}

// ============================================================================
// HTTP Client Implementation
// ============================================================================

export class HTTPClient {
  private readonly config: HTTPClientConfig;

  constructor(config?: Partial<HTTPClientConfig>) {
    this.config = {
      timeoutMs: DEFAULT_TIMEOUT_MS,
      userAgent: DEFAULT_USER_AGENT,
      ...config,
    };
  }

  get timeoutMs(): number {
    return this.config.timeoutMs;
  }

  /**
   * Issue a single request and read the whole body
   *
   * The timeout covers both the response headers and the body download.
   *
   * @throws {HTTPStatusError} For non-2xx responses
   * @throws {HTTPTimeoutError} If the request exceeds the timeout
   * @throws {NetworkError} For transport failures
   */
  async request(url: string, options: RequestOptions = {}): Promise<HTTPResponse> {
    const method = options.method ?? 'GET';
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);
    const started = Date.now();

    try {
      const response = await fetch(url, {
        method,
        headers: {
          'User-Agent': this.config.userAgent,
          ...options.headers,
        },
        body: options.body,
        redirect: 'follow',
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new HTTPStatusError(url, response.status, response.statusText);
      }

      const body = new Uint8Array(await response.arrayBuffer());

      log.debug('Request completed', {
        method,
        url,
        status: response.status,
        bytes: body.byteLength,
        durationMs: Date.now() - started,
      });

      return {
        url,
        status: response.status,
        contentType: parseMediaType(response.headers.get('content-type')),
        body,
      };
    } catch (error) {
      if (error instanceof NetworkError) {
        throw error;
      }

      if (controller.signal.aborted) {
        throw new HTTPTimeoutError(url, this.config.timeoutMs);
      }

      const cause = toError(error);
      throw new NetworkError(`Network error: ${cause.message}`, url, { cause });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * 'text/plain; charset=utf-8' -> 'text/plain'
 */
export function parseMediaType(header: string | null): string {
  if (!header) {
    return '';
  }
  return header.split(';')[0].trim().toLowerCase();
}
