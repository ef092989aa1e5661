/**
 * Focus Model Error Types
 *
 * Every failure surfaces as one of these classes. Nothing is retried or
 * recovered locally; callers decide whether to re-issue a query.
 */

/**
 * Base class for all errors raised by this package
 */
export class FocusModelError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Single validation problem on a caller-supplied value
 */
export interface ParameterIssue {
  readonly path: string;
  readonly message: string;
}

/**
 * Caller input was rejected before anything went over the wire
 */
export class InvalidParameterError extends FocusModelError {
  constructor(
    message: string,
    public readonly issues: readonly ParameterIssue[] = []
  ) {
    super(message);
  }

  /**
   * One line per issue, for CLI output
   */
  getSummary(): string {
    if (this.issues.length === 0) {
      return this.message;
    }
    return [this.message, ...this.issues.map((issue) => `  - ${issue.path}: ${issue.message}`)].join('\n');
  }
}

/**
 * Transport failure: connection refused, DNS, TLS, reset...
 */
export class NetworkError extends FocusModelError {
  constructor(
    message: string,
    public readonly url: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Request exceeded the client timeout (AbortController triggered)
 */
export class HTTPTimeoutError extends NetworkError {
  constructor(
    url: string,
    public readonly timeoutMs: number
  ) {
    super(`Request timeout after ${timeoutMs}ms: ${url}`, url);
  }
}

/**
 * Server answered with a non-success status
 */
export class HTTPStatusError extends NetworkError {
  constructor(
    url: string,
    public readonly statusCode: number,
    public readonly statusText: string
  ) {
    super(`Bad response from server: ${statusCode} ${statusText} (${url})`, url);
  }
}

/**
 * Response did not have the expected shape
 */
export class ParseError extends FocusModelError {
  constructor(
    message: string,
    public readonly details: { readonly line?: number; readonly url?: string } = {}
  ) {
    super(details.line !== undefined ? `Line ${details.line}: ${message}` : message);
  }

  get line(): number | undefined {
    return this.details.line;
  }

  get url(): string | undefined {
    return this.details.url;
  }
}

/**
 * Mean requested over a table with no rows
 */
export class EmptyTableError extends FocusModelError {
  constructor(message = 'Focus table has no rows; mean is undefined') {
    super(message);
  }
}

/**
 * Header target could not be opened, recognised or written
 */
export class MetadataWriteError extends FocusModelError {
  constructor(
    message: string,
    public readonly target: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Normalise an unknown thrown value
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
