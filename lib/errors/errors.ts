/**
 * Error classes
 *
 * Every failure that leaves the client is one of the classes below, already
 * classified, with enough context (status, code, body snippet) to diagnose it
 * without re-inspecting transport state.
 *
 * @example
 * ```typescript
 * try {
 *   await client.get('/v1/orgDevices');
 * } catch (error) {
 *   if (error instanceof APIError) {
 *     console.error(`${error.status} ${error.code}: ${error.detail}`);
 *   }
 * }
 * ```
 */

import type { APIErrorEntry, APIErrorLinks, APIErrorSource } from './types';

export type AxmErrorKind = 'auth' | 'network' | 'api' | 'http' | 'validation' | 'pagination';

/**
 * Whether an HTTP status may succeed on a later attempt.
 * 401 is not listed: it is recovered by refreshing the token, not by waiting.
 */
export function isRetryableStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status !== 501);
}

/**
 * Base class of every error thrown by the client
 */
export abstract class AxmError extends Error {
  abstract readonly kind: AxmErrorKind;

  /** HTTP status code, 0 when no response was received */
  readonly status: number;

  /** Timestamp when the error occurred */
  readonly timestamp: string;

  protected constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.status = options.status ?? 0;
    this.timestamp = new Date().toISOString();
  }

  /**
   * Check if the error is retryable
   */
  isRetryable(): boolean {
    return false;
  }

  /**
   * Convert to JSON-serializable object
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      status: this.status,
      timestamp: this.timestamp,
    };
  }

  toString(): string {
    return `${this.name}: ${this.message}`;
  }
}

/**
 * Assertion signing or token exchange failure
 */
export class AuthError extends AxmError {
  readonly kind = 'auth' as const;

  /** OAuth 2.0 error code returned by the token endpoint, if any */
  readonly oauthError?: string;

  /** Start of the token endpoint response body */
  readonly bodySnippet?: string;

  constructor(
    message: string,
    options: { status?: number; oauthError?: string; bodySnippet?: string; cause?: unknown } = {},
  ) {
    super(message, options);
    this.name = 'AuthError';
    this.oauthError = options.oauthError;
    this.bodySnippet = options.bodySnippet;
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), oauthError: this.oauthError, bodySnippet: this.bodySnippet };
  }
}

/**
 * No HTTP response was received (connection failure, timeout, DNS...)
 */
export class NetworkError extends AxmError {
  readonly kind = 'network' as const;

  /** Low-level error code such as ECONNREFUSED or ECONNABORTED */
  readonly code?: string;

  constructor(message: string, options: { code?: string; cause?: unknown } = {}) {
    super(message, { status: 0, cause: options.cause });
    this.name = 'NetworkError';
    this.code = options.code;
  }

  isRetryable(): boolean {
    return true;
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), code: this.code };
  }
}

/**
 * Non-2xx response carrying the structured `{ errors: [...] }` envelope.
 * Fields mirror the first entry; the full list is kept on `errors`.
 */
export class APIError extends AxmError {
  readonly kind = 'api' as const;

  readonly id?: string;
  readonly code: string;
  readonly title: string;
  readonly detail: string;
  readonly source?: APIErrorSource;
  readonly links?: APIErrorLinks;
  readonly meta?: Record<string, unknown>;

  /** Every entry of the envelope, in response order */
  readonly errors: readonly APIErrorEntry[];

  constructor(status: number, errors: readonly [APIErrorEntry, ...APIErrorEntry[]]) {
    const [first] = errors;
    super(APIError.formatMessage(status, first), { status });
    this.name = 'APIError';
    this.id = first.id;
    this.code = first.code;
    this.title = first.title;
    this.detail = first.detail;
    this.source = first.source;
    this.links = first.links;
    this.meta = first.meta;
    this.errors = errors;
  }

  /**
   * `"<status>: <code> - <detail>"`, or `"<status>: <detail>"` without a code
   */
  static formatMessage(status: number, entry: APIErrorEntry): string {
    const entryStatus = entry.status || String(status);
    if (entry.code) {
      return `${entryStatus}: ${entry.code} - ${entry.detail}`;
    }
    return `${entryStatus}: ${entry.detail}`;
  }

  isRetryable(): boolean {
    return isRetryableStatus(this.status);
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      id: this.id,
      code: this.code,
      title: this.title,
      detail: this.detail,
      source: this.source,
      errors: this.errors,
    };
  }
}

/**
 * Non-2xx response without a structured error body
 */
export class HTTPError extends AxmError {
  readonly kind = 'http' as const;

  readonly statusText: string;
  readonly bodySnippet: string;

  constructor(status: number, statusText: string, bodySnippet: string) {
    super(`HTTP ${status}: ${statusText || 'Request failed'}`, { status });
    this.name = 'HTTPError';
    this.statusText = statusText;
    this.bodySnippet = bodySnippet;
  }

  isRetryable(): boolean {
    return isRetryableStatus(this.status);
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), statusText: this.statusText, bodySnippet: this.bodySnippet };
  }
}

/**
 * Caller-supplied input is invalid. Raised before any network access.
 */
export class ValidationError extends AxmError {
  readonly kind = 'validation' as const;

  /** Name of the offending field or option */
  readonly field?: string;

  constructor(message: string, field?: string, options: { cause?: unknown } = {}) {
    super(message, options);
    this.name = 'ValidationError';
    this.field = field;
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), field: this.field };
  }
}

/**
 * A walk cannot continue: cursor cycle, unparsable next link, malformed page
 * or page cap exceeded.
 */
export class PaginationError extends AxmError {
  readonly kind = 'pagination' as const;

  /** Number of pages consumed before the walk stopped */
  readonly pagesConsumed: number;

  readonly nextLink?: string;

  constructor(message: string, options: { pagesConsumed: number; nextLink?: string; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = 'PaginationError';
    this.pagesConsumed = options.pagesConsumed;
    this.nextLink = options.nextLink;
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), pagesConsumed: this.pagesConsumed, nextLink: this.nextLink };
  }
}
