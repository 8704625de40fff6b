import type { Logger } from '../services/logger';

export enum RequestMethod {
  GET = 'GET',
  POST = 'POST',
  PUT = 'PUT',
  PATCH = 'PATCH',
  DELETE = 'DELETE',
}

export type QueryParams = Readonly<Record<string, string>>;

/**
 * A single logical request. Never mutated once handed to the transport.
 */
export type TransportRequest = {
  readonly method: RequestMethod;
  /** Path relative to the base URL, e.g. `/v1/orgDevices` */
  readonly path: string;
  readonly query?: QueryParams;
  readonly headers?: Readonly<Record<string, string>>;
  /** Sent as JSON */
  readonly body?: unknown;
};

export type TransportResponse = {
  status: number;
  statusText: string;
  /** Header names are lower-cased */
  headers: Record<string, string>;
  /** Raw response body */
  body: string;
};

export type ExecuteOptions = {
  /** Aborts the in-flight attempt or backoff wait */
  signal?: AbortSignal;
};

export type RetryReason = 'unauthorized' | 'rate_limited' | 'server_error' | 'network_error';

/**
 * Emitted once per retry, before the wait
 */
export type RetryEvent = {
  reason: RetryReason;
  /** Attempt that failed (1-based) */
  attempt: number;
  /** Wait before the next attempt in milliseconds */
  delay: number;
  status?: number;
  method: RequestMethod;
  path: string;
};

/**
 * Retry and transport options
 */
export type TransportConfig = {
  /** Base URL of the API */
  baseURL: string;

  /** Retries allowed after the first attempt (default: 3) */
  retryCount?: number;

  /** First backoff wait in milliseconds (default: 1000) */
  minWait?: number;

  /** Backoff ceiling in milliseconds (default: 10000) */
  maxWait?: number;

  /** Per-request timeout in milliseconds (default: 30000) */
  timeout?: number;

  /** Retry when no response was received (default: true) */
  retryOnNetworkError?: boolean;

  /** Replaces the default User-Agent header */
  userAgent?: string;

  /** Appended to the default User-Agent as `<default>; <customAgent>` */
  customAgent?: string;

  /** Headers sent with every request; per-request headers override them */
  headers?: Record<string, string>;

  logger?: Logger;

  /** Callback for each retry (for logging/metrics) */
  onRetry?: (event: RetryEvent) => void;
};
