/**
 * Retry policy
 *
 * Pure decision logic, evaluated by the transport after every attempt. Kept
 * separate from the I/O so that the schedule can be tested without timers.
 */

import type { NetworkError } from '../errors';
import { HttpStatuses } from './axios-client';
import type { RetryReason, TransportResponse } from './types';

export type RetryPolicy = {
  /** Retries allowed after the first attempt, shared by every trigger */
  retryCount: number;
  minWait: number;
  maxWait: number;
  retryOnNetworkError: boolean;
};

export type AttemptOutcome =
  | { type: 'response'; response: TransportResponse }
  | { type: 'network'; error: NetworkError };

export type AttemptState = {
  /** Attempt that just finished (1-based) */
  attempt: number;
  /** Whether the 401 refresh path was already taken during this call */
  refreshed: boolean;
};

export type RetryDecision =
  | { retry: false }
  | { retry: true; reason: RetryReason; delay: number; refreshToken: boolean };

const NO_RETRY: RetryDecision = { retry: false };

const DELTA_SECONDS = /^\d+$/;
const IMF_FIXDATE =
  /^(Mon|Tue|Wed|Thu|Fri|Sat|Sun), \d{2} (Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec) \d{4} \d{2}:\d{2}:\d{2} GMT$/;

/**
 * Exponential backoff: minWait doubled per retry, capped at maxWait
 *
 * @param retryIndex - 0 for the first retry
 */
export function backoffDelay(retryIndex: number, minWait: number, maxWait: number): number {
  return Math.min(maxWait, minWait * 2 ** retryIndex);
}

/**
 * Parse a `Retry-After` header: delta-seconds or an IMF-fixdate
 * (`Wed, 21 Oct 2026 07:28:00 GMT`)
 *
 * @returns Wait in milliseconds, or undefined for any other shape
 */
export function parseRetryAfter(value: string | undefined, now: number = Date.now()): number | undefined {
  if (value === undefined) return undefined;

  const trimmed = value.trim();
  if (trimmed === '') return undefined;
  if (DELTA_SECONDS.test(trimmed)) {
    return Number(trimmed) * 1000;
  }
  if (!IMF_FIXDATE.test(trimmed)) return undefined;

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

/**
 * Decide whether to retry after an attempt
 */
export function decideRetry(outcome: AttemptOutcome, state: AttemptState, policy: RetryPolicy): RetryDecision {
  const retriesUsed = state.attempt - 1;
  if (retriesUsed >= policy.retryCount) {
    return NO_RETRY;
  }

  const backoff = backoffDelay(retriesUsed, policy.minWait, policy.maxWait);

  if (outcome.type === 'network') {
    return policy.retryOnNetworkError
      ? { retry: true, reason: 'network_error', delay: backoff, refreshToken: false }
      : NO_RETRY;
  }

  const { status, headers } = outcome.response;

  if (status === HttpStatuses.unauthorized) {
    return state.refreshed ? NO_RETRY : { retry: true, reason: 'unauthorized', delay: 0, refreshToken: true };
  }

  if (status === HttpStatuses.tooManyRequests) {
    const delay = parseRetryAfter(headers['retry-after']) ?? backoff;
    return { retry: true, reason: 'rate_limited', delay, refreshToken: false };
  }

  if (status >= 500 && status !== HttpStatuses.notImplemented) {
    return { retry: true, reason: 'server_error', delay: backoff, refreshToken: false };
  }

  return NO_RETRY;
}
