export { RetryableTransport, TRANSPORT_DEFAULTS, compactQuery } from './retryable-transport';
export type { RetryableTransportConfig } from './retryable-transport';
export { backoffDelay, decideRetry, parseRetryAfter } from './retry-policy';
export type { AttemptOutcome, AttemptState, RetryDecision, RetryPolicy } from './retry-policy';
export { HttpStatuses, createHttpClient, isSuccessStatus } from './axios-client';
export { RequestMethod } from './types';
export type {
  ExecuteOptions,
  QueryParams,
  RetryEvent,
  RetryReason,
  TransportConfig,
  TransportRequest,
  TransportResponse,
} from './types';
