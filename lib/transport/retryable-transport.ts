/**
 * Retryable transport
 *
 * Sends authenticated requests and applies the retry policy. Callers see
 * either a 2xx response or an already classified error.
 *
 * @example
 * ```typescript
 * const transport = new RetryableTransport(tokens, { baseURL: DEFAULT_BASE_URL });
 * const response = await transport.execute({ method: RequestMethod.GET, path: '/v1/orgDevices' });
 * ```
 */

import type { AxiosInstance, AxiosResponse } from 'axios';
import type { TokenSource } from '../auth/types';
import { AUTHORIZATION_HEADER_KEY, DEFAULT_USER_AGENT, USER_AGENT_HEADER_KEY } from '../constants';
import { APIError, type AxmError, ValidationError, classifyResponse } from '../errors';
import { type Logger, getDefaultLogger } from '../services/logger';
import { sleep } from '../utils/abort';
import { createHttpClient, isSuccessStatus, toNetworkError, toTransportResponse } from './axios-client';
import { type AttemptOutcome, type RetryPolicy, decideRetry } from './retry-policy';
import type { ExecuteOptions, QueryParams, TransportConfig, TransportRequest, TransportResponse } from './types';

export const TRANSPORT_DEFAULTS = {
  RETRY_COUNT: 3,
  MIN_WAIT: 1000,
  MAX_WAIT: 10000,
  TIMEOUT: 30000,
} as const;

export type RetryableTransportConfig = TransportConfig & {
  /** Axios instance used for API requests */
  httpClient?: AxiosInstance;
};

/**
 * Drop query parameters with empty values
 */
export function compactQuery(query: QueryParams | undefined): Record<string, string> {
  const params: Record<string, string> = {};
  if (!query) return params;

  for (const [key, value] of Object.entries(query)) {
    if (value !== '') {
      params[key] = value;
    }
  }
  return params;
}

function userAgentOf(config: TransportConfig): string {
  if (config.userAgent) return config.userAgent;
  return config.customAgent ? `${DEFAULT_USER_AGENT}; ${config.customAgent}` : DEFAULT_USER_AGENT;
}

function validateConfig(config: RetryableTransportConfig): void {
  if (!config.baseURL || config.baseURL.trim() === '') {
    throw new ValidationError('baseURL is required', 'baseURL');
  }
  if (config.retryCount !== undefined && (!Number.isInteger(config.retryCount) || config.retryCount < 0)) {
    throw new ValidationError('retryCount must be a non-negative integer', 'retryCount');
  }
  if (config.minWait !== undefined && config.minWait < 0) {
    throw new ValidationError('minWait cannot be negative', 'minWait');
  }
  if (config.maxWait !== undefined && config.maxWait < 0) {
    throw new ValidationError('maxWait cannot be negative', 'maxWait');
  }
  const minWait = config.minWait ?? TRANSPORT_DEFAULTS.MIN_WAIT;
  const maxWait = config.maxWait ?? TRANSPORT_DEFAULTS.MAX_WAIT;
  if (minWait > maxWait) {
    throw new ValidationError(`minWait (${minWait}ms) cannot exceed maxWait (${maxWait}ms)`, 'minWait');
  }
  if (config.timeout !== undefined && config.timeout <= 0) {
    throw new ValidationError('timeout must be positive', 'timeout');
  }
}

export class RetryableTransport {
  private readonly tokens: TokenSource;
  private readonly http: AxiosInstance;
  private readonly baseURL: string;
  private readonly policy: RetryPolicy;
  private readonly timeout: number;
  private readonly userAgent: string;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly logger: Logger;
  private readonly onRetry?: TransportConfig['onRetry'];

  /**
   * @throws {ValidationError} On an empty base URL or inconsistent retry settings
   */
  constructor(tokens: TokenSource, config: RetryableTransportConfig) {
    validateConfig(config);

    this.tokens = tokens;
    this.timeout = config.timeout ?? TRANSPORT_DEFAULTS.TIMEOUT;
    this.baseURL = config.baseURL;
    this.http = config.httpClient ?? createHttpClient({ baseURL: config.baseURL, timeout: this.timeout });
    this.policy = {
      retryCount: config.retryCount ?? TRANSPORT_DEFAULTS.RETRY_COUNT,
      minWait: config.minWait ?? TRANSPORT_DEFAULTS.MIN_WAIT,
      maxWait: config.maxWait ?? TRANSPORT_DEFAULTS.MAX_WAIT,
      retryOnNetworkError: config.retryOnNetworkError ?? true,
    };
    this.userAgent = userAgentOf(config);
    this.headers = { ...config.headers };
    this.logger = config.logger ?? getDefaultLogger();
    this.onRetry = config.onRetry;
  }

  /**
   * Send a request, retrying transient failures within the shared budget
   *
   * @returns The 2xx response
   * @throws {AuthError} If no token can be obtained (not retried)
   * @throws {APIError | HTTPError} For the last non-2xx response
   * @throws {NetworkError} When no response was received and retries are spent
   * @throws The signal's reason when aborted
   */
  async execute(request: TransportRequest, options: ExecuteOptions = {}): Promise<TransportResponse> {
    const { signal } = options;
    let attempt = 0;
    let refreshed = false;

    for (;;) {
      signal?.throwIfAborted();
      attempt++;

      const token = await this.tokens.getToken(signal);
      const outcome = await this.attempt(request, token.accessToken, signal);

      if (outcome.type === 'response' && isSuccessStatus(outcome.response.status)) {
        return outcome.response;
      }

      const decision = decideRetry(outcome, { attempt, refreshed }, this.policy);

      if (!decision.retry) {
        throw this.failure(request, outcome);
      }

      const status = outcome.type === 'response' ? outcome.response.status : undefined;
      this.logger.warn('Retrying request', {
        method: request.method,
        path: request.path,
        reason: decision.reason,
        attempt,
        delay: decision.delay,
        status,
      });
      this.onRetry?.({
        reason: decision.reason,
        attempt,
        delay: decision.delay,
        status,
        method: request.method,
        path: request.path,
      });

      if (decision.refreshToken) {
        refreshed = true;
        await this.tokens.forceRefresh(signal);
      }

      if (decision.delay > 0) {
        await sleep(decision.delay, signal);
      }
    }
  }

  private async attempt(request: TransportRequest, accessToken: string, signal?: AbortSignal): Promise<AttemptOutcome> {
    this.logger.debug('Sending request', { method: request.method, path: request.path });

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.request<unknown>({
        method: request.method,
        baseURL: this.baseURL,
        url: request.path,
        params: compactQuery(request.query),
        headers: {
          [USER_AGENT_HEADER_KEY]: this.userAgent,
          ...this.headers,
          ...(request.body === undefined ? {} : { 'Content-Type': 'application/json' }),
          ...request.headers,
          [AUTHORIZATION_HEADER_KEY]: `Bearer ${accessToken}`,
        },
        data: request.body === undefined ? undefined : JSON.stringify(request.body),
        timeout: this.timeout,
        responseType: 'text',
        validateStatus: () => true,
        signal,
      });
    } catch (error) {
      if (signal?.aborted) {
        throw signal.reason;
      }
      const networkError = toNetworkError(error, this.timeout);
      if (!networkError) {
        throw error;
      }
      this.logger.debug('Request failed without a response', {
        method: request.method,
        path: request.path,
        error: networkError.message,
      });
      return { type: 'network', error: networkError };
    }

    const transportResponse = toTransportResponse(response);
    this.logger.debug('Received response', {
      method: request.method,
      path: request.path,
      status: transportResponse.status,
    });
    return { type: 'response', response: transportResponse };
  }

  private failure(request: TransportRequest, outcome: AttemptOutcome): AxmError {
    if (outcome.type === 'network') {
      this.logger.error('Request failed', { method: request.method, path: request.path, error: outcome.error.message });
      return outcome.error;
    }

    const error = classifyResponse(outcome.response);
    this.logger.error('Request failed', {
      method: request.method,
      path: request.path,
      status: error.status,
      error: error.message,
      errors: error instanceof APIError ? error.errors : undefined,
    });
    return error;
  }
}
