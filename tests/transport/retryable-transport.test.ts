/**
 * RetryableTransport tests
 *
 * Runs against an in-process axios adapter and a fake token source, so the
 * backoff schedule can be driven with fake timers.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { APIError, AuthError, HTTPError, NetworkError, ValidationError } from '@/errors';
import { RequestMethod, RetryableTransport, type RetryableTransportConfig, type TransportRequest } from '@/transport';
import { FakeHttp, headerOf } from '../utils/fake-http';
import { FakeTokenSource, TEST_BASE_URL, createSpyLogger } from '../utils/fixtures';

const listDevices: TransportRequest = { method: RequestMethod.GET, path: '/v1/orgDevices' };

describe('RetryableTransport', () => {
  let http: FakeHttp;
  let tokens: FakeTokenSource;

  beforeEach(() => {
    http = new FakeHttp();
    tokens = new FakeTokenSource();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function createTransport(overrides: Partial<RetryableTransportConfig> = {}): RetryableTransport {
    return new RetryableTransport(tokens, { baseURL: TEST_BASE_URL, httpClient: http.instance, ...overrides });
  }

  describe('Requests', () => {
    it('should send the bearer token, user agent and merged headers', async () => {
      http.reply({ status: 200, body: { data: [] }, headers: { 'Content-Type': 'application/json' } });
      const transport = createTransport({ headers: { 'X-Team': 'global', 'X-Trace': 'global' } });

      const response = await transport.execute({
        ...listDevices,
        query: { limit: '100', cursor: '' },
        headers: { 'X-Trace': 'request' },
      });

      const request = http.lastRequest();
      expect(request.method).toBe('get');
      expect(request.baseURL).toBe(TEST_BASE_URL);
      expect(request.url).toBe('/v1/orgDevices');
      expect(request.params).toEqual({ limit: '100' });
      expect(headerOf(request, 'Authorization')).toBe('Bearer token-1');
      expect(headerOf(request, 'User-Agent')).toBe('axm-client/1.0.0');
      expect(headerOf(request, 'X-Team')).toBe('global');
      expect(headerOf(request, 'X-Trace')).toBe('request');

      expect(response).toEqual({
        status: 200,
        statusText: '',
        headers: { 'content-type': 'application/json' },
        body: '{"data":[]}',
      });
    });

    it('should append a custom agent to the default User-Agent', async () => {
      http.reply({ status: 200, body: {} });

      await createTransport({ customAgent: 'inventory-sync/2.1' }).execute(listDevices);

      expect(headerOf(http.lastRequest(), 'User-Agent')).toBe('axm-client/1.0.0; inventory-sync/2.1');
    });

    it('should let userAgent replace the default User-Agent', async () => {
      http.reply({ status: 200, body: {} });

      await createTransport({ userAgent: 'custom/1.0', customAgent: 'ignored' }).execute(listDevices);

      expect(headerOf(http.lastRequest(), 'User-Agent')).toBe('custom/1.0');
    });

    it('should serialize a body as JSON', async () => {
      http.reply({ status: 201, body: { id: 'activity-1' } });

      await createTransport().execute({
        method: RequestMethod.POST,
        path: '/v1/orgDeviceActivities',
        body: { data: { type: 'orgDeviceActivities' } },
      });

      const request = http.lastRequest();
      expect(request.data).toBe('{"data":{"type":"orgDeviceActivities"}}');
      expect(headerOf(request, 'Content-Type')).toBe('application/json');
    });

    it('should not modify the request', async () => {
      http.reply({ status: 200, body: {} });
      const request: TransportRequest = { ...listDevices, query: { limit: '5', cursor: '' } };

      await createTransport().execute(request);

      expect(request).toEqual({ method: RequestMethod.GET, path: '/v1/orgDevices', query: { limit: '5', cursor: '' } });
    });

    it('should throw token failures without sending the request', async () => {
      const failure = new AuthError('Token request failed with status 400', { status: 400 });
      tokens.getToken.mockRejectedValueOnce(failure);

      await expect(createTransport().execute(listDevices)).rejects.toBe(failure);
      expect(http.callCount).toBe(0);
    });
  });

  describe('401 handling', () => {
    it('should refresh the token once and retry', async () => {
      http.reply({ status: 401 }, { status: 200, body: {} });
      const onRetry = vi.fn();

      await createTransport({ onRetry }).execute(listDevices);

      expect(tokens.forceRefresh).toHaveBeenCalledTimes(1);
      expect(http.callCount).toBe(2);
      expect(headerOf(http.requests[1], 'Authorization')).toBe('Bearer token-2');
      expect(onRetry).toHaveBeenCalledWith({
        reason: 'unauthorized',
        attempt: 1,
        delay: 0,
        status: 401,
        method: RequestMethod.GET,
        path: '/v1/orgDevices',
      });
    });

    it('should fail on a second 401', async () => {
      http.reply({ status: 401 }, { status: 401 });

      const error = await createTransport()
        .execute(listDevices)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(HTTPError);
      expect(error).toHaveProperty('status', 401);
      expect(tokens.forceRefresh).toHaveBeenCalledTimes(1);
      expect(http.callCount).toBe(2);
    });
  });

  describe('Backoff', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    it('should wait for Retry-After on 429', async () => {
      http.reply({ status: 429, headers: { 'Retry-After': '2' } }, { status: 200, body: {} });
      const promise = createTransport().execute(listDevices);

      await vi.advanceTimersByTimeAsync(1999);
      expect(http.callCount).toBe(1);

      await vi.advanceTimersByTimeAsync(1);
      await expect(promise).resolves.toMatchObject({ status: 200 });
      expect(http.callCount).toBe(2);
    });

    it('should retry server errors with exponential backoff until the budget is spent', async () => {
      http.otherwise({ status: 503 });
      const onRetry = vi.fn();
      const logger = createSpyLogger();
      const result = createTransport({ retryCount: 3, onRetry, logger })
        .execute(listDevices)
        .catch((e: unknown) => e);

      await vi.advanceTimersByTimeAsync(999);
      expect(http.callCount).toBe(1);
      await vi.advanceTimersByTimeAsync(1);
      expect(http.callCount).toBe(2);
      await vi.advanceTimersByTimeAsync(2000);
      expect(http.callCount).toBe(3);
      await vi.advanceTimersByTimeAsync(4000);
      expect(http.callCount).toBe(4);

      const error = await result;
      expect(error).toBeInstanceOf(HTTPError);
      expect(error).toHaveProperty('message', 'HTTP 503: Request failed');
      expect(onRetry.mock.calls.map(([event]) => event.delay)).toEqual([1000, 2000, 4000]);
      expect(logger.warn).toHaveBeenCalledTimes(3);
      expect(logger.warn).toHaveBeenCalledWith(
        'Retrying request',
        expect.objectContaining({ reason: 'server_error', attempt: 1, delay: 1000 }),
      );
    });

    it('should retry network errors', async () => {
      http.reply({ networkError: 'socket hang up', code: 'ECONNRESET' }, { status: 200, body: {} });
      const promise = createTransport().execute(listDevices);

      await vi.advanceTimersByTimeAsync(1000);

      await expect(promise).resolves.toMatchObject({ status: 200 });
      expect(http.callCount).toBe(2);
    });

    it('should rethrow the abort reason during a backoff wait', async () => {
      http.otherwise({ status: 503 });
      const controller = new AbortController();
      const reason = new Error('shutting down');
      const result = createTransport()
        .execute(listDevices, { signal: controller.signal })
        .catch((e: unknown) => e);

      await vi.advanceTimersByTimeAsync(500);
      controller.abort(reason);

      expect(await result).toBe(reason);
      expect(http.callCount).toBe(1);
    });
  });

  describe('Terminal failures', () => {
    it('should throw the classified API error without retrying', async () => {
      http.reply({
        status: 404,
        body: { errors: [{ status: '404', code: 'NOT_FOUND', title: 'Not found', detail: 'Device not found' }] },
      });
      const logger = createSpyLogger();

      const error = await createTransport({ logger })
        .execute(listDevices)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(APIError);
      expect(error).toHaveProperty('message', '404: NOT_FOUND - Device not found');
      expect(http.callCount).toBe(1);
      expect(logger.error).toHaveBeenCalledWith(
        'Request failed',
        expect.objectContaining({
          status: 404,
          error: '404: NOT_FOUND - Device not found',
          errors: [expect.objectContaining({ code: 'NOT_FOUND', detail: 'Device not found' })],
        }),
      );
    });

    it('should not retry 501', async () => {
      http.reply({ status: 501, statusText: 'Not Implemented' });

      await expect(createTransport().execute(listDevices)).rejects.toThrow('HTTP 501: Not Implemented');
      expect(http.callCount).toBe(1);
    });

    it('should make a single attempt with a zero retry count', async () => {
      http.otherwise({ status: 500 });

      await expect(createTransport({ retryCount: 0 }).execute(listDevices)).rejects.toBeInstanceOf(HTTPError);
      expect(http.callCount).toBe(1);
    });

    it('should surface network errors when network retries are disabled', async () => {
      http.reply({ networkError: 'socket hang up', code: 'ECONNRESET' });

      const error = await createTransport({ retryOnNetworkError: false })
        .execute(listDevices)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NetworkError);
      expect(error).toMatchObject({ message: 'Network error: socket hang up', code: 'ECONNRESET', status: 0 });
    });

    it('should report timeouts', async () => {
      http.reply({ networkError: 'timeout of 5000ms exceeded', code: 'ECONNABORTED' });

      await expect(
        createTransport({ retryOnNetworkError: false, timeout: 5000 }).execute(listDevices),
      ).rejects.toThrow('Request timed out after 5000ms');
    });
  });

  describe('Configuration', () => {
    it.each([
      [{ baseURL: '' }, 'baseURL is required'],
      [{ retryCount: -1 }, 'retryCount must be a non-negative integer'],
      [{ minWait: -1 }, 'minWait cannot be negative'],
      [{ maxWait: -5 }, 'maxWait cannot be negative'],
      [{ minWait: 5000, maxWait: 1000 }, 'minWait (5000ms) cannot exceed maxWait (1000ms)'],
      [{ timeout: 0 }, 'timeout must be positive'],
    ])('should reject %o', (overrides, message) => {
      expect(() => createTransport(overrides)).toThrow(new ValidationError(message));
    });
  });
});
