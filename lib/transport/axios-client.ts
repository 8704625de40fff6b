import axios, { AxiosHeaders, type AxiosInstance, type AxiosResponse } from 'axios';
import { NetworkError } from '../errors';
import type { TransportResponse } from './types';

export enum HttpStatuses {
  unauthorized = 401,
  tooManyRequests = 429,
  notImplemented = 501,
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Create the axios instance shared by token exchange and API requests.
 * Status handling is left to the caller: every status resolves.
 */
export function createHttpClient(options: { baseURL?: string; timeout: number }): AxiosInstance {
  return axios.create({
    baseURL: options.baseURL,
    timeout: options.timeout,
    headers: { Accept: 'application/json' },
    responseType: 'text',
    validateStatus: () => true,
  });
}

/**
 * Response body as text, whatever the adapter produced
 */
export function responseText(data: unknown): string {
  if (typeof data === 'string') return data;
  if (data === undefined || data === null) return '';
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return JSON.stringify(data);
}

/**
 * Flatten response headers into a lower-cased string map
 */
export function normalizeHeaders(headers: AxiosResponse['headers']): Record<string, string> {
  const source: Record<string, unknown> = headers instanceof AxiosHeaders ? headers.toJSON() : { ...headers };
  const result: Record<string, string> = {};

  for (const [key, value] of Object.entries(source)) {
    if (typeof value === 'string') {
      result[key.toLowerCase()] = value;
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      result[key.toLowerCase()] = String(value);
    } else if (Array.isArray(value)) {
      result[key.toLowerCase()] = value.map(String).join(', ');
    }
  }

  return result;
}

export function toTransportResponse(response: AxiosResponse<unknown>): TransportResponse {
  return {
    status: response.status,
    statusText: response.statusText ?? '',
    headers: normalizeHeaders(response.headers),
    body: responseText(response.data),
  };
}

/**
 * Map an axios failure without a response to a NetworkError
 *
 * @returns undefined when the error did not come from axios
 */
export function toNetworkError(error: unknown, timeout?: number): NetworkError | undefined {
  if (!axios.isAxiosError(error)) return undefined;

  if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
    const after = timeout === undefined ? '' : ` after ${timeout}ms`;
    return new NetworkError(`Request timed out${after}`, { code: error.code, cause: error });
  }

  return new NetworkError(`Network error: ${error.message}`, { code: error.code, cause: error });
}
