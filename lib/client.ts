/**
 * API client
 *
 * Wires credentials, the token provider, the retryable transport and the
 * pagination walker behind one object.
 *
 * @example
 * ```typescript
 * const client = new AxmClient({
 *   keyId: 'key-id',
 *   issuerId: 'BUSINESSAPI.client-id',
 *   privateKey: await readFile('./key.p8', 'utf8'),
 * });
 *
 * const devices = await client.collect('/v1/orgDevices', pageData, { query: withPageLimit({}, 100) });
 * ```
 */

import type { AxiosInstance } from 'axios';
import { type AccessToken, TokenProvider, type TokenProviderConfig } from './auth';
import { DEFAULT_BASE_URL, DEFAULT_TOKEN_ENDPOINT, SCOPE_BUSINESS_API } from './constants';
import { type Credential, type SigningKey, createCredential, loadPrivateKeyFromFile, parsePrivateKey } from './credentials';
import { ValidationError } from './errors';
import { type PageConsumer, type PageEnvelope, PaginationWalker } from './pagination';
import { type Logger, getDefaultLogger } from './services/logger';
import {
  type QueryParams,
  RequestMethod,
  RetryableTransport,
  type TransportConfig,
  type TransportResponse,
} from './transport';
import { parseJson } from './utils/validation';

export type ClientConfig = {
  /** Key ID of the private key */
  keyId: string;

  /** Client ID issued with the key; assertion issuer and subject */
  issuerId: string;

  /** Parsed signing key, or PEM text */
  privateKey: SigningKey | string | Buffer;

  /** API base URL (default: https://api-business.apple.com) */
  baseURL?: string;

  /** OAuth token endpoint */
  tokenEndpoint?: string;

  /** OAuth scope (default: "business.api") */
  scope?: string;

  /** Assertion audience (default: the token endpoint) */
  audience?: string;

  /** Per-request timeout in milliseconds, token requests included */
  timeout?: number;

  retryCount?: number;
  minWait?: number;
  maxWait?: number;
  retryOnNetworkError?: boolean;
  userAgent?: string;

  /** Appended to the default User-Agent as `<default>; <customAgent>` */
  customAgent?: string;

  /** Headers sent with every API request */
  headers?: Record<string, string>;

  /** Refresh the token this many milliseconds before expiry */
  refreshSkew?: number;

  /** Page cap per paginated call */
  maxPages?: number;

  logger?: Logger;

  /** Axios instance for API and token requests */
  httpClient?: AxiosInstance;

  onRetry?: TransportConfig['onRetry'];
  onTokenRequest?: TokenProviderConfig['onTokenRequest'];
  onTokenResponse?: TokenProviderConfig['onTokenResponse'];
};

export type RequestOptions = {
  query?: QueryParams;
  headers?: Record<string, string>;
  signal?: AbortSignal;
};

export type BodyRequestOptions = RequestOptions & {
  /** Serialized as JSON */
  body?: unknown;
};

export type PaginatedRequestOptions = RequestOptions & {
  maxPages?: number;
};

/**
 * Environment variables read by {@link createClientFromEnv}
 */
export const ENV_KEYS = {
  KEY_ID: 'APPLE_KEY_ID',
  ISSUER_ID: 'APPLE_ISSUER_ID',
  PRIVATE_KEY_PATH: 'APPLE_PRIVATE_KEY_PATH',
  PRIVATE_KEY: 'APPLE_PRIVATE_KEY',
  BASE_URL: 'APPLE_BASE_URL',
  SCOPE: 'APPLE_SCOPE',
} as const;

function toSigningKey(privateKey: ClientConfig['privateKey']): SigningKey {
  if (typeof privateKey === 'string' || Buffer.isBuffer(privateKey)) {
    return parsePrivateKey(privateKey);
  }
  return privateKey;
}

/**
 * Decode a response body: parsed JSON, null when empty, the raw text otherwise
 */
export function decodeBody(response: TransportResponse): unknown {
  if (response.body.trim() === '') return null;
  const parsed = parseJson(response.body);
  return parsed === undefined ? response.body : parsed;
}

export class AxmClient {
  readonly credential: Credential;
  readonly baseURL: string;

  private readonly tokens: TokenProvider;
  private readonly transport: RetryableTransport;
  private readonly walker: PaginationWalker;
  private readonly logger: Logger;

  /**
   * @throws {ValidationError} On missing credentials or invalid settings
   */
  constructor(config: ClientConfig) {
    if (!config.privateKey) {
      throw new ValidationError('privateKey is required', 'privateKey');
    }

    const tokenEndpoint = config.tokenEndpoint || DEFAULT_TOKEN_ENDPOINT;
    this.logger = config.logger ?? getDefaultLogger();
    this.baseURL = config.baseURL ?? DEFAULT_BASE_URL;

    this.credential = createCredential({
      keyId: config.keyId,
      identity: config.issuerId,
      signingKey: toSigningKey(config.privateKey),
      audience: config.audience || tokenEndpoint,
      scope: config.scope || SCOPE_BUSINESS_API,
    });

    this.tokens = new TokenProvider({
      credential: this.credential,
      tokenEndpoint,
      refreshSkew: config.refreshSkew,
      timeout: config.timeout,
      httpClient: config.httpClient,
      logger: this.logger,
      onTokenRequest: config.onTokenRequest,
      onTokenResponse: config.onTokenResponse,
    });

    this.transport = new RetryableTransport(this.tokens, {
      baseURL: this.baseURL,
      retryCount: config.retryCount,
      minWait: config.minWait,
      maxWait: config.maxWait,
      timeout: config.timeout,
      retryOnNetworkError: config.retryOnNetworkError,
      userAgent: config.userAgent,
      customAgent: config.customAgent,
      headers: config.headers,
      logger: this.logger,
      onRetry: config.onRetry,
      httpClient: config.httpClient,
    });

    this.walker = new PaginationWalker(this.transport, { maxPages: config.maxPages, logger: this.logger });
  }

  /**
   * Send a request and return the raw 2xx response
   */
  async request(method: RequestMethod, path: string, options: BodyRequestOptions = {}): Promise<TransportResponse> {
    if (!path) {
      throw new ValidationError('path is required', 'path');
    }
    return this.transport.execute(
      { method, path, query: options.query, headers: options.headers, body: options.body },
      { signal: options.signal },
    );
  }

  async get(path: string, options: RequestOptions = {}): Promise<unknown> {
    return decodeBody(await this.request(RequestMethod.GET, path, options));
  }

  async post(path: string, options: BodyRequestOptions = {}): Promise<unknown> {
    return decodeBody(await this.request(RequestMethod.POST, path, options));
  }

  async put(path: string, options: BodyRequestOptions = {}): Promise<unknown> {
    return decodeBody(await this.request(RequestMethod.PUT, path, options));
  }

  async patch(path: string, options: BodyRequestOptions = {}): Promise<unknown> {
    return decodeBody(await this.request(RequestMethod.PATCH, path, options));
  }

  async delete(path: string, options: RequestOptions = {}): Promise<unknown> {
    return decodeBody(await this.request(RequestMethod.DELETE, path, options));
  }

  /**
   * GET every page of `path`, handing each raw body to `consume`
   *
   * @returns Number of pages consumed
   */
  getPaginated(path: string, consume: PageConsumer, options: PaginatedRequestOptions = {}): Promise<number> {
    const { query, headers, signal, maxPages } = options;
    return this.walker.walk({ method: RequestMethod.GET, path, query, headers }, consume, { signal, maxPages });
  }

  /**
   * GET every page of `path` and concatenate what `select` extracts from each
   */
  collect<T>(
    path: string,
    select: (page: PageEnvelope) => readonly T[],
    options: PaginatedRequestOptions = {},
  ): Promise<T[]> {
    const { query, headers, signal, maxPages } = options;
    return this.walker.collect({ method: RequestMethod.GET, path, query, headers }, select, { signal, maxPages });
  }

  /**
   * Current access token, exchanging a new one when needed
   */
  getToken(signal?: AbortSignal): Promise<AccessToken> {
    return this.tokens.getToken(signal);
  }

  /**
   * Drop the cached access token
   */
  clearToken(): void {
    this.tokens.clear();
  }
}

/**
 * Build a client from environment variables
 *
 * Reads APPLE_KEY_ID, APPLE_ISSUER_ID, APPLE_PRIVATE_KEY_PATH (or
 * APPLE_PRIVATE_KEY holding the PEM text, `\n` escapes allowed) and the
 * optional APPLE_BASE_URL and APPLE_SCOPE.
 *
 * @throws {ValidationError} If a required variable is missing
 */
export async function createClientFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<ClientConfig> = {},
): Promise<AxmClient> {
  const keyId = env[ENV_KEYS.KEY_ID];
  const issuerId = env[ENV_KEYS.ISSUER_ID];
  if (!keyId) {
    throw new ValidationError(`${ENV_KEYS.KEY_ID} is not set`, ENV_KEYS.KEY_ID);
  }
  if (!issuerId) {
    throw new ValidationError(`${ENV_KEYS.ISSUER_ID} is not set`, ENV_KEYS.ISSUER_ID);
  }

  const pem = env[ENV_KEYS.PRIVATE_KEY];
  const keyPath = env[ENV_KEYS.PRIVATE_KEY_PATH];
  let privateKey: SigningKey;
  if (pem) {
    privateKey = parsePrivateKey(pem.replace(/\\n/g, '\n'));
  } else if (keyPath) {
    privateKey = await loadPrivateKeyFromFile(keyPath);
  } else {
    throw new ValidationError(
      `Either ${ENV_KEYS.PRIVATE_KEY_PATH} or ${ENV_KEYS.PRIVATE_KEY} must be set`,
      ENV_KEYS.PRIVATE_KEY_PATH,
    );
  }

  return new AxmClient({
    keyId,
    issuerId,
    privateKey,
    baseURL: env[ENV_KEYS.BASE_URL] || undefined,
    scope: env[ENV_KEYS.SCOPE] || undefined,
    ...overrides,
  });
}
