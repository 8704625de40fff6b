/**
 * Token provider
 *
 * Exchanges signed client assertions for OAuth 2.0 client-credentials access
 * tokens and caches the result for concurrent callers.
 *
 * @example
 * ```typescript
 * const tokens = new TokenProvider({
 *   credential: createCredential({ keyId, identity, signingKey }),
 * });
 *
 * const { accessToken } = await tokens.getToken();
 * ```
 */

import type { AxiosInstance, AxiosResponse } from 'axios';
import { CLIENT_ASSERTION_TYPE, DEFAULT_TOKEN_ENDPOINT, FORM_CONTENT_TYPE } from '../constants';
import type { Credential } from '../credentials';
import { AuthError, ValidationError, snippet } from '../errors';
import { type Logger, getDefaultLogger } from '../services/logger';
import { createHttpClient, responseText } from '../transport/axios-client';
import { abortable } from '../utils/abort';
import { isNonEmptyString, isRecord, parseJson, readNumber, readString } from '../utils/validation';
import { buildClientAssertion } from './assertion';
import {
  type AccessToken,
  TOKEN_DEFAULTS,
  type TokenEndpointResponse,
  type TokenProviderConfig,
  type TokenSource,
} from './types';

/**
 * Whether a token can still be used, keeping `skew` milliseconds in reserve
 */
export function isTokenValid(token: AccessToken | null | undefined, skew = 0, now: number = Date.now()): boolean {
  if (!token || !token.accessToken) return false;
  return now < token.expiresAt - skew;
}

/**
 * Wait for a promise to settle without taking over its outcome.
 * Its rejection still reaches the callers that awaited it directly.
 */
function settled(promise: Promise<unknown>): Promise<void> {
  return promise.then(
    () => undefined,
    () => undefined,
  );
}

function parseTokenResponse(body: string): TokenEndpointResponse | undefined {
  const data = parseJson(body);
  if (!isRecord(data)) return undefined;

  const accessToken = readString(data, 'access_token');
  const expiresIn = readNumber(data, 'expires_in');
  if (!isNonEmptyString(accessToken) || expiresIn === undefined || expiresIn <= 0) {
    return undefined;
  }

  return {
    access_token: accessToken,
    token_type: readString(data, 'token_type') ?? 'Bearer',
    expires_in: expiresIn,
    scope: readString(data, 'scope'),
  };
}

function tokenErrorMessage(status: number, body: string): { message: string; oauthError?: string } {
  const data = parseJson(body);
  if (isRecord(data)) {
    const oauthError = readString(data, 'error');
    const description = readString(data, 'error_description');
    if (oauthError) {
      return {
        message: `Token request failed with status ${status}: ${oauthError}${description ? ` - ${description}` : ''}`,
        oauthError,
      };
    }
  }
  return { message: `Token request failed with status ${status}` };
}

/**
 * OAuth 2.0 client-credentials token provider (JWT client assertion)
 *
 * At most one exchange is in flight at any time: the pending exchange is
 * installed synchronously, so callers that miss the cache together share it.
 */
export class TokenProvider implements TokenSource {
  private readonly credential: Credential;
  private readonly tokenEndpoint: string;
  private readonly refreshSkew: number;
  private readonly assertionLifetime: number;
  private readonly timeout: number;
  private readonly http: AxiosInstance;
  private readonly logger: Logger;
  private readonly onTokenRequest?: TokenProviderConfig['onTokenRequest'];
  private readonly onTokenResponse?: TokenProviderConfig['onTokenResponse'];

  private token: AccessToken | null = null;
  private pending: { exchange: Promise<AccessToken>; forced: boolean } | null = null;

  /**
   * @throws {ValidationError} If the skew, lifetime or timeout is invalid
   */
  constructor(config: TokenProviderConfig) {
    const refreshSkew = config.refreshSkew ?? TOKEN_DEFAULTS.REFRESH_SKEW;
    const assertionLifetime = config.assertionLifetime ?? TOKEN_DEFAULTS.ASSERTION_LIFETIME;
    const timeout = config.timeout ?? TOKEN_DEFAULTS.TIMEOUT;

    if (refreshSkew < 0) {
      throw new ValidationError('refreshSkew cannot be negative', 'refreshSkew');
    }
    if (assertionLifetime <= 0) {
      throw new ValidationError('assertionLifetime must be positive', 'assertionLifetime');
    }
    if (timeout <= 0) {
      throw new ValidationError('timeout must be positive', 'timeout');
    }

    this.credential = config.credential;
    this.tokenEndpoint = config.tokenEndpoint || DEFAULT_TOKEN_ENDPOINT;
    this.refreshSkew = refreshSkew;
    this.assertionLifetime = assertionLifetime;
    this.timeout = timeout;
    this.http = config.httpClient ?? createHttpClient({ timeout });
    this.logger = config.logger ?? getDefaultLogger();
    this.onTokenRequest = config.onTokenRequest;
    this.onTokenResponse = config.onTokenResponse;
  }

  /**
   * Get a valid access token, exchanging a new assertion only when the cached
   * token is missing or inside the refresh skew window
   *
   * @param signal - Abandons this caller's wait; a shared exchange keeps running
   * @throws {AuthError} On signing or exchange failure; the cached token is kept
   */
  async getToken(signal?: AbortSignal): Promise<AccessToken> {
    signal?.throwIfAborted();

    const cached = this.token;
    if (cached && isTokenValid(cached, this.refreshSkew)) {
      return cached;
    }

    return abortable(this.exchangeOnce(false), signal);
  }

  /**
   * Drop the cached token and exchange a new one, even if the cached token
   * looked valid
   *
   * @throws {AuthError} On failure; the cache stays empty
   */
  async forceRefresh(signal?: AbortSignal): Promise<AccessToken> {
    signal?.throwIfAborted();
    this.token = null;

    const inFlight = this.pending;
    if (inFlight?.forced) {
      return abortable(inFlight.exchange, signal);
    }
    if (inFlight) {
      // Started before the refresh was requested, so it may carry the rejected token
      await abortable(settled(inFlight.exchange), signal);
      this.token = null;
    }

    return abortable(this.exchangeOnce(true), signal);
  }

  /**
   * Drop the cached token without contacting the server
   */
  clear(): void {
    this.token = null;
  }

  /**
   * Currently cached token, without validity checks
   */
  getCachedToken(): AccessToken | null {
    return this.token;
  }

  private exchangeOnce(forced: boolean): Promise<AccessToken> {
    if (this.pending) {
      return this.pending.exchange;
    }

    const exchange = this.exchange(forced)
      .then((token) => {
        this.token = token;
        return token;
      })
      .finally(() => {
        if (this.pending?.exchange === exchange) {
          this.pending = null;
        }
      });

    this.pending = { exchange, forced };
    return exchange;
  }

  private async exchange(forced: boolean): Promise<AccessToken> {
    const { credential } = this;

    this.onTokenRequest?.({
      clientId: credential.identity,
      scope: credential.scope,
      forced,
      timestamp: new Date().toISOString(),
    });
    this.logger.debug('Requesting access token', { clientId: credential.identity, forced });

    const assertion = await buildClientAssertion(credential, { lifetime: this.assertionLifetime });

    const body = new URLSearchParams();
    body.append('grant_type', 'client_credentials');
    body.append('client_id', credential.identity);
    body.append('client_assertion_type', CLIENT_ASSERTION_TYPE);
    body.append('client_assertion', assertion);
    body.append('scope', credential.scope);

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown>(this.tokenEndpoint, body.toString(), {
        headers: {
          'Content-Type': FORM_CONTENT_TYPE,
          Accept: 'application/json',
        },
        timeout: this.timeout,
        responseType: 'text',
        validateStatus: () => true,
      });
    } catch (error) {
      this.logger.error('Token request failed', { clientId: credential.identity, error });
      throw new AuthError(
        `Token request failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }

    const text = responseText(response.data);

    if (response.status !== 200) {
      const { message, oauthError } = tokenErrorMessage(response.status, text);
      this.logger.error('Token request rejected', { clientId: credential.identity, status: response.status });
      throw new AuthError(message, { status: response.status, oauthError, bodySnippet: snippet(text) });
    }

    const parsed = parseTokenResponse(text);
    if (!parsed) {
      throw new AuthError('Token response is missing access_token or a positive expires_in', {
        status: response.status,
        bodySnippet: snippet(text),
      });
    }

    const token: AccessToken = {
      accessToken: parsed.access_token,
      tokenType: parsed.token_type,
      expiresAt: Date.now() + parsed.expires_in * 1000,
      scope: parsed.scope ?? credential.scope,
    };

    this.logger.info('Access token acquired', {
      clientId: credential.identity,
      expiresAt: new Date(token.expiresAt).toISOString(),
    });
    this.onTokenResponse?.(token);

    return token;
  }
}
