/**
 * Token lifecycle types
 */

import type { AxiosInstance } from 'axios';
import { MAX_ASSERTION_LIFETIME_SECONDS } from '../constants';
import type { Credential } from '../credentials';
import type { Logger } from '../services/logger';

/**
 * Cached bearer token
 */
export type AccessToken = {
  /** The bearer token */
  accessToken: string;

  /** Token type reported by the server (normally "Bearer") */
  tokenType: string;

  /** Expiry as epoch milliseconds */
  expiresAt: number;

  /** Granted scope */
  scope: string;
};

/**
 * OAuth 2.0 token response from the authorization server
 */
export type TokenEndpointResponse = {
  access_token: string;
  token_type: string;
  /** Token lifetime in seconds */
  expires_in: number;
  scope?: string;
};

/**
 * Token request info (for logging callbacks)
 */
export type TokenRequestInfo = {
  clientId: string;
  scope: string;
  /** True when triggered by forceRefresh */
  forced: boolean;
  timestamp: string;
};

/**
 * Anything that hands out bearer tokens and can be told a token was rejected
 */
export interface TokenSource {
  getToken(signal?: AbortSignal): Promise<AccessToken>;
  forceRefresh(signal?: AbortSignal): Promise<AccessToken>;
}

export type TokenProviderConfig = {
  credential: Credential;

  /** Token endpoint URL (default: vendor endpoint) */
  tokenEndpoint?: string;

  /** Refresh this many milliseconds before expiry (default: 5 minutes) */
  refreshSkew?: number;

  /** Client assertion lifetime in seconds (default and maximum: 180 days) */
  assertionLifetime?: number;

  /** Token request timeout in milliseconds (default: 30000) */
  timeout?: number;

  /** Axios instance used for the exchange */
  httpClient?: AxiosInstance;

  logger?: Logger;

  /** Callback for token requests (for logging/metrics) */
  onTokenRequest?: (request: TokenRequestInfo) => void;

  /** Callback for acquired tokens (for logging/metrics) */
  onTokenResponse?: (token: AccessToken) => void;
};

export const TOKEN_DEFAULTS = {
  REFRESH_SKEW: 5 * 60 * 1000,
  TIMEOUT: 30000,
  ASSERTION_LIFETIME: MAX_ASSERTION_LIFETIME_SECONDS,
} as const;
