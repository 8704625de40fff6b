/**
 * Shared fixtures
 */

import { type Mock, vi } from 'vitest';
import type { AccessToken, TokenSource } from '@/auth';
import { type Credential, type CredentialInput, createCredential, ellipticKey } from '@/credentials';
import type { Logger } from '@/services/logger';
import type { TransportResponse } from '@/transport';
import { generateEcKeyPair } from './keys';

export const TEST_KEY_ID = 'test-key-id';
export const TEST_CLIENT_ID = 'BUSINESSAPI.test-client';
export const TEST_TOKEN_ENDPOINT = 'https://auth.test.local/oauth2/token';
export const TEST_BASE_URL = 'https://api.test.local';

export function createTestCredential(overrides: Partial<CredentialInput> = {}): Credential {
  return createCredential({
    keyId: TEST_KEY_ID,
    identity: TEST_CLIENT_ID,
    signingKey: ellipticKey(generateEcKeyPair().privateKey),
    audience: TEST_TOKEN_ENDPOINT,
    ...overrides,
  });
}

/**
 * Token source that hands out `token-1`, `token-2`... one per refresh
 */
export class FakeTokenSource implements TokenSource {
  private version = 1;

  readonly getToken = vi.fn(async (_signal?: AbortSignal): Promise<AccessToken> => this.current());

  readonly forceRefresh = vi.fn(async (_signal?: AbortSignal): Promise<AccessToken> => {
    this.version++;
    return this.current();
  });

  private current(): AccessToken {
    return {
      accessToken: `token-${this.version}`,
      tokenType: 'Bearer',
      expiresAt: Date.now() + 3600_000,
      scope: 'business.api',
    };
  }
}

export type SpyLogger = Logger & { error: Mock; warn: Mock; info: Mock; debug: Mock };

export function createSpyLogger(): SpyLogger {
  return {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  };
}

export function jsonResponse(status: number, body: unknown, headers: Record<string, string> = {}): TransportResponse {
  return {
    status,
    statusText: '',
    headers,
    body: typeof body === 'string' ? body : JSON.stringify(body),
  };
}
