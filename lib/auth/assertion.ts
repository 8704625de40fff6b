import { SignJWT } from 'jose';
import { v4 as uuidv4 } from 'uuid';
import { MAX_ASSERTION_LIFETIME_SECONDS } from '../constants';
import type { Credential } from '../credentials';
import { AuthError } from '../errors';

export type ClientAssertionClaims = {
  iss: string;
  sub: string;
  aud: string;
  iat: number;
  exp: number;
  jti: string;
};

export type ClientAssertionOptions = {
  /** Issued-at, epoch seconds (default: now) */
  issuedAt?: number;

  /** Lifetime in seconds, clamped to the vendor maximum */
  lifetime?: number;
};

/**
 * Claims of a client assertion. Issuer and subject are both the client ID.
 */
export function assertionClaims(credential: Credential, options: ClientAssertionOptions = {}): ClientAssertionClaims {
  const iat = options.issuedAt ?? Math.floor(Date.now() / 1000);
  const lifetime = Math.min(options.lifetime ?? MAX_ASSERTION_LIFETIME_SECONDS, MAX_ASSERTION_LIFETIME_SECONDS);

  return {
    iss: credential.identity,
    sub: credential.identity,
    aud: credential.audience,
    iat,
    exp: iat + lifetime,
    jti: uuidv4(),
  };
}

/**
 * Sign a client assertion with the algorithm of the credential's key variant
 *
 * @throws {AuthError} If signing fails
 */
export async function buildClientAssertion(credential: Credential, options: ClientAssertionOptions = {}): Promise<string> {
  const claims = assertionClaims(credential, options);
  const { algorithm, key } = credential.signingKey;

  try {
    return await new SignJWT({})
      .setProtectedHeader({ alg: algorithm, kid: credential.keyId })
      .setIssuer(claims.iss)
      .setSubject(claims.sub)
      .setAudience(claims.aud)
      .setIssuedAt(claims.iat)
      .setExpirationTime(claims.exp)
      .setJti(claims.jti)
      .sign(key);
  } catch (error) {
    throw new AuthError(
      `Failed to sign client assertion: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
}
