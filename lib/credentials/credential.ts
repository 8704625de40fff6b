import { DEFAULT_TOKEN_ENDPOINT, SCOPE_BUSINESS_API } from '../constants';
import { ValidationError } from '../errors';
import { isNonEmptyString } from '../utils/validation';
import { type SigningKey, validateSigningKey } from './keys';

export type CredentialInput = {
  /** Key ID shown next to the private key in the vendor portal */
  keyId: string;

  /** Client ID; used as issuer, subject and OAuth client_id */
  identity: string;

  signingKey: SigningKey;

  /** `aud` claim of the client assertion (default: the vendor token endpoint URL) */
  audience?: string;

  /** OAuth scope (default: "business.api") */
  scope?: string;
};

/**
 * Immutable API identity
 */
export type Credential = Readonly<Required<CredentialInput>>;

/**
 * Validate and freeze a credential
 *
 * @throws {ValidationError} On an empty key ID or identity, or an unusable signing key
 */
export function createCredential(input: CredentialInput): Credential {
  if (!isNonEmptyString(input.keyId)) {
    throw new ValidationError('keyId is required', 'keyId');
  }
  if (!isNonEmptyString(input.identity)) {
    throw new ValidationError('identity is required', 'identity');
  }
  if (!input.signingKey) {
    throw new ValidationError('signingKey is required', 'signingKey');
  }
  const signingKey = validateSigningKey(input.signingKey);

  return Object.freeze({
    keyId: input.keyId,
    identity: input.identity,
    signingKey,
    audience: input.audience || DEFAULT_TOKEN_ENDPOINT,
    scope: input.scope || SCOPE_BUSINESS_API,
  });
}
