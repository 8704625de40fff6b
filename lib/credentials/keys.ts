/**
 * Signing keys
 *
 * A signing key is one of a closed set of variants. Each variant pairs its key
 * material with the JWS algorithm it signs with, so the algorithm is read off
 * the variant instead of being inferred from the key at signing time.
 */

import { type KeyObject, createPrivateKey } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { MIN_RSA_MODULUS_BITS } from '../constants';
import { ValidationError } from '../errors';

/** P-256 key, signs ES256 */
export type EllipticKey = {
  readonly kind: 'elliptic';
  readonly algorithm: 'ES256';
  readonly key: KeyObject;
};

/** RSA key of at least 2048 bits, signs RS256 */
export type RSAKey = {
  readonly kind: 'rsa';
  readonly algorithm: 'RS256';
  readonly key: KeyObject;
};

export type SigningKey = EllipticKey | RSAKey;

export type SigningAlgorithm = SigningKey['algorithm'];

const P256_CURVE_NAMES = new Set(['prime256v1', 'P-256', 'secp256r1']);

function assertPrivate(key: KeyObject): void {
  if (key.type !== 'private') {
    throw new ValidationError(`Signing key must be a private key, got a ${key.type} key`, 'signingKey');
  }
}

/**
 * Wrap an elliptic-curve private key
 *
 * @throws {ValidationError} If the key is not a P-256 private key
 */
export function ellipticKey(key: KeyObject): EllipticKey {
  assertPrivate(key);
  if (key.asymmetricKeyType !== 'ec') {
    throw new ValidationError(`Expected an EC key, got ${key.asymmetricKeyType ?? 'unknown'}`, 'signingKey');
  }
  const curve = key.asymmetricKeyDetails?.namedCurve;
  if (!curve || !P256_CURVE_NAMES.has(curve)) {
    throw new ValidationError(`ES256 requires a P-256 key, got curve ${curve ?? 'unknown'}`, 'signingKey');
  }
  return Object.freeze({ kind: 'elliptic', algorithm: 'ES256', key });
}

/**
 * Wrap an RSA private key
 *
 * @throws {ValidationError} If the key is not an RSA private key of at least 2048 bits
 */
export function rsaKey(key: KeyObject): RSAKey {
  assertPrivate(key);
  if (key.asymmetricKeyType !== 'rsa') {
    throw new ValidationError(`Expected an RSA key, got ${key.asymmetricKeyType ?? 'unknown'}`, 'signingKey');
  }
  const bits = key.asymmetricKeyDetails?.modulusLength ?? 0;
  if (bits < MIN_RSA_MODULUS_BITS) {
    throw new ValidationError(
      `RSA private key size (${bits} bits) is too small, minimum ${MIN_RSA_MODULUS_BITS} bits required`,
      'signingKey',
    );
  }
  return Object.freeze({ kind: 'rsa', algorithm: 'RS256', key });
}

/**
 * Re-check a signing key built elsewhere against the rules of its variant
 *
 * @throws {ValidationError} If the variant is unknown or its key material does not fit it
 */
export function validateSigningKey(signingKey: SigningKey): SigningKey {
  switch (signingKey.kind) {
    case 'elliptic':
      return ellipticKey(signingKey.key);
    case 'rsa':
      return rsaKey(signingKey.key);
    default:
      throw new ValidationError('signingKey must be an elliptic or RSA key', 'signingKey');
  }
}

/**
 * Parse a PEM private key (PKCS#8, PKCS#1 or SEC1) into its variant
 *
 * @throws {ValidationError} If the PEM cannot be parsed or the key type is unsupported
 */
export function parsePrivateKey(pem: string | Buffer): SigningKey {
  let key: KeyObject;
  try {
    key = createPrivateKey({ key: pem, format: 'pem' });
  } catch (error) {
    throw new ValidationError('Failed to parse private key PEM', 'signingKey', { cause: error });
  }

  switch (key.asymmetricKeyType) {
    case 'ec':
      return ellipticKey(key);
    case 'rsa':
      return rsaKey(key);
    default:
      throw new ValidationError(
        `Unsupported private key type: ${key.asymmetricKeyType ?? 'unknown'} (expected RSA or EC)`,
        'signingKey',
      );
  }
}

/**
 * Read and parse a PEM private key file (e.g. the `.p8` file issued by the vendor)
 */
export async function loadPrivateKeyFromFile(filePath: string): Promise<SigningKey> {
  if (!filePath) {
    throw new ValidationError('Private key path is required', 'privateKeyPath');
  }
  const pem = await readFile(filePath, 'utf8');
  return parsePrivateKey(pem);
}
