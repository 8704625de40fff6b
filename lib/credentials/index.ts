export { createCredential } from './credential';
export type { Credential, CredentialInput } from './credential';
export { ellipticKey, loadPrivateKeyFromFile, parsePrivateKey, rsaKey, validateSigningKey } from './keys';
export type { EllipticKey, RSAKey, SigningAlgorithm, SigningKey } from './keys';
