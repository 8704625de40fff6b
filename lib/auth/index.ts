export { TokenProvider, isTokenValid } from './token-provider';
export { assertionClaims, buildClientAssertion } from './assertion';
export type { ClientAssertionClaims, ClientAssertionOptions } from './assertion';
export { TOKEN_DEFAULTS } from './types';
export type {
  AccessToken,
  TokenEndpointResponse,
  TokenProviderConfig,
  TokenRequestInfo,
  TokenSource,
} from './types';
