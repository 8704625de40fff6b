export const AUTHORIZATION_HEADER_KEY = 'Authorization';
export const USER_AGENT_HEADER_KEY = 'User-Agent';

export const SDK_VERSION = '1.0.0';
export const DEFAULT_USER_AGENT = `axm-client/${SDK_VERSION}`;

export const DEFAULT_BASE_URL = 'https://api-business.apple.com';
export const DEFAULT_TOKEN_ENDPOINT = 'https://account.apple.com/auth/oauth2/v2/token';

export const SCOPE_BUSINESS_API = 'business.api';
export const SCOPE_SCHOOL_API = 'school.api';

export const CLIENT_ASSERTION_TYPE = 'urn:ietf:params:oauth:client-assertion-type:jwt-bearer';
export const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

// Vendor maximum for a client assertion
export const MAX_ASSERTION_LIFETIME_SECONDS = 180 * 24 * 60 * 60;

export const PAGE_LIMIT_MAX = 1000;
export const BODY_SNIPPET_LENGTH = 512;
export const MIN_RSA_MODULUS_BITS = 2048;
