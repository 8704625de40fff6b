// Client facade
export { AxmClient, ENV_KEYS, createClientFromEnv, decodeBody } from './client';
export type { BodyRequestOptions, ClientConfig, PaginatedRequestOptions, RequestOptions } from './client';

// Re-export constants
export * from './constants';

// Credentials and signing keys
export * from './credentials';

// Token lifecycle
export * from './auth';

// Transport and retry policy
export * from './transport';

// Pagination
export * from './pagination';

// Errors
export * from './errors';

// Logging
export { ConsoleLogger, NoopLogger, getDefaultLogger, type Logger } from './services/logger';
