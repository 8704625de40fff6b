export {
  APIError,
  AuthError,
  AxmError,
  HTTPError,
  NetworkError,
  PaginationError,
  ValidationError,
  isRetryableStatus,
} from './errors';
export type { AxmErrorKind } from './errors';
export { classifyResponse, parseErrorEnvelope, snippet } from './classifier';
export type { APIErrorEntry, APIErrorLinks, APIErrorSource } from './types';
