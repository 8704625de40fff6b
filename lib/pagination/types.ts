import type { ExecuteOptions, TransportRequest, TransportResponse } from '../transport/types';

/**
 * Navigation links of a page
 */
export type PageLinks = {
  self?: string;
  first?: string;
  next?: string;
  prev?: string;
  last?: string;
};

export type Paging = {
  total?: number;
  limit?: number;
  nextCursor?: string;
};

/**
 * Parsed page body. Resource payloads stay untyped; `select` callbacks narrow them.
 */
export type PageEnvelope = {
  data?: unknown;
  links?: PageLinks;
  meta?: { paging?: Paging };
  [key: string]: unknown;
};

/**
 * Receives each raw page body in order; a thrown error stops the walk
 */
export type PageConsumer = (page: string, pageIndex: number) => void | Promise<void>;

export type WalkOptions = ExecuteOptions & {
  /** Page cap for this walk (default: the walker's cap) */
  maxPages?: number;
};

/**
 * Anything that can execute a single request, normally a RetryableTransport
 */
export interface RequestExecutor {
  execute(request: TransportRequest, options?: ExecuteOptions): Promise<TransportResponse>;
}
