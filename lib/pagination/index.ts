export {
  DEFAULT_MAX_PAGES,
  PaginationWalker,
  extractNextLink,
  hasNextPage,
  hasPrevPage,
  pageData,
  paramsFromLink,
  parsePageEnvelope,
  withPageLimit,
} from './walker';
export type { PaginationWalkerConfig } from './walker';
export type { PageConsumer, PageEnvelope, PageLinks, Paging, RequestExecutor, WalkOptions } from './types';
