/**
 * Pagination walker
 *
 * Follows `links.next` from page to page, handing every raw body to the
 * caller before moving on.
 *
 * @example
 * ```typescript
 * const walker = new PaginationWalker(transport);
 * const devices = await walker.collect(
 *   { method: RequestMethod.GET, path: '/v1/orgDevices', query: withPageLimit({}, 100) },
 *   pageData,
 * );
 * ```
 */

import { DEFAULT_BASE_URL, PAGE_LIMIT_MAX } from '../constants';
import { PaginationError, ValidationError } from '../errors';
import { type Logger, getDefaultLogger } from '../services/logger';
import type { QueryParams, TransportRequest } from '../transport/types';
import { isRecord, parseJson, readNumber, readString } from '../utils/validation';
import type { PageConsumer, PageEnvelope, PageLinks, Paging, RequestExecutor, WalkOptions } from './types';

export const DEFAULT_MAX_PAGES = 10000;

const CURSOR_PARAM = 'cursor';
const LIMIT_PARAM = 'limit';

function parseLinks(value: unknown): PageLinks | undefined {
  if (!isRecord(value)) return undefined;
  return {
    self: readString(value, 'self'),
    first: readString(value, 'first'),
    next: readString(value, 'next'),
    prev: readString(value, 'prev'),
    last: readString(value, 'last'),
  };
}

function parsePaging(value: unknown): Paging | undefined {
  if (!isRecord(value)) return undefined;
  return {
    total: readNumber(value, 'total'),
    limit: readNumber(value, 'limit'),
    nextCursor: readString(value, 'nextCursor'),
  };
}

/**
 * Parse a page body into its envelope
 *
 * @returns undefined when the body is not a JSON object
 */
export function parsePageEnvelope(body: string): PageEnvelope | undefined {
  const data = parseJson(body);
  if (!isRecord(data)) return undefined;

  const meta = isRecord(data.meta) ? { paging: parsePaging(data.meta.paging) } : undefined;
  return { ...data, links: parseLinks(data.links), meta };
}

/**
 * `links.next` of a page, or undefined when there is no further page
 */
export function extractNextLink(envelope: PageEnvelope): string | undefined {
  const next = envelope.links?.next;
  return next ? next : undefined;
}

export function hasNextPage(links: PageLinks | undefined): boolean {
  return Boolean(links?.next);
}

export function hasPrevPage(links: PageLinks | undefined): boolean {
  return Boolean(links?.prev);
}

/**
 * Query parameters of a next link, first value per key. Relative links are
 * resolved against `base`.
 *
 * @throws {TypeError} If the link cannot be parsed
 */
export function paramsFromLink(link: string, base: string = DEFAULT_BASE_URL): Record<string, string> {
  const url = new URL(link, base);
  const params: Record<string, string> = {};
  for (const [key, value] of url.searchParams) {
    if (!(key in params)) {
      params[key] = value;
    }
  }
  return params;
}

/**
 * Copy of `query` with the page size set, capped at the API maximum
 *
 * @throws {ValidationError} If the limit is not a positive integer
 */
export function withPageLimit(query: QueryParams | undefined, limit: number): QueryParams {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError(`Page limit must be a positive integer, got ${limit}`, LIMIT_PARAM);
  }
  return { ...query, [LIMIT_PARAM]: String(Math.min(limit, PAGE_LIMIT_MAX)) };
}

/**
 * `data` array of a page envelope; empty when the page carries none
 */
export function pageData(envelope: PageEnvelope): readonly unknown[] {
  return Array.isArray(envelope.data) ? envelope.data : [];
}

export type PaginationWalkerConfig = {
  /** Page cap per walk (default: 10000) */
  maxPages?: number;
  logger?: Logger;
};

export class PaginationWalker {
  private readonly executor: RequestExecutor;
  private readonly maxPages: number;
  private readonly logger: Logger;

  constructor(executor: RequestExecutor, config: PaginationWalkerConfig = {}) {
    const maxPages = config.maxPages ?? DEFAULT_MAX_PAGES;
    if (!Number.isInteger(maxPages) || maxPages < 1) {
      throw new ValidationError('maxPages must be a positive integer', 'maxPages');
    }
    this.executor = executor;
    this.maxPages = maxPages;
    this.logger = config.logger ?? getDefaultLogger();
  }

  /**
   * Fetch every page of `request` in order and pass each raw body to `consume`
   *
   * The caller's query is never modified: each page is requested with a copy
   * of it, overlaid with the parameters of the previous page's next link.
   *
   * @returns Number of pages consumed
   * @throws {PaginationError} On a cursor cycle, a malformed page or next link, or when the page cap is exceeded
   */
  async walk(request: TransportRequest, consume: PageConsumer, options: WalkOptions = {}): Promise<number> {
    const { signal } = options;
    const maxPages = options.maxPages ?? this.maxPages;

    let query: Record<string, string> = { ...request.query };
    const seenCursors = new Set<string>();
    const seenLinks = new Set<string>();
    const initialCursor = query[CURSOR_PARAM];
    if (initialCursor) {
      seenCursors.add(initialCursor);
    }

    let pages = 0;
    for (;;) {
      if (pages >= maxPages) {
        throw new PaginationError(`Page limit of ${maxPages} exceeded for ${request.path}`, {
          pagesConsumed: pages,
        });
      }

      const response = await this.executor.execute({ ...request, query: { ...query } }, { signal });
      await consume(response.body, pages);
      pages++;

      const envelope = parsePageEnvelope(response.body);
      if (!envelope) {
        throw new PaginationError(`Page ${pages} of ${request.path} is not a JSON object`, { pagesConsumed: pages });
      }

      const next = extractNextLink(envelope);
      if (!next) {
        this.logger.debug('Pagination complete', { path: request.path, pages });
        return pages;
      }

      if (seenLinks.has(next)) {
        throw new PaginationError(`Next link repeats a page already followed: ${next}`, {
          pagesConsumed: pages,
          nextLink: next,
        });
      }
      seenLinks.add(next);

      let nextParams: Record<string, string>;
      try {
        nextParams = paramsFromLink(next);
      } catch (error) {
        throw new PaginationError(`Failed to parse next link: ${next}`, {
          pagesConsumed: pages,
          nextLink: next,
          cause: error,
        });
      }

      const cursor = nextParams[CURSOR_PARAM];
      if (cursor !== undefined) {
        if (seenCursors.has(cursor)) {
          throw new PaginationError(`Cursor "${cursor}" was already visited`, { pagesConsumed: pages, nextLink: next });
        }
        seenCursors.add(cursor);
      }

      query = { ...query, ...nextParams };
      this.logger.debug('Following next page', { path: request.path, page: pages + 1 });
    }
  }

  /**
   * Walk every page and concatenate what `select` extracts from each, in order
   */
  async collect<T>(
    request: TransportRequest,
    select: (page: PageEnvelope) => readonly T[],
    options: WalkOptions = {},
  ): Promise<T[]> {
    const items: T[] = [];
    await this.walk(
      request,
      (body, pageIndex) => {
        const envelope = parsePageEnvelope(body);
        if (!envelope) {
          throw new PaginationError(`Page ${pageIndex + 1} of ${request.path} is not a JSON object`, {
            pagesConsumed: pageIndex,
          });
        }
        items.push(...select(envelope));
      },
      options,
    );
    return items;
  }
}
