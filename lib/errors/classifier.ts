import { BODY_SNIPPET_LENGTH } from '../constants';
import type { TransportResponse } from '../transport/types';
import { isRecord, parseJson, readString } from '../utils/validation';
import { APIError, HTTPError } from './errors';
import type { APIErrorEntry, APIErrorLinks, APIErrorSource } from './types';

/**
 * Truncate a response body for inclusion in an error
 */
export function snippet(body: string, length = BODY_SNIPPET_LENGTH): string {
  return body.length > length ? `${body.slice(0, length)}...` : body;
}

function parseSource(value: unknown): APIErrorSource | undefined {
  if (!isRecord(value)) return undefined;

  const pointer = readString(value, 'pointer');
  if (pointer !== undefined) return { pointer };
  const parameter = readString(value, 'parameter');
  if (parameter !== undefined) return { parameter };

  // Nested form: { jsonPointer: { pointer } } / { parameter: { parameter } }
  if (isRecord(value.jsonPointer)) {
    const nested = readString(value.jsonPointer, 'pointer');
    if (nested !== undefined) return { pointer: nested };
  }
  if (isRecord(value.parameter)) {
    const nested = readString(value.parameter, 'parameter');
    if (nested !== undefined) return { parameter: nested };
  }
  return undefined;
}

function parseLinks(value: unknown): APIErrorLinks | undefined {
  if (!isRecord(value)) return undefined;

  const links: APIErrorLinks = {};
  const about = readString(value, 'about');
  if (about !== undefined) links.about = about;

  if (isRecord(value.associated)) {
    const href = readString(value.associated, 'href');
    if (href !== undefined) {
      links.associated = { href };
      if (isRecord(value.associated.meta)) {
        links.associated.meta = value.associated.meta;
      }
    }
  }
  return links;
}

function parseEntry(record: Record<string, unknown>): APIErrorEntry {
  const entry: APIErrorEntry = {
    status: readString(record, 'status') ?? '',
    code: readString(record, 'code') ?? '',
    title: readString(record, 'title') ?? '',
    detail: readString(record, 'detail') ?? '',
  };

  const id = readString(record, 'id');
  if (id !== undefined) entry.id = id;
  const source = parseSource(record.source);
  if (source) entry.source = source;
  const links = parseLinks(record.links);
  if (links) entry.links = links;
  if (isRecord(record.meta)) entry.meta = record.meta;

  return entry;
}

/**
 * Parse the `{ errors: [...] }` envelope
 *
 * @returns The entries, or null when the body is not an envelope with at
 * least one object entry
 */
export function parseErrorEnvelope(body: string): [APIErrorEntry, ...APIErrorEntry[]] | null {
  const parsed = parseJson(body);
  if (!isRecord(parsed) || !Array.isArray(parsed.errors)) return null;

  const [first, ...rest] = parsed.errors.filter(isRecord).map(parseEntry);
  if (!first) return null;
  return [first, ...rest];
}

/**
 * Turn a non-2xx response into a typed error
 */
export function classifyResponse(response: TransportResponse): APIError | HTTPError {
  const entries = parseErrorEnvelope(response.body);
  if (entries) {
    return new APIError(response.status, entries);
  }
  return new HTTPError(response.status, response.statusText, snippet(response.body));
}
