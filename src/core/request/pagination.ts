/**
 * Pagination aggregator for collection resources.
 *
 * Consumes two continuation styles:
 *   - offset: `{ items, offset, count, total }`, next page at offset + count
 *   - next:   `{ items, next }`, where next is a cursor or a link ("/..." or "http...")
 *
 * A page with neither signal, or with no items, ends the sequence. Items are
 * concatenated in fetch order; nothing is reordered or deduplicated.
 *
 * A link is followed only when it resolves to the origin of the first page,
 * since every page carries the session token.
 */

import type { Outcome, RequestDescriptor } from '../../types/request.js';
import { resolveUrl, uriHasQueryParam, withQuery, withUri } from './descriptor.js';
import { getLogger } from '../logger.js';

/** Fetches and classifies one page (retries and auth refresh included). */
export type PageFetcher = (descriptor: RequestDescriptor) => Promise<Outcome>;

export interface PaginationOptions {
  /** Resolves relative URIs; continuation links must stay on the first page's origin. */
  baseUrl: string;
  /** Injected as `limit` unless skipPaginationLimit is set or the URI carries one. */
  pageSize: number;
  /** Ceiling on pages fetched unless skipPaginationLimit is set. */
  maxPages: number;
  signal?: AbortSignal;
}

export type Continuation =
  | { type: 'offset'; offset: number }
  | { type: 'cursor'; cursor: string }
  | { type: 'link'; uri: string };

export interface PageInfo {
  items: unknown[];
  continuation?: Continuation;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Read items and the continuation signal from a page body.
 * Returns null when the body is not a collection page.
 */
export function readPage(body: unknown, requestedOffset: number): PageInfo | null {
  if (Array.isArray(body)) {
    return { items: body };
  }
  if (!isRecord(body)) {
    return null;
  }
  const rawItems = body['items'];
  if (!Array.isArray(rawItems)) {
    return null;
  }

  const items: unknown[] = rawItems;
  if (items.length === 0) {
    return { items };
  }

  const next = body['next'];
  if (typeof next === 'string' && next !== '') {
    const isLink = next.startsWith('/') || /^https?:\/\//i.test(next);
    return {
      items,
      continuation: isLink ? { type: 'link', uri: next } : { type: 'cursor', cursor: next },
    };
  }

  const total = body['total'];
  if (typeof total === 'number') {
    const rawOffset = body['offset'];
    const rawCount = body['count'];
    const offset = typeof rawOffset === 'number' ? rawOffset : requestedOffset;
    const count = typeof rawCount === 'number' ? rawCount : items.length;
    const nextOffset = offset + count;
    if (count > 0 && nextOffset < total) {
      return { items, continuation: { type: 'offset', offset: nextOffset } };
    }
  }

  return { items };
}

function continuationKey(c: Continuation): string {
  switch (c.type) {
    case 'offset': return `offset:${c.offset}`;
    case 'cursor': return `cursor:${c.cursor}`;
    case 'link': return `link:${c.uri}`;
  }
}

/**
 * Reason a continuation link cannot be followed, or undefined when it can.
 */
export function checkLink(descriptor: RequestDescriptor, baseUrl: string, origin: string): string | undefined {
  let target: URL;
  try {
    target = new URL(resolveUrl(descriptor, baseUrl));
  } catch {
    return `Continuation link is not a valid URL: ${descriptor.uri}`;
  }
  if (target.origin !== origin) {
    return `Continuation link leaves ${origin} for ${target.origin}`;
  }
  return undefined;
}

function applyContinuation(descriptor: RequestDescriptor, c: Continuation): RequestDescriptor {
  switch (c.type) {
    case 'offset': return withQuery(descriptor, { offset: String(c.offset) });
    case 'cursor': return withQuery(descriptor, { next: c.cursor });
    case 'link': return withUri(descriptor, c.uri);
  }
}

/**
 * The descriptor for the first page: the default page size is applied
 * unless the limit is skipped or already present.
 */
export function firstPageDescriptor(descriptor: RequestDescriptor, pageSize: number): RequestDescriptor {
  if (descriptor.options.skipPaginationLimit || uriHasQueryParam(descriptor, 'limit')) {
    return descriptor;
  }
  return withQuery(descriptor, { limit: String(pageSize) });
}

/**
 * Fetch every page of a collection and concatenate the items.
 */
export async function fetchAll(
  descriptor: RequestDescriptor,
  fetchPage: PageFetcher,
  options: PaginationOptions,
): Promise<Outcome> {
  const log = getLogger('request');
  const unbounded = descriptor.options.skipPaginationLimit;
  const items: unknown[] = [];
  const seen = new Set<string>();
  let pages = 0;
  let attempts = 0;
  let status = 200;
  let current = firstPageDescriptor(descriptor, options.pageSize);
  let requestedOffset = Number(current.query['offset'] ?? 0);
  const origin = new URL(resolveUrl(current, options.baseUrl)).origin;

  for (;;) {
    if (options.signal?.aborted) {
      return {
        kind: 'cancelled',
        pagesFetched: pages,
        itemsFetched: items.length,
        detail: { message: `Pagination cancelled after ${pages} page(s)`, code: 'CANCELLED' },
      };
    }

    const outcome = await fetchPage(current);
    if (outcome.kind === 'cancelled') {
      return { ...outcome, pagesFetched: pages, itemsFetched: items.length };
    }
    if (outcome.kind !== 'complete') {
      return outcome;
    }

    pages++;
    attempts += outcome.attempts;
    status = outcome.status;

    const page = readPage(outcome.data, requestedOffset);
    if (!page) {
      return {
        kind: 'failed',
        reason: 'invalid-response',
        detail: {
          message: `Collection response for page ${pages} has no items array`,
          status: outcome.status,
          code: 'INVALID_PAGE',
        },
      };
    }
    for (const item of page.items) {
      items.push(item);
    }
    log.debug({ uri: current.uri, page: pages, fetched: page.items.length, total: items.length }, 'page fetched');

    const continuation = page.continuation;
    if (!continuation) {
      return { kind: 'complete', data: items, status, pages, attempts };
    }

    const key = continuationKey(continuation);
    if (seen.has(key)) {
      return {
        kind: 'failed',
        reason: 'pagination-exhausted',
        detail: {
          message: `Service repeated continuation ${key} after ${pages} page(s)`,
          code: 'PAGINATION_LOOP',
          status,
        },
      };
    }
    seen.add(key);

    if (!unbounded && pages >= options.maxPages) {
      return {
        kind: 'failed',
        reason: 'pagination-exhausted',
        detail: {
          message: `Stopped after ${pages} pages with more results pending; use skipPaginationLimit to fetch everything`,
          code: 'PAGINATION_LIMIT',
          status,
        },
      };
    }

    const next = applyContinuation(current, continuation);
    if (continuation.type === 'link') {
      const problem = checkLink(next, options.baseUrl, origin);
      if (problem) {
        return {
          kind: 'failed',
          reason: 'invalid-response',
          detail: { message: problem, code: 'INVALID_CONTINUATION', status },
        };
      }
    }
    current = next;
    requestedOffset = continuation.type === 'offset' ? continuation.offset : 0;
  }
}
