/**
 * Request descriptor construction and validation.
 *
 * A descriptor is validated once, frozen, and never mutated; pagination
 * derives a fresh descriptor per page via withQuery().
 */

import { z } from 'zod';
import {
  BODY_FORBIDDEN_METHODS,
  BODY_REQUIRED_METHODS,
  HTTP_METHODS,
  type DescriptorInput,
  type HttpMethod,
  type RequestDescriptor,
} from '../../types/request.js';
import { SkyfleetError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';

const DescriptorInputSchema = z.object({
  method: z
    .string()
    .transform((m) => m.toUpperCase())
    .pipe(z.enum(HTTP_METHODS)),
  uri: z
    .string()
    .min(1, 'uri is required')
    .refine((u) => (u.startsWith('/') || /^https?:\/\//i.test(u)) && parsesAsUrl(u), {
      message: 'uri must be an absolute http(s) URL or a path starting with "/"',
    }),
  body: z.unknown().optional().refine(isSerializable, { message: 'body must be JSON-serializable' }),
  query: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
  headers: z
    .record(z.string())
    .optional()
    .refine((h) => !h || !Object.keys(h).some((k) => k.toLowerCase() === 'authorization'), {
      message: 'Authorization header is derived from the session and cannot be set',
    }),
  dryRun: z.boolean().optional(),
  skipPaginationLimit: z.boolean().optional(),
  skipSessionCheck: z.boolean().optional(),
  collection: z.boolean().optional(),
  workspaceScoped: z.boolean().optional(),
});

/** Relative paths are checked against a placeholder origin. */
const PLACEHOLDER_ORIGIN = 'http://placeholder.invalid';

function parsesAsUrl(uri: string): boolean {
  try {
    new URL(uri, PLACEHOLDER_ORIGIN);
    return true;
  } catch {
    return false;
  }
}

function isSerializable(body: unknown): boolean {
  if (body === undefined || typeof body === 'string') return true;
  try {
    JSON.stringify(body);
    return true;
  } catch {
    return false;
  }
}

export type DescriptorValidation =
  | { success: true; descriptor: RequestDescriptor }
  | { success: false; issues: string[] };

/**
 * Validate caller input and build a frozen descriptor.
 */
export function validateDescriptor(input: DescriptorInput): DescriptorValidation {
  const parsed = DescriptorInputSchema.safeParse(input);
  if (!parsed.success) {
    return {
      success: false,
      issues: parsed.error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message)),
    };
  }

  const value = parsed.data;
  const method: HttpMethod = value.method;
  const issues: string[] = [];
  const hasBody = value.body !== undefined && value.body !== null;

  if (BODY_REQUIRED_METHODS.has(method) && !hasBody) {
    issues.push(`body: required for ${method}`);
  }
  if (BODY_FORBIDDEN_METHODS.has(method) && hasBody) {
    issues.push(`body: not allowed for ${method}`);
  }
  if (value.collection && method !== 'GET') {
    issues.push(`collection: only GET requests can be paginated (got ${method})`);
  }
  if (issues.length > 0) {
    return { success: false, issues };
  }

  const query: Record<string, string> = {};
  for (const [key, val] of Object.entries(value.query ?? {})) {
    query[key] = String(val);
  }

  const descriptor: RequestDescriptor = {
    method,
    uri: value.uri,
    ...(hasBody && { body: value.body }),
    query: Object.freeze(query),
    headers: Object.freeze({ ...(value.headers ?? {}) }),
    options: Object.freeze({
      dryRun: value.dryRun ?? false,
      skipPaginationLimit: value.skipPaginationLimit ?? false,
      skipSessionCheck: value.skipSessionCheck ?? false,
      collection: value.collection ?? false,
      workspaceScoped: value.workspaceScoped ?? false,
    }),
  };
  return { success: true, descriptor: Object.freeze(descriptor) };
}

/**
 * Build a descriptor, throwing on invalid input.
 */
export function createDescriptor(input: DescriptorInput): RequestDescriptor {
  const result = validateDescriptor(input);
  if (!result.success) {
    throw new SkyfleetError(
      ExitCode.INVALID_REQUEST,
      `Invalid request: ${result.issues.join('; ')}`,
      { details: { issues: result.issues } },
    );
  }
  return result.descriptor;
}

/**
 * Derive a descriptor with extra query parameters (continuation step).
 */
export function withQuery(
  descriptor: RequestDescriptor,
  query: Record<string, string>,
): RequestDescriptor {
  return Object.freeze({
    ...descriptor,
    query: Object.freeze({ ...descriptor.query, ...query }),
  });
}

/**
 * Derive a descriptor pointing at a different URI (continuation link),
 * dropping query parameters the link carries itself.
 */
export function withUri(descriptor: RequestDescriptor, uri: string): RequestDescriptor {
  return Object.freeze({
    ...descriptor,
    uri,
    query: Object.freeze({}),
  });
}

/**
 * Resolve the descriptor's URI and query against a base URL.
 * Query parameters already present in the URI are kept; descriptor query
 * parameters override them.
 */
export function resolveUrl(descriptor: RequestDescriptor, baseUrl: string): string {
  const absolute = /^https?:\/\//i.test(descriptor.uri)
    ? descriptor.uri
    : trimTrailingSlash(baseUrl) + descriptor.uri;
  const url = new URL(absolute);
  for (const [key, value] of Object.entries(descriptor.query)) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}

/** Whether the URI itself already carries the named query parameter. */
export function uriHasQueryParam(descriptor: RequestDescriptor, name: string): boolean {
  if (name in descriptor.query) return true;
  const idx = descriptor.uri.indexOf('?');
  if (idx === -1) return false;
  return new URLSearchParams(descriptor.uri.slice(idx + 1)).has(name);
}

function trimTrailingSlash(baseUrl: string): string {
  return baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;
}
