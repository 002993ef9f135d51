/**
 * Transport boundary: one HTTP exchange, no retry, no classification.
 *
 * The default transport uses Node's global fetch. Tests substitute an
 * in-process implementation of the Transport interface.
 */

import type { HttpMethod, RequestDescriptor } from '../../types/request.js';
import type { Session } from '../../types/session.js';
import { resolveUrl } from './descriptor.js';

/** A fully built request, ready to send. */
export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  /** Serialized body. */
  body?: string;
}

/** Raw response: status, lower-cased headers, parsed body. */
export interface TransportResponse {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  /** Parsed JSON when the response declares JSON, text otherwise, null when empty. */
  body: unknown;
}

export interface Transport {
  /**
   * Send one request. Resolves with any HTTP status; rejects only on
   * network failure or abort.
   */
  send(request: TransportRequest, signal: AbortSignal): Promise<TransportResponse>;
}

/**
 * Build the wire request for a descriptor. The Authorization header is
 * derived from the session when one is given.
 */
export function buildTransportRequest(
  descriptor: RequestDescriptor,
  baseUrl: string,
  session?: Session,
): TransportRequest {
  const headers: Record<string, string> = {
    Accept: 'application/json',
    ...descriptor.headers,
  };
  if (session) {
    headers['Authorization'] = `${session.tokenType} ${session.accessToken}`;
  }

  const request: TransportRequest = {
    method: descriptor.method,
    url: resolveUrl(descriptor, baseUrl),
    headers,
  };

  if (descriptor.body !== undefined) {
    if (!hasHeader(headers, 'content-type')) {
      headers['Content-Type'] = descriptor.method === 'PATCH'
        ? 'application/merge-patch+json'
        : 'application/json';
    }
    request.body = typeof descriptor.body === 'string'
      ? descriptor.body
      : JSON.stringify(descriptor.body);
  }

  return request;
}

function hasHeader(headers: Record<string, string>, name: string): boolean {
  return Object.keys(headers).some((k) => k.toLowerCase() === name);
}

/**
 * Parse a response body according to its content type.
 */
export function parseBody(text: string, contentType: string | undefined): unknown {
  if (text.length === 0) return null;
  if (contentType && /[/+]json\b/i.test(contentType)) {
    try {
      return JSON.parse(text);
    } catch {
      return text;
    }
  }
  return text;
}

/**
 * Transport backed by the global fetch API.
 */
export class FetchTransport implements Transport {
  async send(request: TransportRequest, signal: AbortSignal): Promise<TransportResponse> {
    const response = await fetch(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      signal,
    });

    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key.toLowerCase()] = value;
    });

    const text = await response.text();
    return {
      status: response.status,
      statusText: response.statusText,
      headers,
      body: parseBody(text, headers['content-type']),
    };
  }
}
