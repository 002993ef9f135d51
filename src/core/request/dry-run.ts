/**
 * Dry-run renderer: shows the would-be request without sending it.
 *
 * The request is built with the real token so rendering exercises the same
 * path as transmission; the Authorization value is masked on the way out.
 */

import type { RenderedRequest, RequestDescriptor } from '../../types/request.js';
import type { Session } from '../../types/session.js';
import { buildTransportRequest } from './transport.js';

export const MASKED_TOKEN = '********';

/**
 * Render a descriptor as it would be sent.
 */
export function render(
  descriptor: RequestDescriptor,
  session: Session | undefined,
  baseUrl: string,
): RenderedRequest {
  const request = buildTransportRequest(descriptor, baseUrl, session);

  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(request.headers)) {
    headers[name] = name.toLowerCase() === 'authorization' ? maskAuthorization(value) : value;
  }

  return {
    method: request.method,
    url: request.url,
    headers,
    ...(descriptor.body !== undefined && { body: descriptor.body }),
  };
}

function maskAuthorization(value: string): string {
  const space = value.indexOf(' ');
  const scheme = space > 0 ? value.slice(0, space) : 'Bearer';
  return `${scheme} ${MASKED_TOKEN}`;
}

/**
 * Text block for terminal display.
 */
export function formatRenderedRequest(rendered: RenderedRequest): string {
  const lines = [`${rendered.method} ${rendered.url}`];
  for (const [name, value] of Object.entries(rendered.headers)) {
    lines.push(`${name}: ${value}`);
  }
  if (rendered.body !== undefined) {
    lines.push('');
    lines.push(typeof rendered.body === 'string' ? rendered.body : JSON.stringify(rendered.body, null, 2));
  }
  return lines.join('\n');
}
