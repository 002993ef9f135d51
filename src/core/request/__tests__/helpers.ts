/**
 * In-process transport and session fixtures shared by request and dispatch tests.
 */

import type { Transport, TransportResponse } from '../transport.js';
import type { SleepFn } from '../retry.js';
import type { Session } from '../../../types/session.js';

const STATUS_TEXT: Record<number, string> = {
  200: 'OK',
  201: 'Created',
  204: 'No Content',
  207: 'Multi-Status',
  400: 'Bad Request',
  401: 'Unauthorized',
  403: 'Forbidden',
  404: 'Not Found',
  429: 'Too Many Requests',
  500: 'Internal Server Error',
  503: 'Service Unavailable',
};

export function response(
  status: number,
  body: unknown = null,
  headers: Record<string, string> = {},
): TransportResponse {
  return {
    status,
    statusText: STATUS_TEXT[status] ?? '',
    headers: { 'content-type': 'application/json', ...headers },
    body,
  };
}

/** Transport whose send() replays the given replies in order. */
export function fakeTransport(...replies: Array<TransportResponse | Error>) {
  const send = vi.fn<Transport['send']>();
  for (const reply of replies) {
    if (reply instanceof Error) {
      send.mockRejectedValueOnce(reply);
    } else {
      send.mockResolvedValueOnce(reply);
    }
  }
  return { send };
}

export const noSleep: SleepFn = async () => {};

export function testSession(overrides: Partial<Session> = {}): Session {
  return {
    accessToken: 'test-token',
    tokenType: 'Bearer',
    issuedAt: 1_000,
    expiresAt: 1_000 + 3_600_000,
    workspaceId: 'ws-1',
    workspaceName: 'Lab',
    accountId: 'acct-1',
    ...overrides,
  };
}
