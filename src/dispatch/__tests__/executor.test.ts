/**
 * Tests for RequestExecutor: the full pipeline over an in-process transport.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { Mock } from 'vitest';
import { RequestExecutor } from '../executor.js';
import { SessionStore } from '../../core/session/session-store.js';
import type { Authenticator } from '../../core/session/authenticator.js';
import type { Credentials, TokenGrant } from '../../types/session.js';
import type { Transport, TransportResponse } from '../../core/request/transport.js';
import { fakeTransport, noSleep, response } from '../../core/request/__tests__/helpers.js';

const credentials: Credentials = {
  clientId: 'test-client',
  clientSecret: 'test-secret',
  tokenUrl: 'https://sso.test/token',
};

const api = { baseUrl: 'https://api.test', timeoutMs: 1_000, pageSize: 2, maxPages: 5 };

function grant(accessToken: string): TokenGrant {
  return { accessToken, tokenType: 'Bearer', expiresIn: 3600 };
}

describe('RequestExecutor', () => {
  let now: number;
  let authenticate: Mock<Authenticator['authenticate']>;
  let store: SessionStore;

  beforeEach(() => {
    now = 10_000;
    authenticate = vi.fn<Authenticator['authenticate']>();
    store = new SessionStore({ authenticator: { authenticate }, now: () => now });
  });

  async function connect(workspaceId?: string): Promise<void> {
    authenticate.mockResolvedValueOnce(grant('t1'));
    await store.connect(credentials, workspaceId ? { workspaceId } : undefined);
  }

  function executorWith(...replies: Array<TransportResponse | Error>) {
    const transport = fakeTransport(...replies);
    const executor = new RequestExecutor({ store, api, transport, sleep: noSleep, random: () => 0 });
    return { executor, send: transport.send };
  }

  it('sends an authorized request and returns a complete outcome', async () => {
    await connect('ws-1');
    const { executor, send } = executorWith(response(200, { id: 'f-1' }));

    const outcome = await executor.execute({ method: 'get', uri: '/v1/fleets/f-1' });

    expect(outcome).toEqual({ kind: 'complete', data: { id: 'f-1' }, status: 200, pages: 1, attempts: 1 });
    expect(send).toHaveBeenCalledTimes(1);
    expect(send.mock.calls[0]?.[0]).toEqual({
      method: 'GET',
      url: 'https://api.test/v1/fleets/f-1',
      headers: { Accept: 'application/json', Authorization: 'Bearer t1' },
    });
    expect(executor.lastFailure()).toBeUndefined();
  });

  it('refreshes once on 401 and retries with the new token', async () => {
    await connect('ws-1');
    authenticate.mockResolvedValueOnce(grant('t2'));
    const { executor, send } = executorWith(
      response(401, { message: 'token expired' }),
      response(200, { ok: true }),
    );

    const outcome = await executor.execute({ method: 'GET', uri: '/v1/fleets' });

    expect(outcome).toEqual({ kind: 'complete', data: { ok: true }, status: 200, pages: 1, attempts: 1 });
    expect(send).toHaveBeenCalledTimes(2);
    expect(send.mock.calls[1]?.[0].headers['Authorization']).toBe('Bearer t2');
    expect(authenticate).toHaveBeenLastCalledWith(credentials, { workspaceId: 'ws-1' });
    expect(store.peek()?.accessToken).toBe('t2');
  });

  it('gives up after one refresh when the new token is also rejected', async () => {
    await connect('ws-1');
    authenticate.mockResolvedValueOnce(grant('t2'));
    const { executor, send } = executorWith(
      response(401, { message: 'token expired' }),
      response(403, { message: 'forbidden' }),
    );

    const outcome = await executor.execute({ method: 'GET', uri: '/v1/fleets' });

    expect(outcome).toEqual({
      kind: 'authentication',
      reason: 'rejected',
      detail: { message: 'forbidden', status: 403, attempts: 1 },
    });
    expect(send).toHaveBeenCalledTimes(2);
    expect(authenticate).toHaveBeenCalledTimes(2);
    expect(executor.lastFailure()).toEqual({ message: 'forbidden', status: 403, attempts: 1 });
  });

  it('reports no-session without touching the transport', async () => {
    const { executor, send } = executorWith();

    const outcome = await executor.execute({ method: 'GET', uri: '/v1/fleets' });

    expect(outcome).toEqual({
      kind: 'authentication',
      reason: 'no-session',
      detail: { message: 'No session established; connect first', code: 'SESSION_NOT_FOUND' },
    });
    expect(send).not.toHaveBeenCalled();
  });

  it('refreshes a stale session before sending and reports a failed refresh', async () => {
    await connect('ws-1');
    now = 3_600_000;
    authenticate.mockRejectedValueOnce(new Error('sso down'));
    const { executor, send } = executorWith();

    const outcome = await executor.execute({ method: 'GET', uri: '/v1/fleets' });

    expect(outcome).toEqual({
      kind: 'authentication',
      reason: 'refresh-failed',
      detail: { message: 'Session refresh failed: sso down', code: 'REFRESH_FAILED' },
    });
    expect(send).not.toHaveBeenCalled();
  });

  it('counts a stale-session refresh as the one refresh of the call', async () => {
    await connect('ws-1');
    now = 3_600_000;
    authenticate.mockResolvedValueOnce(grant('t2'));
    const { executor, send } = executorWith(response(401, { message: 'token expired' }));

    const outcome = await executor.execute({ method: 'GET', uri: '/v1/fleets' });

    expect(outcome).toEqual({
      kind: 'authentication',
      reason: 'rejected',
      detail: { message: 'token expired', status: 401, attempts: 1 },
    });
    expect(authenticate).toHaveBeenCalledTimes(2);
    expect(send).toHaveBeenCalledTimes(1);
    expect(send.mock.calls[0]?.[0].headers['Authorization']).toBe('Bearer t2');
  });

  it('shares one refresh between concurrent calls on a stale session', async () => {
    await connect('ws-1');
    now = 3_600_000;
    authenticate.mockResolvedValueOnce(grant('t2'));
    const { executor, send } = executorWith(response(200, { ok: true }), response(200, { ok: true }));

    const outcomes = await Promise.all([
      executor.execute({ method: 'GET', uri: '/v1/fleets' }),
      executor.execute({ method: 'GET', uri: '/v1/devices' }),
    ]);

    expect(outcomes.map((o) => o.kind)).toEqual(['complete', 'complete']);
    expect(authenticate).toHaveBeenCalledTimes(2);
    expect(send.mock.calls.map(([req]) => req.headers['Authorization'])).toEqual(['Bearer t2', 'Bearer t2']);
  });

  it('requires a workspace for workspace-scoped requests', async () => {
    await connect();
    const { executor, send } = executorWith();

    const outcome = await executor.execute({ method: 'GET', uri: '/v1/fleets', workspaceScoped: true });

    expect(outcome.kind).toBe('authentication');
    expect(outcome.kind === 'authentication' && outcome.reason).toBe('workspace-required');
    expect(send).not.toHaveBeenCalled();
  });

  it('renders a dry run with a masked token and sends nothing', async () => {
    await connect('ws-1');
    const { executor, send } = executorWith();

    const outcome = await executor.execute({
      method: 'POST',
      uri: '/v1/fleets',
      body: { name: 'north' },
      dryRun: true,
    });

    expect(outcome).toEqual({
      kind: 'dry-run',
      request: {
        method: 'POST',
        url: 'https://api.test/v1/fleets',
        headers: {
          Accept: 'application/json',
          Authorization: 'Bearer ********',
          'Content-Type': 'application/json',
        },
        body: { name: 'north' },
      },
    });
    expect(send).not.toHaveBeenCalled();
  });

  it('returns an invalid outcome for a malformed request', async () => {
    await connect('ws-1');
    const { executor, send } = executorWith();

    const outcome = await executor.execute({ method: 'GET', uri: '/v1/fleets', body: { x: 1 } });

    expect(outcome).toEqual({
      kind: 'invalid',
      issues: ['body: not allowed for GET'],
      detail: { message: 'Invalid request: body: not allowed for GET', code: 'INVALID_REQUEST' },
    });
    expect(send).not.toHaveBeenCalled();
    expect(executor.lastFailure()?.code).toBe('INVALID_REQUEST');
  });

  it('returns invalid for URIs that do not parse, without sending', async () => {
    await connect('ws-1');
    const { executor, send } = executorWith();
    const issue = 'uri: uri must be an absolute http(s) URL or a path starting with "/"';

    expect(await executor.execute({ method: 'GET', uri: 'https://' })).toMatchObject({ kind: 'invalid', issues: [issue] });
    expect(await executor.execute({ method: 'GET', uri: 'https://bad host/x', dryRun: true })).toMatchObject({
      kind: 'invalid',
      issues: [issue],
    });
    expect(send).not.toHaveBeenCalled();
  });

  it('returns invalid for a body that cannot be encoded', async () => {
    await connect('ws-1');
    const { executor, send } = executorWith();
    const body: Record<string, unknown> = { name: 'loop' };
    body['self'] = body;

    const outcome = await executor.execute({ method: 'POST', uri: '/v1/fleets', body });

    expect(outcome).toMatchObject({ kind: 'invalid', issues: ['body: body must be JSON-serializable'] });
    expect(send).not.toHaveBeenCalled();
  });

  it('aggregates every page of a collection', async () => {
    await connect('ws-1');
    const { executor, send } = executorWith(
      response(200, { items: ['a', 'b'], offset: 0, count: 2, total: 3 }),
      response(200, { items: ['c'], offset: 2, count: 1, total: 3 }),
    );

    const outcome = await executor.execute({ method: 'GET', uri: '/v1/fleets', collection: true });

    expect(outcome).toEqual({ kind: 'complete', data: ['a', 'b', 'c'], status: 200, pages: 2, attempts: 2 });
    expect(send.mock.calls.map(([req]) => req.url)).toEqual([
      'https://api.test/v1/fleets?limit=2',
      'https://api.test/v1/fleets?limit=2&offset=2',
    ]);
  });

  it('retries only the page that hit a transient failure', async () => {
    await connect('ws-1');
    const { executor, send } = executorWith(
      response(200, { items: ['a', 'b'], offset: 0, count: 2, total: 6 }),
      response(200, { items: ['c', 'd'], offset: 2, count: 2, total: 6 }),
      response(503, { message: 'busy' }),
      response(200, { items: ['e', 'f'], offset: 4, count: 2, total: 6 }),
    );

    const outcome = await executor.execute({ method: 'GET', uri: '/v1/fleets', collection: true });

    expect(outcome).toEqual({
      kind: 'complete',
      data: ['a', 'b', 'c', 'd', 'e', 'f'],
      status: 200,
      pages: 3,
      attempts: 4,
    });
    expect(send.mock.calls.map(([req]) => req.url)).toEqual([
      'https://api.test/v1/fleets?limit=2',
      'https://api.test/v1/fleets?limit=2&offset=2',
      'https://api.test/v1/fleets?limit=2&offset=4',
      'https://api.test/v1/fleets?limit=2&offset=4',
    ]);
    expect(executor.lastFailure()).toEqual({ message: 'busy', status: 503, attempts: 1 });
  });

  it('stops at a continuation link that does not parse', async () => {
    await connect('ws-1');
    const { executor, send } = executorWith(response(200, { items: ['a'], next: 'http://[' }));

    const outcome = await executor.execute({ method: 'GET', uri: '/v1/fleets', collection: true });

    expect(outcome).toEqual({
      kind: 'failed',
      reason: 'invalid-response',
      detail: { message: 'Continuation link is not a valid URL: http://[', code: 'INVALID_CONTINUATION', status: 200 },
    });
    expect(send).toHaveBeenCalledTimes(1);
  });

  it('never sends the session token to another origin named by a continuation link', async () => {
    await connect('ws-1');
    const { executor, send } = executorWith(
      response(200, { items: ['a'], next: 'https://other.example/collect' }),
      response(200, { items: ['b'] }),
    );

    const outcome = await executor.execute({ method: 'GET', uri: '/v1/fleets', collection: true });

    expect(outcome).toMatchObject({ kind: 'failed', reason: 'invalid-response', detail: { code: 'INVALID_CONTINUATION' } });
    expect(send.mock.calls.map(([req]) => req.url)).toEqual(['https://api.test/v1/fleets?limit=2']);
  });

  it('keeps business failure detail for lastFailure', async () => {
    await connect('ws-1');
    const { executor } = executorWith(response(404, { message: 'fleet not found', errorCode: 'FLEET_NOT_FOUND' }));

    const outcome = await executor.execute({ method: 'DELETE', uri: '/v1/fleets/f-9' });

    const detail = { message: 'fleet not found', status: 404, code: 'FLEET_NOT_FOUND', attempts: 1 };
    expect(outcome).toEqual({ kind: 'failed', reason: 'business', detail });
    expect(executor.lastFailure()).toEqual(detail);
  });

  it('clears the previous failure at the start of each call', async () => {
    await connect('ws-1');
    const { executor } = executorWith(response(404, { message: 'missing' }), response(200, {}));

    await executor.execute({ method: 'GET', uri: '/v1/a' });
    expect(executor.lastFailure()?.message).toBe('missing');

    await executor.execute({ method: 'GET', uri: '/v1/b' });
    expect(executor.lastFailure()).toBeUndefined();
  });

  it('keeps a failure of an overlapping call out of the latest call', async () => {
    await connect('ws-1');
    const send = vi.fn<Transport['send']>(async (req) =>
      req.url.endsWith('/v1/a') ? response(404, { message: 'missing' }) : response(200, {}),
    );
    const executor = new RequestExecutor({ store, api, transport: { send }, sleep: noSleep, random: () => 0 });

    const [first, second] = await Promise.all([
      executor.execute({ method: 'GET', uri: '/v1/a' }),
      executor.execute({ method: 'GET', uri: '/v1/b' }),
    ]);

    expect(first.kind).toBe('failed');
    expect(second.kind).toBe('complete');
    expect(executor.lastFailure()).toBeUndefined();
  });

  it('sends without authorization when the session check is skipped', async () => {
    const { executor, send } = executorWith(response(200, { status: 'up' }));

    const outcome = await executor.execute({ method: 'GET', uri: '/health', skipSessionCheck: true });

    expect(outcome.kind).toBe('complete');
    expect(send.mock.calls[0]?.[0].headers).toEqual({ Accept: 'application/json' });
  });

  it('returns a cancelled outcome when the signal is already aborted', async () => {
    await connect('ws-1');
    const { executor, send } = executorWith();
    const controller = new AbortController();
    controller.abort();

    const outcome = await executor.execute({ method: 'GET', uri: '/v1/fleets' }, { signal: controller.signal });

    expect(outcome.kind).toBe('cancelled');
    expect(send).not.toHaveBeenCalled();
  });
});
