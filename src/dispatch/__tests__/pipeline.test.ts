/**
 * Tests for middleware composition and the audit entry builder.
 */

import { describe, it, expect } from 'vitest';
import { compose } from '../middleware/pipeline.js';
import { buildAuditEntry } from '../middleware/audit.js';
import type { ExecutionRequest, Middleware } from '../types.js';
import type { Outcome } from '../../types/request.js';
import { createDescriptor } from '../../core/request/descriptor.js';
import { testSession } from '../../core/request/__tests__/helpers.js';

const done: Outcome = { kind: 'complete', data: null, status: 204, pages: 1, attempts: 1 };

function request(): ExecutionRequest {
  return { requestId: 'req-1', input: { method: 'GET', uri: '/v1/fleets' } };
}

describe('compose', () => {
  it('runs middleware in order and unwinds in reverse', async () => {
    const calls: string[] = [];
    const tag = (name: string): Middleware => async (_req, next) => {
      calls.push(`${name}:in`);
      const outcome = await next();
      calls.push(`${name}:out`);
      return outcome;
    };

    const outcome = await compose([tag('a'), tag('b')])(request(), async () => {
      calls.push('terminal');
      return done;
    });

    expect(outcome).toBe(done);
    expect(calls).toEqual(['a:in', 'b:in', 'terminal', 'b:out', 'a:out']);
  });

  it('lets a middleware short-circuit the chain', async () => {
    const terminal = vi.fn(async () => done);
    const stop: Middleware = async () => ({ kind: 'invalid', issues: ['x'], detail: { message: 'x' } });

    const outcome = await compose([stop])(request(), terminal);

    expect(outcome.kind).toBe('invalid');
    expect(terminal).not.toHaveBeenCalled();
  });

  it('calls the terminal handler directly when empty', async () => {
    expect(await compose([])(request(), async () => done)).toBe(done);
  });

  it('rejects a middleware that calls next twice', async () => {
    const twice: Middleware = async (_req, next) => {
      await next();
      return next();
    };

    await expect(compose([twice])(request(), async () => done)).rejects.toThrow(
      'next() called multiple times in middleware',
    );
  });
});

describe('buildAuditEntry', () => {
  it('records status, pages and workspace for a complete call', () => {
    const req = request();
    req.descriptor = createDescriptor({ method: 'get', uri: '/v1/fleets' });
    req.session = testSession();

    const entry = buildAuditEntry(req, { kind: 'complete', data: [], status: 200, pages: 3, attempts: 4 }, 12);

    expect(entry).toEqual({
      requestId: 'req-1',
      method: 'GET',
      uri: '/v1/fleets',
      outcome: 'complete',
      durationMs: 12,
      workspaceId: 'ws-1',
      status: 200,
      pages: 3,
      attempts: 4,
    });
  });

  it('records reason and error detail for a failure', () => {
    const entry = buildAuditEntry(
      request(),
      { kind: 'failed', reason: 'business', detail: { message: 'nope', code: 'E1', status: 409, attempts: 1 } },
      5,
    );

    expect(entry).toEqual({
      requestId: 'req-1',
      method: 'GET',
      uri: '/v1/fleets',
      outcome: 'failed',
      durationMs: 5,
      workspaceId: null,
      reason: 'business',
      error: 'nope',
      code: 'E1',
      status: 409,
      attempts: 1,
    });
  });
});
