/**
 * Tests for outcome classification and failure-message extraction.
 */

import { describe, it, expect } from 'vitest';
import { classify, classifyResponse, describeError, extractMessage, parseSubItems } from '../classifier.js';
import { response } from './helpers.js';

describe('classifyResponse', () => {
  it('classifies a plain 2xx as complete', () => {
    expect(classifyResponse(response(200, { id: 'd1' }), 1)).toEqual({
      kind: 'complete',
      data: { id: 'd1' },
      status: 200,
      pages: 1,
      attempts: 1,
    });
  });

  it('treats an embedded errorCode in a 2xx as a business failure', () => {
    const outcome = classifyResponse(response(200, { errorCode: 'HPE_GL_DEVICE_EXISTS', message: 'Device already added' }), 1);
    expect(outcome).toEqual({
      kind: 'failed',
      reason: 'business',
      detail: { message: 'Device already added', status: 200, code: 'HPE_GL_DEVICE_EXISTS', attempts: 1 },
    });
  });

  it('reports a 207 with a failed sub-item as partial success carrying every item', () => {
    const body = {
      items: [
        { id: 'a', status: 'SUCCEEDED' },
        { id: 'b', status: 200 },
        { id: 'c', status: 'FAILED', errorCode: 'NOT_FOUND', message: 'Device c not found' },
      ],
    };
    const outcome = classifyResponse(response(207, body), 1);

    expect(outcome.kind).toBe('partial-success');
    if (outcome.kind === 'partial-success') {
      expect(outcome.items).toEqual([
        { id: 'a', status: 'SUCCEEDED', succeeded: true },
        { id: 'b', status: '200', succeeded: true },
        { id: 'c', status: 'FAILED', succeeded: false, errorCode: 'NOT_FOUND', message: 'Device c not found' },
      ]);
      expect(outcome.detail).toEqual({
        message: '2 of 3 items succeeded; first failure: Device c not found',
        status: 207,
        code: 'NOT_FOUND',
        attempts: 1,
      });
      expect(outcome.data).toBe(body);
    }
  });

  it('reports a 207 whose sub-items all succeeded as complete', () => {
    const outcome = classifyResponse(response(207, { results: [{ id: 'a', status: 'ok' }] }), 1);
    expect(outcome.kind).toBe('complete');
  });

  it('reports a 206 with a failed sub-item as partial success', () => {
    const body = { items: [{ id: 'a', status: 'SUCCEEDED' }, { id: 'b', status: 'FAILED', message: 'Quota exceeded' }] };

    expect(classifyResponse(response(206, body), 1)).toEqual({
      kind: 'partial-success',
      status: 206,
      items: [
        { id: 'a', status: 'SUCCEEDED', succeeded: true },
        { id: 'b', status: 'FAILED', succeeded: false, message: 'Quota exceeded' },
      ],
      data: body,
      detail: { message: '1 of 2 items succeeded; first failure: Quota exceeded', status: 206, attempts: 1 },
    });
  });

  it('treats a 206 collection page without per-item results as complete', () => {
    const body = { items: [{ id: 'd1', serialNumber: 'SN1' }, { id: 'd2', serialNumber: 'SN2' }], next: 'c2' };

    expect(classifyResponse(response(206, body), 1)).toEqual({
      kind: 'complete',
      data: body,
      status: 206,
      pages: 1,
      attempts: 1,
    });
  });

  it('maps 401 and 403 to authentication rejected', () => {
    expect(classifyResponse(response(401), 1)).toEqual({
      kind: 'authentication',
      reason: 'rejected',
      detail: { message: 'HTTP 401 Unauthorized', status: 401, attempts: 1 },
    });
    expect(classifyResponse(response(403, { message: 'Workspace access denied' }), 1)).toMatchObject({
      kind: 'authentication',
      detail: { message: 'Workspace access denied' },
    });
  });

  it('maps other 4xx to a business failure with the body message', () => {
    const outcome = classifyResponse(
      response(400, { errorDetails: [{ message: 'serialNumber is required' }], code: 'VALIDATION' }),
      1,
    );
    expect(outcome).toEqual({
      kind: 'failed',
      reason: 'business',
      detail: { message: 'serialNumber is required', status: 400, code: 'VALIDATION', attempts: 1 },
    });
  });
});

describe('classify', () => {
  it('prefixes exhausted retries with the attempt count', () => {
    const outcome = classify({
      kind: 'transient-exhausted',
      attempts: 4,
      response: response(503),
      phases: [],
      delays: [],
    });
    expect(outcome).toEqual({
      kind: 'failed',
      reason: 'transient-exhausted',
      detail: { message: 'Gave up after 4 attempts: HTTP 503 Service Unavailable', status: 503, attempts: 4 },
    });
  });

  it('reports network errors with their cause code', () => {
    const error = new TypeError('fetch failed', { cause: Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' }) });
    const outcome = classify({ kind: 'transient-exhausted', attempts: 4, error, phases: [], delays: [] });
    expect(outcome).toEqual({
      kind: 'failed',
      reason: 'transient-exhausted',
      detail: {
        message: 'Gave up after 4 attempts: fetch failed: connect ECONNREFUSED',
        code: 'ECONNREFUSED',
        attempts: 4,
      },
    });
  });

  it('turns a cancelled run into a cancelled outcome', () => {
    expect(classify({ kind: 'cancelled', attempts: 2, phases: [], delays: [] })).toEqual({
      kind: 'cancelled',
      pagesFetched: 0,
      itemsFetched: 0,
      detail: { message: 'Request cancelled by caller', code: 'CANCELLED', attempts: 2 },
    });
  });
});

describe('extractMessage', () => {
  it('prefers message, then error.message, then errorDetails, then detail', () => {
    expect(extractMessage({ message: 'a', error: { message: 'b' } })).toBe('a');
    expect(extractMessage({ error: { message: 'b' }, detail: 'd' })).toBe('b');
    expect(extractMessage({ errorDetails: [{ message: 'c' }], detail: 'd' })).toBe('c');
    expect(extractMessage({ detail: 'd' })).toBe('d');
    expect(extractMessage({ message: '   ' })).toBeUndefined();
    expect(extractMessage('plain text')).toBe('plain text');
  });
});

describe('describeError', () => {
  it('uses the error name as code for named errors', () => {
    const err = new Error('Request attempt timed out after 10ms');
    err.name = 'AttemptTimeoutError';
    expect(describeError(err, 1)).toEqual({
      message: 'Request attempt timed out after 10ms',
      code: 'AttemptTimeoutError',
      attempts: 1,
    });
  });
});

describe('parseSubItems', () => {
  it('ignores bodies without a sub-item list', () => {
    expect(parseSubItems({ items: [] })).toBeUndefined();
    expect(parseSubItems({ count: 2 })).toBeUndefined();
    expect(parseSubItems({ items: ['a', 'b'] })).toBeUndefined();
    expect(parseSubItems({ items: [{ id: 'a' }, { id: 'b' }] })).toBeUndefined();
  });

  it('counts an entry without a status as succeeded unless it has an error code', () => {
    expect(parseSubItems({ items: [{ id: 'a' }, { id: 'b', errorCode: 'DENIED' }] })).toEqual([
      { id: 'a', status: 'unknown', succeeded: true },
      { id: 'b', status: 'unknown', succeeded: false, errorCode: 'DENIED' },
    ]);
  });
});
