/**
 * Error classifier: maps raw transport results to outcome categories and
 * extracts the richest available failure message.
 *
 * A structured message in the response body wins over generic transport text.
 */

import type {
  DiagnosticDetail,
  Outcome,
  SubItemResult,
} from '../../types/request.js';
import type { TransportResponse } from './transport.js';
import type { RetryResult } from './retry.js';
import { classifyStatus } from './retry.js';

/** Statuses that announce a multi-status / partial result. */
export const PARTIAL_STATUSES: ReadonlySet<number> = new Set([206, 207]);

const SUCCESS_ITEM_STATUS = /^(succeeded|success|ok|completed|complete|done|created|updated|deleted)$/i;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

/**
 * Pull the most actionable message out of an API error body.
 * Preference: message, error.message, errorDetails[0].message, detail.
 */
export function extractMessage(body: unknown): string | undefined {
  if (!isRecord(body)) return nonEmptyString(body);
  const direct = nonEmptyString(body['message']);
  if (direct) return direct;
  const error = body['error'];
  if (isRecord(error)) {
    const nested = nonEmptyString(error['message']);
    if (nested) return nested;
  } else if (nonEmptyString(error)) {
    return nonEmptyString(error);
  }
  const details: unknown = body['errorDetails'];
  if (Array.isArray(details)) {
    const head: unknown = details[0];
    if (isRecord(head)) {
      const first = nonEmptyString(head['message']);
      if (first) return first;
    }
  }
  return nonEmptyString(body['detail']);
}

/**
 * Pull a machine-readable error code out of an API error body.
 * Preference: errorCode, error.code, code.
 */
export function extractCode(body: unknown): string | undefined {
  if (!isRecord(body)) return undefined;
  const direct = nonEmptyString(body['errorCode']);
  if (direct) return direct;
  const error = body['error'];
  if (isRecord(error)) {
    const nested = error['code'];
    if (typeof nested === 'string' || typeof nested === 'number') return String(nested);
  }
  const code = body['code'];
  return typeof code === 'string' || typeof code === 'number' ? String(code) : undefined;
}

/** Whether a 2xx body encodes an application-level error. */
export function hasEmbeddedError(body: unknown): boolean {
  if (!isRecord(body)) return false;
  if (nonEmptyString(body['errorCode'])) return true;
  const error = body['error'];
  return isRecord(error) && nonEmptyString(error['message']) !== undefined;
}

/**
 * Failure detail for an HTTP response.
 */
export function describeResponse(response: TransportResponse, attempts?: number): DiagnosticDetail {
  const transportText = `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`;
  const code = extractCode(response.body);
  return {
    message: extractMessage(response.body) ?? transportText,
    status: response.status,
    ...(code && { code }),
    ...(attempts !== undefined && { attempts }),
  };
}

/**
 * Failure detail for a network-level error.
 */
export function describeError(error: unknown, attempts?: number): DiagnosticDetail {
  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error.cause : undefined;
  let code: string | undefined;
  const causeCode: unknown = isRecord(cause) ? cause['code'] : undefined;
  if (typeof causeCode === 'string') {
    code = causeCode;
  } else if (error instanceof Error && error.name !== 'Error' && error.name !== 'TypeError') {
    code = error.name;
  }
  const causeMessage = cause instanceof Error && cause.message !== message ? `: ${cause.message}` : '';
  return {
    message: `${message}${causeMessage}`,
    ...(code && { code }),
    ...(attempts !== undefined && { attempts }),
  };
}

/**
 * Parse per-item results out of a multi-status body (`items` or `results`).
 * Returns undefined when the body lists no sub-items, or when no entry
 * carries a status or error code (a plain collection page). An entry
 * without a status counts as succeeded unless it carries an error code.
 */
export function parseSubItems(body: unknown): SubItemResult[] | undefined {
  if (!isRecord(body)) return undefined;
  const rawItems: unknown = body['items'];
  const rawResults: unknown = body['results'];
  const list: unknown[] | undefined = Array.isArray(rawItems) ? rawItems : Array.isArray(rawResults) ? rawResults : undefined;
  if (!list || list.length === 0) return undefined;

  const entries = list.filter(isRecord);
  if (entries.length !== list.length) return undefined;
  if (!entries.some((e) => 'status' in e || extractCode(e) !== undefined)) return undefined;

  const items: SubItemResult[] = [];
  for (const entry of entries) {
    const rawStatus = entry['status'];
    const hasStatus = typeof rawStatus === 'number' || typeof rawStatus === 'string';
    const status = hasStatus ? String(rawStatus) : 'unknown';
    const errorCode = extractCode(entry);
    const numeric = Number(status);
    const statusOk = !hasStatus
      || (Number.isInteger(numeric) && status.trim() !== ''
        ? numeric >= 200 && numeric < 300
        : SUCCESS_ITEM_STATUS.test(status));
    const id = nonEmptyString(entry['id']) ?? nonEmptyString(entry['resourceId']);
    const message = extractMessage(entry);
    items.push({
      ...(id && { id }),
      status,
      succeeded: statusOk && !errorCode,
      ...(errorCode && { errorCode }),
      ...(message && { message }),
    });
  }
  return items;
}

/**
 * Classify one HTTP response into an outcome. `pages` is 1: the
 * pagination aggregator builds its own complete outcome.
 */
export function classifyResponse(response: TransportResponse, attempts: number): Outcome {
  const bucket = classifyStatus(response.status);

  if (bucket === 'success') {
    if (PARTIAL_STATUSES.has(response.status)) {
      const items = parseSubItems(response.body);
      const failed = items?.filter((i) => !i.succeeded) ?? [];
      if (items && failed.length > 0) {
        const first = failed[0];
        return {
          kind: 'partial-success',
          status: response.status,
          items,
          data: response.body,
          detail: {
            message: `${items.length - failed.length} of ${items.length} items succeeded`
              + (first?.message ? `; first failure: ${first.message}` : ''),
            status: response.status,
            ...(first?.errorCode && { code: first.errorCode }),
            attempts,
          },
        };
      }
    }

    if (hasEmbeddedError(response.body)) {
      return { kind: 'failed', reason: 'business', detail: describeResponse(response, attempts) };
    }

    return { kind: 'complete', data: response.body, status: response.status, pages: 1, attempts };
  }

  if (response.status === 401 || response.status === 403) {
    return { kind: 'authentication', reason: 'rejected', detail: describeResponse(response, attempts) };
  }

  if (bucket === 'terminal') {
    return { kind: 'failed', reason: 'business', detail: describeResponse(response, attempts) };
  }

  // A transient status that reached classification without going through retries.
  return { kind: 'failed', reason: 'transient-exhausted', detail: describeResponse(response, attempts) };
}

/**
 * Classify the terminal result of a retry run.
 */
export function classify(result: RetryResult): Outcome {
  switch (result.kind) {
    case 'response':
      return classifyResponse(result.response, result.attempts);
    case 'cancelled':
      return {
        kind: 'cancelled',
        pagesFetched: 0,
        itemsFetched: 0,
        detail: { message: 'Request cancelled by caller', code: 'CANCELLED', attempts: result.attempts },
      };
    case 'transient-exhausted': {
      const base = result.response
        ? describeResponse(result.response, result.attempts)
        : describeError(result.error, result.attempts);
      return {
        kind: 'failed',
        reason: 'transient-exhausted',
        detail: { ...base, message: `Gave up after ${result.attempts} attempts: ${base.message}` },
      };
    }
  }
}
