/**
 * JSON envelope formatter for CLI output.
 *
 * All CLI output is machine-parseable JSON by default:
 *   { success, result, message?, _meta, error? }
 * Human-readable text is produced by the renderers instead.
 */

import { randomUUID } from 'node:crypto';
import type { EnvelopeError, SkyfleetError } from './errors.js';

export interface EnvelopeMeta {
  operation: string;
  timestamp: string;
  requestId: string;
  transport: 'cli';
  /** Active workspace, when a session is bound to one. */
  workspaceId?: string;
}

export interface SuccessEnvelope<T = unknown> {
  success: true;
  result: T;
  message?: string;
  _meta: EnvelopeMeta;
  _extensions?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  success: false;
  result: null;
  error: EnvelopeError;
  _meta: EnvelopeMeta;
}

export type Envelope<T = unknown> = SuccessEnvelope<T> | ErrorEnvelope;

export interface FormatOptions {
  operation?: string;
  workspaceId?: string;
  extensions?: Record<string, unknown>;
}

function createCliMeta(opts: FormatOptions): EnvelopeMeta {
  return {
    operation: opts.operation ?? 'cli.output',
    timestamp: new Date().toISOString(),
    requestId: randomUUID(),
    transport: 'cli',
    ...(opts.workspaceId && { workspaceId: opts.workspaceId }),
  };
}

/**
 * Build a success envelope. A string in place of options is the operation name.
 */
export function buildSuccess<T>(data: T, message?: string, operationOrOpts?: string | FormatOptions): SuccessEnvelope<T> {
  const opts: FormatOptions = typeof operationOrOpts === 'string'
    ? { operation: operationOrOpts }
    : operationOrOpts ?? {};

  const envelope: SuccessEnvelope<T> = {
    success: true,
    result: data,
    ...(message && { message }),
    _meta: createCliMeta(opts),
  };
  if (opts.extensions && Object.keys(opts.extensions).length > 0) {
    envelope._extensions = opts.extensions;
  }
  return envelope;
}

export function buildError(error: SkyfleetError, operation?: string): ErrorEnvelope {
  return {
    success: false,
    result: null,
    error: error.toEnvelopeError(),
    _meta: createCliMeta({ operation }),
  };
}

/** Format a successful result as a JSON envelope string. */
export function formatSuccess<T>(data: T, message?: string, operationOrOpts?: string | FormatOptions): string {
  return JSON.stringify(buildSuccess(data, message, operationOrOpts));
}

/** Format an error as a JSON envelope string. */
export function formatError(error: SkyfleetError, operation?: string): string {
  return JSON.stringify(buildError(error, operation));
}
