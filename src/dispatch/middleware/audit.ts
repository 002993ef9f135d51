/**
 * Audit middleware.
 *
 * Writes one structured line per execute() call to the pino log
 * (subsystem: 'audit'). Bodies and headers are never logged.
 */

import { getLogger } from '../../core/logger.js';
import { isFailureOutcome } from '../../types/request.js';
import type { Outcome } from '../../types/request.js';
import type { ExecutionNext, ExecutionRequest, Middleware } from '../types.js';

export interface AuditEntry {
  requestId: string;
  method: string;
  uri: string;
  outcome: Outcome['kind'];
  durationMs: number;
  workspaceId: string | null;
  status?: number;
  pages?: number;
  attempts?: number;
  reason?: string;
  code?: string;
  error?: string;
}

export function buildAuditEntry(
  request: ExecutionRequest,
  outcome: Outcome,
  durationMs: number,
): AuditEntry {
  const entry: AuditEntry = {
    requestId: request.requestId,
    method: request.descriptor?.method ?? request.input.method,
    uri: request.descriptor?.uri ?? request.input.uri,
    outcome: outcome.kind,
    durationMs,
    workspaceId: request.session?.workspaceId ?? null,
  };

  switch (outcome.kind) {
    case 'complete':
      entry.status = outcome.status;
      entry.pages = outcome.pages;
      entry.attempts = outcome.attempts;
      break;
    case 'partial-success':
      entry.status = outcome.status;
      break;
    case 'failed':
    case 'authentication':
      entry.reason = outcome.reason;
      break;
    default:
      break;
  }

  if (isFailureOutcome(outcome)) {
    entry.error = outcome.detail.message;
    if (outcome.detail.code) entry.code = outcome.detail.code;
    if (outcome.detail.status !== undefined) entry.status = outcome.detail.status;
    if (outcome.detail.attempts !== undefined) entry.attempts = outcome.detail.attempts;
  }
  return entry;
}

export function createAudit(): Middleware {
  return async (req: ExecutionRequest, next: ExecutionNext): Promise<Outcome> => {
    const startTime = Date.now();
    const outcome = await next();
    const entry = buildAuditEntry(req, outcome, Date.now() - startTime);

    const log = getLogger('audit');
    if (outcome.kind === 'complete' || outcome.kind === 'dry-run') {
      log.info(entry, `${entry.method} ${entry.uri}`);
    } else {
      log.warn(entry, `${entry.method} ${entry.uri}`);
    }
    return outcome;
  };
}
