/**
 * Execution pipeline types.
 *
 * Flow:
 *   ExecutionRequest → Middleware... → terminal handler → Outcome
 *
 * Middleware may short-circuit with an outcome of its own (invalid,
 * authentication, dry-run) or enrich the request for those downstream.
 */

import type { DescriptorInput, Outcome, RequestDescriptor } from '../types/request.js';
import type { Session } from '../types/session.js';

export interface ExecutionRequest {
  /** Correlates log lines of one execute() call. */
  readonly requestId: string;
  readonly input: DescriptorInput;
  readonly signal?: AbortSignal;
  /** Set by the validation middleware. */
  descriptor?: RequestDescriptor;
  /** Set by the session guard; absent for sessionless calls. */
  session?: Session;
  /** Set by the session guard when it already refreshed a stale session. */
  refreshed?: boolean;
}

export type ExecutionNext = () => Promise<Outcome>;

/**
 * Middleware function signature.
 */
export type Middleware = (
  request: ExecutionRequest,
  next: ExecutionNext,
) => Promise<Outcome>;
