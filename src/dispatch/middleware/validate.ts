/**
 * Validation middleware: a malformed descriptor ends the call with an
 * `invalid` outcome before any session or network work.
 */

import { validateDescriptor } from '../../core/request/descriptor.js';
import type { Outcome } from '../../types/request.js';
import type { ExecutionNext, ExecutionRequest, Middleware } from '../types.js';

export function createValidator(): Middleware {
  return async (req: ExecutionRequest, next: ExecutionNext): Promise<Outcome> => {
    const result = validateDescriptor(req.input);
    if (!result.success) {
      return {
        kind: 'invalid',
        issues: result.issues,
        detail: { message: `Invalid request: ${result.issues.join('; ')}`, code: 'INVALID_REQUEST' },
      };
    }
    req.descriptor = result.descriptor;
    return next();
  };
}
