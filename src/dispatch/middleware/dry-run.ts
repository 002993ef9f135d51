/**
 * Dry-run middleware: renders the request and stops the pipeline.
 */

import { render } from '../../core/request/dry-run.js';
import type { Outcome } from '../../types/request.js';
import type { ExecutionNext, ExecutionRequest, Middleware } from '../types.js';

export function createDryRun(baseUrl: string): Middleware {
  return async (req: ExecutionRequest, next: ExecutionNext): Promise<Outcome> => {
    if (!req.descriptor?.options.dryRun) {
      return next();
    }
    return { kind: 'dry-run', request: render(req.descriptor, req.session, baseUrl) };
  };
}
