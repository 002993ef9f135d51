/**
 * Middleware pipeline.
 *
 * compose() chains Middleware functions into one. Execution flows from
 * first to last and outcomes bubble back up from last to first.
 */

import type { ExecutionNext, ExecutionRequest, Middleware } from '../types.js';
import type { Outcome } from '../../types/request.js';

export function compose(middlewares: Middleware[]): Middleware {
  if (middlewares.length === 0) {
    return async (_req: ExecutionRequest, next: ExecutionNext) => next();
  }

  return async (request: ExecutionRequest, next: ExecutionNext): Promise<Outcome> => {
    let index = -1;

    async function dispatch(i: number): Promise<Outcome> {
      if (i <= index) {
        throw new Error('next() called multiple times in middleware');
      }
      index = i;

      const fn = middlewares[i];
      if (!fn) {
        return next();
      }
      return fn(request, () => dispatch(i + 1));
    }

    return dispatch(0);
  };
}
