/**
 * Session guard middleware.
 *
 * Populates request.session:
 *
 *   1. skipSessionCheck       -> attach the current session if any, never refresh
 *   2. no session             -> authentication (no-session)
 *   3. workspace required     -> authentication (workspace-required) when unbound
 *   4. stale session          -> one refresh; failure -> authentication (refresh-failed)
 *
 * A refresh here counts as the call's single refresh.
 */

import type { SessionStore } from '../../core/session/session-store.js';
import { describeError } from '../../core/request/classifier.js';
import type { Outcome } from '../../types/request.js';
import type { ExecutionNext, ExecutionRequest, Middleware } from '../types.js';

export function createSessionGuard(store: SessionStore): Middleware {
  return async (req: ExecutionRequest, next: ExecutionNext): Promise<Outcome> => {
    const options = req.descriptor?.options;

    if (options?.skipSessionCheck) {
      req.session = store.peek();
      return next();
    }

    let session = store.peek();
    if (!session) {
      return {
        kind: 'authentication',
        reason: 'no-session',
        detail: { message: 'No session established; connect first', code: 'SESSION_NOT_FOUND' },
      };
    }

    if (store.isStale(session)) {
      try {
        session = await store.refreshSession(session);
        req.refreshed = true;
      } catch (err) {
        return {
          kind: 'authentication',
          reason: 'refresh-failed',
          detail: { message: describeError(err).message, code: 'REFRESH_FAILED' },
        };
      }
    }

    if (options?.workspaceScoped && !session.workspaceId) {
      return {
        kind: 'authentication',
        reason: 'workspace-required',
        detail: { message: 'This request needs a workspace; run workspace switch first', code: 'WORKSPACE_REQUIRED' },
      };
    }

    req.session = session;
    return next();
  };
}
