/**
 * Display-safe view of a session. The access token is never included.
 */

import type { Session } from '../../types/session.js';

export interface SessionSummary {
  connected: true;
  workspaceId: string | null;
  workspaceName: string | null;
  accountId: string | null;
  tokenType: string;
  issuedAt: string;
  expiresAt: string;
  stale: boolean;
}

export function summarizeSession(session: Session, stale: boolean): SessionSummary {
  return {
    connected: true,
    workspaceId: session.workspaceId,
    workspaceName: session.workspaceName,
    accountId: session.accountId,
    tokenType: session.tokenType,
    issuedAt: new Date(session.issuedAt).toISOString(),
    expiresAt: new Date(session.expiresAt).toISOString(),
    stale,
  };
}
