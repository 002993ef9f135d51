/**
 * Session store: owns the current session and its credentials.
 *
 * Sessions are immutable values. Refresh and workspace switch build a new
 * session and install it with a single assignment, so concurrent readers
 * see either the old session or the new one, never a mix.
 *
 * Refresh is single-flight: concurrent callers that find the session stale
 * share one in-flight refresh and all receive its result.
 */

import type { Credentials, Session, TokenGrant, WorkspaceSelection } from '../../types/session.js';
import type { Authenticator } from './authenticator.js';
import type { SessionCache } from '../../store/session-cache.js';
import { SkyfleetError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { getLogger } from '../logger.js';

export interface SessionStoreOptions {
  authenticator: Authenticator;
  /** Persistence; omit for an in-memory store. */
  cache?: SessionCache;
  /** A session expiring within this window counts as stale. */
  expirySkewMs?: number;
  now?: () => number;
}

export const DEFAULT_EXPIRY_SKEW_MS = 30_000;

/**
 * Build a session from a token grant. Workspace fields fall back to the
 * requested selection, then to the previous session.
 */
export function sessionFromGrant(
  grant: TokenGrant,
  now: number,
  selection?: WorkspaceSelection,
  previous?: Session,
): Session {
  return {
    accessToken: grant.accessToken,
    tokenType: grant.tokenType,
    issuedAt: now,
    expiresAt: now + grant.expiresIn * 1000,
    workspaceId: grant.workspaceId ?? selection?.workspaceId ?? previous?.workspaceId ?? null,
    workspaceName: grant.workspaceName ?? selection?.workspaceName ?? previous?.workspaceName ?? null,
    accountId: grant.accountId ?? previous?.accountId ?? null,
  };
}

export class SessionStore {
  private session: Session | undefined;
  private credentials: Credentials | undefined;
  private refreshing: Promise<Session> | undefined;
  /** Bumped whenever the session is replaced outside a refresh. */
  private generation = 0;

  private readonly authenticator: Authenticator;
  private readonly cache?: SessionCache;
  private readonly expirySkewMs: number;
  private readonly now: () => number;

  constructor(options: SessionStoreOptions) {
    this.authenticator = options.authenticator;
    this.cache = options.cache;
    this.expirySkewMs = options.expirySkewMs ?? DEFAULT_EXPIRY_SKEW_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Restore the session from the cache, if one was saved.
   */
  async load(): Promise<Session | undefined> {
    if (!this.cache) return this.session;
    const cached = await this.cache.read();
    if (cached) {
      this.generation++;
      this.session = cached.session;
      this.credentials = cached.credentials;
    }
    return this.session;
  }

  /**
   * Authenticate with the given credentials and install the new session.
   */
  async connect(credentials: Credentials, workspace?: WorkspaceSelection): Promise<Session> {
    const grant = await this.authenticator.authenticate(credentials, workspace);
    const next = sessionFromGrant(grant, this.now(), workspace);

    this.generation++;
    this.credentials = credentials;
    this.session = next;
    await this.persist();

    getLogger('session').info({ workspaceId: next.workspaceId, expiresAt: next.expiresAt }, 'session established');
    return next;
  }

  /** Current session without validation. */
  peek(): Session | undefined {
    return this.session;
  }

  /**
   * Current session; throws SESSION_NOT_FOUND when none is held.
   */
  resolveSession(): Session {
    if (!this.session) {
      throw new SkyfleetError(ExitCode.SESSION_NOT_FOUND, 'No session established', {
        fix: 'Run: skyfleet connect --client-id <id> --client-secret <secret>',
      });
    }
    return this.session;
  }

  /** True when the session has expired or expires within the skew window. */
  isStale(session: Session): boolean {
    return session.expiresAt - this.expirySkewMs <= this.now();
  }

  /**
   * Obtain a fresh session to replace `stale`.
   *
   * When the store already holds a different, still-valid token (another
   * caller refreshed first) that token is returned without a new grant.
   */
  refreshSession(stale?: Session): Promise<Session> {
    if (this.refreshing) {
      return this.refreshing;
    }

    const current = this.session;
    if (current && stale && current.accessToken !== stale.accessToken && !this.isStale(current)) {
      return Promise.resolve(current);
    }

    this.refreshing = this.doRefresh(stale ?? current).finally(() => {
      this.refreshing = undefined;
    });
    return this.refreshing;
  }

  private async doRefresh(base: Session | undefined): Promise<Session> {
    const credentials = this.credentials;
    if (!credentials || !base) {
      throw new SkyfleetError(ExitCode.SESSION_NOT_FOUND, 'No session to refresh', {
        fix: 'Run: skyfleet connect',
      });
    }

    const generation = this.generation;
    const selection: WorkspaceSelection = {
      ...(base.workspaceId && { workspaceId: base.workspaceId }),
      ...(base.workspaceName && { workspaceName: base.workspaceName }),
    };

    let grant: TokenGrant;
    try {
      grant = await this.authenticator.authenticate(credentials, selection);
    } catch (err) {
      throw new SkyfleetError(ExitCode.REFRESH_FAILED, 'Session refresh failed', {
        cause: err,
        fix: 'Reconnect with: skyfleet connect',
        details: { reason: err instanceof Error ? err.message : String(err) },
      });
    }

    // Replaced or dropped while the grant was in flight.
    if (generation !== this.generation) {
      if (this.session) return this.session;
      throw new SkyfleetError(ExitCode.SESSION_NOT_FOUND, 'Session was disconnected during refresh');
    }

    const next = sessionFromGrant(grant, this.now(), selection, base);
    this.session = next;
    await this.persist();

    getLogger('session').debug({ workspaceId: next.workspaceId, expiresAt: next.expiresAt }, 'session refreshed');
    return next;
  }

  /**
   * Re-scope the session to another workspace.
   */
  async switchWorkspace(workspaceId: string, workspaceName?: string): Promise<Session> {
    const credentials = this.credentials;
    if (!credentials || !this.session) {
      throw new SkyfleetError(ExitCode.SESSION_NOT_FOUND, 'No session established', {
        fix: 'Run: skyfleet connect',
      });
    }

    const selection: WorkspaceSelection = { workspaceId, ...(workspaceName && { workspaceName }) };
    const grant = await this.authenticator.authenticate(credentials, selection);
    const next = sessionFromGrant(grant, this.now(), selection, this.session);

    this.generation++;
    this.session = next;
    await this.persist();

    getLogger('session').info({ workspaceId: next.workspaceId }, 'workspace switched');
    return next;
  }

  /**
   * Drop the session and credentials, in memory and on disk.
   */
  async disconnect(): Promise<void> {
    this.generation++;
    this.session = undefined;
    this.credentials = undefined;
    if (this.cache) {
      await this.cache.clear();
    }
    getLogger('session').info('session cleared');
  }

  private async persist(): Promise<void> {
    if (this.cache && this.session && this.credentials) {
      await this.cache.write(this.session, this.credentials);
    }
  }
}
