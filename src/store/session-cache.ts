/**
 * On-disk session cache.
 *
 * Holds the current session and the credentials it was derived from so a
 * later CLI invocation can reuse or refresh it. Written atomically with
 * mode 0600 under a file lock; deleted on disconnect.
 */

import type { Credentials, Session, SessionCacheFile } from '../types/session.js';
import { SessionCacheFileSchema } from '../types/session.js';
import { readJson, saveJson } from './json.js';
import { removeFile } from './atomic.js';
import { withLock } from './lock.js';
import { getSessionCachePath } from '../core/paths.js';
import { getLogger } from '../core/logger.js';

export interface CachedSession {
  session: Session;
  credentials: Credentials;
}

export interface SessionCache {
  read(): Promise<CachedSession | null>;
  write(session: Session, credentials: Credentials): Promise<void>;
  clear(): Promise<void>;
}

/** Owner read/write only. */
export const SESSION_FILE_MODE = 0o600;

export class FileSessionCache implements SessionCache {
  constructor(private readonly filePath: string = getSessionCachePath()) {}

  get path(): string {
    return this.filePath;
  }

  async read(): Promise<CachedSession | null> {
    const raw = await readJson<unknown>(this.filePath);
    if (raw === null) return null;

    const parsed = SessionCacheFileSchema.safeParse(raw);
    if (!parsed.success) {
      getLogger('session').warn(
        { path: this.filePath, issues: parsed.error.issues.length },
        'discarding unreadable session cache',
      );
      await this.clear();
      return null;
    }
    return { session: parsed.data.session, credentials: parsed.data.credentials };
  }

  async write(session: Session, credentials: Credentials): Promise<void> {
    const file: SessionCacheFile = {
      version: 1,
      savedAt: new Date().toISOString(),
      session,
      credentials,
    };
    await saveJson(this.filePath, file, { mode: SESSION_FILE_MODE });
  }

  async clear(): Promise<void> {
    await withLock(this.filePath, () => removeFile(this.filePath));
  }
}
