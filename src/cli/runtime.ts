/**
 * Per-invocation wiring: configuration, session store and executor.
 */

import { loadConfig } from '../core/config.js';
import { OAuthClientCredentialsAuthenticator } from '../core/session/authenticator.js';
import { SessionStore } from '../core/session/session-store.js';
import { FileSessionCache } from '../store/session-cache.js';
import { RequestExecutor } from '../dispatch/executor.js';
import type { SkyfleetConfig } from '../types/config.js';

export interface Runtime {
  config: SkyfleetConfig;
  store: SessionStore;
  executor: RequestExecutor;
}

export async function createRuntime(cwd?: string): Promise<Runtime> {
  const config = await loadConfig(cwd);
  const store = new SessionStore({
    authenticator: new OAuthClientCredentialsAuthenticator({ timeoutMs: config.api.timeoutMs }),
    ...(config.session.persist && { cache: new FileSessionCache() }),
    expirySkewMs: config.session.expirySkewMs,
  });
  await store.load();
  const executor = new RequestExecutor({ store, api: config.api });
  return { config, store, executor };
}
