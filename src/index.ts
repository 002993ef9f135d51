/**
 * skyfleet library entry point.
 *
 * Resource wrappers build a DescriptorInput and hand it to a
 * RequestExecutor; every call resolves with a typed Outcome.
 */

export { RequestExecutor } from './dispatch/executor.js';
export type { RequestExecutorOptions, ExecuteOptions } from './dispatch/executor.js';
export { outcomeExitCode } from './dispatch/outcome.js';
export { compose } from './dispatch/middleware/pipeline.js';
export type { ExecutionRequest, Middleware } from './dispatch/types.js';

export { SessionStore, sessionFromGrant, DEFAULT_EXPIRY_SKEW_MS } from './core/session/session-store.js';
export type { SessionStoreOptions } from './core/session/session-store.js';
export { OAuthClientCredentialsAuthenticator } from './core/session/authenticator.js';
export type { Authenticator } from './core/session/authenticator.js';
export { summarizeSession } from './core/session/summary.js';
export { FileSessionCache } from './store/session-cache.js';
export type { SessionCache, CachedSession } from './store/session-cache.js';

export { createDescriptor, validateDescriptor } from './core/request/descriptor.js';
export { FetchTransport, buildTransportRequest } from './core/request/transport.js';
export type { Transport, TransportRequest, TransportResponse } from './core/request/transport.js';
export { RetryEngine, transition, classifyStatus } from './core/request/retry.js';
export type { RetryState, RetryEvent, RetryPhase, RetryResult, SleepFn } from './core/request/retry.js';
export { MAX_ATTEMPTS, BASE_DELAY_MS, MAX_DELAY_MS, JITTER_MS, MAX_RETRY_AFTER_MS } from './core/request/backoff.js';
export { classify, classifyResponse } from './core/request/classifier.js';
export { fetchAll } from './core/request/pagination.js';
export { render, formatRenderedRequest, MASKED_TOKEN } from './core/request/dry-run.js';
export { DiagnosticContext } from './core/request/diagnostics.js';

export { loadConfig } from './core/config.js';
export { SkyfleetError, isSkyfleetError } from './core/errors.js';
export { ExitCode } from './types/exit-codes.js';
export { isFailureOutcome, HTTP_METHODS } from './types/request.js';
export type * from './types/request.js';
export { CredentialsSchema, SessionSchema } from './types/session.js';
export type * from './types/session.js';
export type { SkyfleetConfig, ApiConfig } from './types/config.js';
