/**
 * Request executor.
 *
 * Pipeline: audit → validate → session guard → dry-run → terminal.
 *
 * The terminal handler sends through the retry engine, aggregates pages for
 * collection GETs and classifies the result. A 401/403 triggers at most one
 * session refresh per execute() call, counting a refresh the session guard
 * made for a stale session; the rejected request (or page) is retried once
 * with the new token.
 *
 * Every call records its failures in its own diagnostic context, so
 * overlapping calls never overwrite each other's attempts.
 */

import { randomUUID } from 'node:crypto';
import type { DescriptorInput, DiagnosticDetail, Outcome, RequestDescriptor } from '../types/request.js';
import { isFailureOutcome } from '../types/request.js';
import type { Session } from '../types/session.js';
import type { ApiConfig } from '../types/config.js';
import type { SessionStore } from '../core/session/session-store.js';
import type { Transport } from '../core/request/transport.js';
import { FetchTransport, buildTransportRequest } from '../core/request/transport.js';
import { RetryEngine } from '../core/request/retry.js';
import type { FailedAttempt, SleepFn } from '../core/request/retry.js';
import { classify, describeError, describeResponse } from '../core/request/classifier.js';
import { DiagnosticContext } from '../core/request/diagnostics.js';
import { fetchAll } from '../core/request/pagination.js';
import { SkyfleetError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';
import { getLogger } from '../core/logger.js';
import { compose } from './middleware/pipeline.js';
import { createAudit } from './middleware/audit.js';
import { createValidator } from './middleware/validate.js';
import { createSessionGuard } from './middleware/session-guard.js';
import { createDryRun } from './middleware/dry-run.js';
import type { ExecutionRequest, Middleware } from './types.js';

export interface RequestExecutorOptions {
  store: SessionStore;
  api: Pick<ApiConfig, 'baseUrl' | 'timeoutMs' | 'pageSize' | 'maxPages'>;
  transport?: Transport;
  /** Cancellable sleep used between retries. */
  sleep?: SleepFn;
  /** Jitter source in [0, 1). */
  random?: () => number;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}

/** Mutable per-call auth state shared by every page of one execute(). */
interface AuthState {
  session: Session | undefined;
  refreshed: boolean;
}

export class RequestExecutor {
  private readonly store: SessionStore;
  private readonly api: RequestExecutorOptions['api'];
  private readonly transport: Transport;
  private readonly sleep: SleepFn | undefined;
  private readonly random: (() => number) | undefined;
  private readonly pipeline: Middleware;
  private latest: DiagnosticContext | undefined;

  constructor(options: RequestExecutorOptions) {
    this.store = options.store;
    this.api = options.api;
    this.transport = options.transport ?? new FetchTransport();
    this.sleep = options.sleep;
    this.random = options.random;
    this.pipeline = compose([
      createAudit(),
      createValidator(),
      createSessionGuard(this.store),
      createDryRun(this.api.baseUrl),
    ]);
  }

  /**
   * Execute one logical call. Always resolves with an outcome; never throws
   * for request-level failures.
   */
  async execute(input: DescriptorInput, options: ExecuteOptions = {}): Promise<Outcome> {
    const diagnostics = new DiagnosticContext();
    this.latest = diagnostics;
    const engine = new RetryEngine({
      transport: this.transport,
      timeoutMs: this.api.timeoutMs,
      sleep: this.sleep,
      random: this.random,
      onAttemptFailed: (failure) => recordAttempt(diagnostics, failure),
    });
    const request: ExecutionRequest = {
      requestId: randomUUID(),
      input,
      ...(options.signal && { signal: options.signal }),
    };

    const outcome = await this.pipeline(request, () => this.run(request, engine));
    if (isFailureOutcome(outcome)) {
      diagnostics.record(outcome.detail);
    }
    return outcome;
  }

  /** Most recent failure detail of the most recently started execute() call. */
  lastFailure(): DiagnosticDetail | undefined {
    return this.latest?.lastFailure;
  }

  private async run(request: ExecutionRequest, engine: RetryEngine): Promise<Outcome> {
    const descriptor = request.descriptor;
    if (!descriptor) {
      throw new SkyfleetError(ExitCode.GENERAL_ERROR, 'Request reached the transport without validation');
    }

    const auth: AuthState = { session: request.session, refreshed: request.refreshed ?? false };
    const fetchOne = (d: RequestDescriptor): Promise<Outcome> => this.send(d, auth, engine, request.signal);

    if (descriptor.options.collection) {
      return fetchAll(descriptor, fetchOne, {
        baseUrl: this.api.baseUrl,
        pageSize: this.api.pageSize,
        maxPages: this.api.maxPages,
        ...(request.signal && { signal: request.signal }),
      });
    }
    return fetchOne(descriptor);
  }

  private async send(
    descriptor: RequestDescriptor,
    auth: AuthState,
    engine: RetryEngine,
    signal?: AbortSignal,
  ): Promise<Outcome> {
    for (;;) {
      const transportRequest = buildTransportRequest(descriptor, this.api.baseUrl, auth.session);
      const outcome = classify(await engine.attempt(transportRequest, signal));

      const canRefresh = outcome.kind === 'authentication'
        && outcome.reason === 'rejected'
        && !descriptor.options.skipSessionCheck
        && auth.session !== undefined
        && !auth.refreshed;
      if (!canRefresh || !auth.session) {
        return outcome;
      }

      auth.refreshed = true;
      getLogger('request').debug({ uri: descriptor.uri }, 'token rejected, refreshing session');
      try {
        auth.session = await this.store.refreshSession(auth.session);
      } catch (err) {
        return {
          kind: 'authentication',
          reason: 'refresh-failed',
          detail: { message: describeError(err).message, code: 'REFRESH_FAILED' },
        };
      }
    }
  }
}

function recordAttempt(diagnostics: DiagnosticContext, failure: FailedAttempt): void {
  const detail = failure.response
    ? describeResponse(failure.response, failure.attempt)
    : describeError(failure.error, failure.attempt);
  diagnostics.record(detail);
  getLogger('request').debug(detail, 'attempt failed');
}
