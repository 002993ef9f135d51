/**
 * Retry/backoff engine for a single logical request attempt.
 *
 * Modeled as a state machine so the attempt ceiling and cancellation are
 * checkable without timing:
 *
 *   idle -> attempting -> succeeded
 *                      -> terminal                  (auth / business response)
 *                      -> backoff-wait -> attempting (transient, attempts left)
 *                      -> exhausted                 (transient, no attempts left)
 *   any non-final state -> cancelled                (caller abort)
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { Transport, TransportRequest, TransportResponse } from './transport.js';
import { MAX_ATTEMPTS, computeDelay, parseRetryAfter } from './backoff.js';

export type RetryPhase =
  | 'idle'
  | 'attempting'
  | 'backoff-wait'
  | 'succeeded'
  | 'terminal'
  | 'exhausted'
  | 'cancelled';

export interface RetryState {
  phase: RetryPhase;
  /** Attempts started so far. */
  attempt: number;
  /** Delay of the current backoff wait. */
  delayMs?: number;
}

export type RetryEvent =
  | { type: 'start' }
  | { type: 'success' }
  | { type: 'terminal-failure' }
  | { type: 'transient-failure'; delayMs: number }
  | { type: 'backoff-elapsed' }
  | { type: 'abort' };

const FINAL_PHASES: ReadonlySet<RetryPhase> = new Set(['succeeded', 'terminal', 'exhausted', 'cancelled']);

export function isFinal(state: RetryState): boolean {
  return FINAL_PHASES.has(state.phase);
}

/**
 * Pure transition function. Throws on an event the current phase cannot take.
 */
export function transition(
  state: RetryState,
  event: RetryEvent,
  maxAttempts: number = MAX_ATTEMPTS,
): RetryState {
  if (event.type === 'abort' && !isFinal(state)) {
    return { phase: 'cancelled', attempt: state.attempt };
  }

  switch (state.phase) {
    case 'idle':
      if (event.type === 'start') return { phase: 'attempting', attempt: 1 };
      break;
    case 'attempting':
      if (event.type === 'success') return { phase: 'succeeded', attempt: state.attempt };
      if (event.type === 'terminal-failure') return { phase: 'terminal', attempt: state.attempt };
      if (event.type === 'transient-failure') {
        return state.attempt >= maxAttempts
          ? { phase: 'exhausted', attempt: state.attempt }
          : { phase: 'backoff-wait', attempt: state.attempt, delayMs: event.delayMs };
      }
      break;
    case 'backoff-wait':
      if (event.type === 'backoff-elapsed') return { phase: 'attempting', attempt: state.attempt + 1 };
      break;
    default:
      break;
  }
  throw new Error(`Invalid retry transition: ${state.phase} + ${event.type}`);
}

/** How a single attempt's raw result is bucketed. */
export type AttemptClass = 'success' | 'terminal' | 'transient';

/** HTTP statuses retried as transient besides 5xx. */
export const TRANSIENT_STATUSES: ReadonlySet<number> = new Set([408, 429]);

/**
 * Bucket an HTTP status. 401/403 and other 4xx are terminal here; the
 * executor owns the refresh-and-retry of authentication failures.
 */
export function classifyStatus(status: number): AttemptClass {
  if (status >= 500 || TRANSIENT_STATUSES.has(status)) return 'transient';
  if (status >= 400) return 'terminal';
  return 'success';
}

/** Details of one failed attempt, reported as it happens. */
export interface FailedAttempt {
  attempt: number;
  response?: TransportResponse;
  error?: unknown;
}

export type RetryResult =
  | { kind: 'response'; response: TransportResponse; attempts: number; phases: RetryPhase[]; delays: number[] }
  | {
      kind: 'transient-exhausted';
      attempts: number;
      response?: TransportResponse;
      error?: unknown;
      phases: RetryPhase[];
      delays: number[];
    }
  | { kind: 'cancelled'; attempts: number; phases: RetryPhase[]; delays: number[] };

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryEngineOptions {
  transport: Transport;
  /** Per-attempt timeout. */
  timeoutMs: number;
  /** Cancellable sleep; defaults to timers/promises setTimeout. */
  sleep?: SleepFn;
  /** Jitter source in [0, 1). */
  random?: () => number;
  /** Called for every failed attempt, retried or not. */
  onAttemptFailed?: (failure: FailedAttempt) => void;
}

const defaultSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export class RetryEngine {
  private readonly transport: Transport;
  private readonly timeoutMs: number;
  private readonly sleep: SleepFn;
  private readonly random: () => number;
  private readonly onAttemptFailed?: (failure: FailedAttempt) => void;

  constructor(options: RetryEngineOptions) {
    this.transport = options.transport;
    this.timeoutMs = options.timeoutMs;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.onAttemptFailed = options.onAttemptFailed;
  }

  /**
   * Run one logical attempt with bounded retries.
   */
  async attempt(request: TransportRequest, signal?: AbortSignal): Promise<RetryResult> {
    let state: RetryState = transition({ phase: 'idle', attempt: 0 }, { type: 'start' });
    const phases: RetryPhase[] = ['idle', state.phase];
    const delays: number[] = [];
    let lastResponse: TransportResponse | undefined;
    let lastError: unknown;

    const step = (event: RetryEvent): void => {
      state = transition(state, event);
      phases.push(state.phase);
    };

    while (!isFinal(state)) {
      if (state.phase === 'backoff-wait') {
        const waitMs = state.delayMs ?? 0;
        try {
          await this.sleep(waitMs, signal);
        } catch (err) {
          if (signal?.aborted) {
            step({ type: 'abort' });
            continue;
          }
          throw err;
        }
        step(signal?.aborted ? { type: 'abort' } : { type: 'backoff-elapsed' });
        continue;
      }

      if (signal?.aborted) {
        step({ type: 'abort' });
        continue;
      }

      const attempt = state.attempt;
      const timeout = AbortSignal.timeout(this.timeoutMs);
      const attemptSignal = signal ? AbortSignal.any([signal, timeout]) : timeout;

      let response: TransportResponse;
      try {
        response = await this.transport.send(request, attemptSignal);
      } catch (err) {
        if (signal?.aborted) {
          step({ type: 'abort' });
          continue;
        }
        lastError = timeout.aborted ? new AttemptTimeoutError(this.timeoutMs, err) : err;
        lastResponse = undefined;
        this.onAttemptFailed?.({ attempt, error: lastError });
        step({ type: 'transient-failure', delayMs: this.nextDelay(attempt, undefined, delays) });
        continue;
      }

      lastResponse = response;
      lastError = undefined;
      const bucket = classifyStatus(response.status);
      if (bucket === 'success') {
        step({ type: 'success' });
      } else if (bucket === 'terminal') {
        this.onAttemptFailed?.({ attempt, response });
        step({ type: 'terminal-failure' });
      } else {
        this.onAttemptFailed?.({ attempt, response });
        const retryAfter = parseRetryAfter(response.headers['retry-after']);
        step({ type: 'transient-failure', delayMs: this.nextDelay(attempt, retryAfter, delays) });
      }
    }

    const finalState: RetryState = state;
    switch (finalState.phase) {
      case 'cancelled':
        return { kind: 'cancelled', attempts: finalState.attempt, phases, delays };
      case 'exhausted':
        return {
          kind: 'transient-exhausted',
          attempts: finalState.attempt,
          ...(lastResponse && { response: lastResponse }),
          ...(lastError !== undefined && { error: lastError }),
          phases,
          delays,
        };
      default:
        if (!lastResponse) {
          throw new Error(`Retry run ended in ${finalState.phase} without a response`);
        }
        return { kind: 'response', response: lastResponse, attempts: finalState.attempt, phases, delays };
    }
  }

  /** Delay for the retry following `attempt`; recorded only when a retry remains. */
  private nextDelay(attempt: number, retryAfterMs: number | undefined, delays: number[]): number {
    if (attempt >= MAX_ATTEMPTS) return 0;
    const previous = delays.length > 0 ? delays[delays.length - 1] : 0;
    const next = computeDelay(attempt, this.random, retryAfterMs, previous);
    delays.push(next);
    return next;
  }
}

/** Raised in place of the transport's abort error when the per-attempt timeout fired. */
export class AttemptTimeoutError extends Error {
  constructor(readonly timeoutMs: number, cause?: unknown) {
    super(`Request attempt timed out after ${timeoutMs}ms`, { cause });
    this.name = 'AttemptTimeoutError';
  }
}
