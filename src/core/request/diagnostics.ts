/**
 * Diagnostic context: the most recent failure detail of one execute() call.
 *
 * The executor creates a fresh context per call and overwrites it on every
 * failed attempt of that call, so a caller holding only a generic error can
 * still recover the richer reason.
 */

import type { DiagnosticDetail } from '../../types/request.js';

export class DiagnosticContext {
  private last: DiagnosticDetail | undefined;

  record(detail: DiagnosticDetail): void {
    this.last = { ...detail };
  }

  /** Most recent failure, or undefined when none occurred in the current call. */
  get lastFailure(): DiagnosticDetail | undefined {
    return this.last ? { ...this.last } : undefined;
  }
}
