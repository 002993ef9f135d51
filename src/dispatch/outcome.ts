/**
 * Outcome to exit code mapping for the CLI.
 */

import type { Outcome } from '../types/request.js';
import { ExitCode } from '../types/exit-codes.js';

export function outcomeExitCode(outcome: Outcome): ExitCode {
  switch (outcome.kind) {
    case 'complete':
      return Array.isArray(outcome.data) && outcome.data.length === 0 && outcome.pages > 0
        ? ExitCode.NO_DATA
        : ExitCode.SUCCESS;
    case 'partial-success':
      return ExitCode.PARTIAL_SUCCESS;
    case 'dry-run':
      return ExitCode.DRY_RUN;
    case 'invalid':
      return ExitCode.INVALID_REQUEST;
    case 'cancelled':
      return ExitCode.REQUEST_CANCELLED;
    case 'failed':
      switch (outcome.reason) {
        case 'business': return ExitCode.BUSINESS_FAILURE;
        case 'transient-exhausted': return ExitCode.TRANSIENT_EXHAUSTED;
        case 'pagination-exhausted': return ExitCode.PAGINATION_EXHAUSTED;
        case 'invalid-response': return ExitCode.INVALID_RESPONSE;
      }
      break;
    case 'authentication':
      switch (outcome.reason) {
        case 'no-session': return ExitCode.SESSION_NOT_FOUND;
        case 'refresh-failed': return ExitCode.REFRESH_FAILED;
        case 'rejected': return ExitCode.AUTH_REJECTED;
        case 'workspace-required': return ExitCode.WORKSPACE_REQUIRED;
      }
      break;
  }
  return ExitCode.GENERAL_ERROR;
}
