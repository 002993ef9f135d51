/**
 * skyfleet exit codes.
 * Ranges: 0 = success, 1-99 = errors, 100+ = special (non-error) states.
 */

export enum ExitCode {
  // === SUCCESS (0) ===
  SUCCESS = 0,

  // === GENERAL ERRORS (1-9) ===
  GENERAL_ERROR = 1,
  INVALID_INPUT = 2,
  FILE_ERROR = 3,
  NOT_FOUND = 4,
  VALIDATION_ERROR = 6,
  LOCK_TIMEOUT = 7,
  CONFIG_ERROR = 8,

  // === SESSION / AUTH ERRORS (30-39) ===
  SESSION_NOT_FOUND = 30,
  SESSION_EXPIRED = 31,
  AUTH_REJECTED = 32,
  REFRESH_FAILED = 33,
  WORKSPACE_REQUIRED = 34,
  AUTHENTICATION_FAILED = 35,

  // === REQUEST ORCHESTRATION ERRORS (40-49) ===
  TRANSIENT_EXHAUSTED = 40,
  REQUEST_CANCELLED = 41,
  BUSINESS_FAILURE = 42,
  PAGINATION_EXHAUSTED = 43,
  INVALID_RESPONSE = 44,
  INVALID_REQUEST = 45,

  // === SPECIAL CODES (100+) - NOT errors ===
  NO_DATA = 100,
  PARTIAL_SUCCESS = 101,
  DRY_RUN = 102,
}

/** Check if an exit code represents an error (1-99). */
function isErrorCode(code: ExitCode): boolean {
  return code >= 1 && code < 100;
}

/** Check if an exit code is recoverable (retry may succeed). */
export function isRecoverableCode(code: ExitCode): boolean {
  const nonRecoverable = new Set<ExitCode>([
    ExitCode.INVALID_INPUT,
    ExitCode.VALIDATION_ERROR,
    ExitCode.CONFIG_ERROR,
    ExitCode.SESSION_NOT_FOUND,
    ExitCode.AUTH_REJECTED,
    ExitCode.REFRESH_FAILED,
    ExitCode.WORKSPACE_REQUIRED,
    ExitCode.AUTHENTICATION_FAILED,
    ExitCode.BUSINESS_FAILURE,
    ExitCode.INVALID_REQUEST,
  ]);

  if (!isErrorCode(code)) return false;
  return !nonRecoverable.has(code);
}

/** Human-readable name for an exit code. */
export function getExitCodeName(code: ExitCode): string {
  return ExitCode[code] ?? 'UNKNOWN';
}
