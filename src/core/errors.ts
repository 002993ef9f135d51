/**
 * skyfleet error types with exit code integration and the CLI error envelope shape.
 */

import { ExitCode, getExitCodeName, isRecoverableCode } from '../types/exit-codes.js';

/** Coarse error category carried in the CLI error envelope. */
export type ErrorCategory =
  | 'VALIDATION'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'AUTH'
  | 'TRANSPORT'
  | 'INTERNAL';

/** Error object embedded in a failed CLI envelope. */
export interface EnvelopeError {
  code: string;
  message: string;
  category: ErrorCategory;
  retryable: boolean;
  details: Record<string, unknown>;
}

/**
 * Map numeric exit codes to an error category.
 */
function exitCodeToCategory(code: ExitCode): ErrorCategory {
  if (code >= 1 && code <= 9) {
    switch (code) {
      case ExitCode.NOT_FOUND: return 'NOT_FOUND';
      case ExitCode.INVALID_INPUT: return 'VALIDATION';
      case ExitCode.VALIDATION_ERROR: return 'VALIDATION';
      case ExitCode.CONFIG_ERROR: return 'VALIDATION';
      case ExitCode.LOCK_TIMEOUT: return 'CONFLICT';
      default: return 'INTERNAL';
    }
  }
  if (code >= 30 && code <= 39) return 'AUTH';
  if (code === ExitCode.INVALID_REQUEST || code === ExitCode.BUSINESS_FAILURE) return 'VALIDATION';
  if (code >= 40 && code <= 49) return 'TRANSPORT';
  return 'INTERNAL';
}

/**
 * Map numeric exit code to a string error code (E_CATEGORY_DETAIL).
 */
function exitCodeToEnvelopeCode(code: ExitCode): string {
  return `E_${exitCodeToCategory(code)}_${getExitCodeName(code)}`;
}

/**
 * Structured error class for skyfleet operations.
 * Carries an exit code, human-readable message, and optional fix suggestion.
 */
export class SkyfleetError extends Error {
  readonly code: ExitCode;
  readonly fix?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ExitCode,
    message: string,
    options?: {
      fix?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'SkyfleetError';
    this.code = code;
    this.fix = options?.fix;
    this.details = options?.details;
  }

  /** Error object for the CLI envelope. */
  toEnvelopeError(): EnvelopeError {
    return {
      code: exitCodeToEnvelopeCode(this.code),
      message: this.message,
      category: exitCodeToCategory(this.code),
      retryable: isRecoverableCode(this.code),
      details: {
        exitCode: this.code,
        name: getExitCodeName(this.code),
        ...(this.fix && { fix: this.fix }),
        ...this.details,
      },
    };
  }

  toJSON(): Record<string, unknown> {
    return {
      success: false,
      error: {
        code: this.code,
        name: getExitCodeName(this.code),
        message: this.message,
        ...(this.fix && { fix: this.fix }),
        ...(this.details && { details: this.details }),
      },
    };
  }
}

/** Narrow an unknown value to a SkyfleetError. */
export function isSkyfleetError(err: unknown): err is SkyfleetError {
  return err instanceof SkyfleetError;
}
