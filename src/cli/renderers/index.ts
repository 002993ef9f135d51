/**
 * Central output dispatch for CLI commands.
 *
 * cliOutput() checks the resolved format and writes either the JSON
 * envelope (formatSuccess) or the command's human renderer to stdout.
 *
 * Commands call:
 *   cliOutput(data, { command: 'session', operation: 'session.show' })
 */

import { getFormatContext } from '../format-context.js';
import { formatError, formatSuccess } from '../../core/output.js';
import type { FormatOptions } from '../../core/output.js';
import { SkyfleetError } from '../../core/errors.js';
import { getLogger } from '../../core/logger.js';
import { ExitCode } from '../../types/exit-codes.js';
import { renderConfig, renderErrorLine, renderGeneric, renderSession, renderVersion } from './system.js';

// ---------------------------------------------------------------------------
// Renderer registry: maps command name to human renderer function
// ---------------------------------------------------------------------------

type HumanRenderer = (data: Record<string, unknown>, quiet: boolean) => string;

const renderers: Record<string, HumanRenderer> = {
  'session': renderSession,
  'connect': renderSession,
  'config': renderConfig,
  'version': renderVersion,
};

export interface CliOutputOptions {
  /** Command name (picks the human renderer). */
  command: string;
  /** Optional success message for the JSON envelope. */
  message?: string;
  /** Operation name for _meta. */
  operation?: string;
  workspaceId?: string;
  extensions?: Record<string, unknown>;
  /** Pre-rendered human text; bypasses the registry. */
  human?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Output data to stdout in the resolved format.
 */
export function cliOutput(data: unknown, opts: CliOutputOptions): void {
  const ctx = getFormatContext();

  if (ctx.format === 'human') {
    let text: string;
    if (opts.human !== undefined) {
      text = opts.human;
    } else {
      const renderer = renderers[opts.command] ?? renderGeneric;
      text = renderer(isRecord(data) ? data : { result: data }, ctx.quiet);
    }
    if (text) {
      console.log(text);
    }
    return;
  }

  const formatOpts: FormatOptions = {
    ...(opts.operation && { operation: opts.operation }),
    ...(opts.workspaceId && { workspaceId: opts.workspaceId }),
    ...(opts.extensions && { extensions: opts.extensions }),
  };
  console.log(formatSuccess(data, opts.message, formatOpts));
}

/**
 * Write an error to stderr in the resolved format.
 */
export function cliError(error: SkyfleetError, operation?: string): void {
  if (getFormatContext().format === 'human') {
    console.error(renderErrorLine(error.message, error.code, error.fix));
    return;
  }
  console.error(formatError(error, operation));
}

/**
 * Report a command failure and exit. SkyfleetErrors keep their exit code;
 * anything else is reported as GENERAL_ERROR.
 */
export function exitWithError(err: unknown, operation?: string): never {
  const error = err instanceof SkyfleetError
    ? err
    : new SkyfleetError(ExitCode.GENERAL_ERROR, err instanceof Error ? err.message : String(err), { cause: err });
  getLogger('cli').error({ err: error, operation }, error.message);
  cliError(error, operation);
  process.exit(error.code);
}
