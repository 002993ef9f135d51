/**
 * CLI invoke command: run one request through the executor.
 *
 *   skyfleet invoke GET /devices/v1/devices --collection
 *   skyfleet invoke POST /devices/v1/devices --body '{"serial":"ABC"}' --dry-run
 */

import type { Command } from 'commander';
import type { DescriptorInput, Outcome } from '../../types/request.js';
import { isFailureOutcome } from '../../types/request.js';
import { SkyfleetError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { safeReadFile } from '../../store/atomic.js';
import { outcomeExitCode } from '../../dispatch/outcome.js';
import { renderOutcome } from '../renderers/outcome.js';
import { cliError, cliOutput, exitWithError } from '../renderers/index.js';
import { getFormatContext } from '../format-context.js';
import { createRuntime } from '../runtime.js';

/** Commander collector for repeatable options. */
function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Parse repeated `name=value` arguments.
 */
export function parsePairs(values: string[], flag: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const raw of values) {
    const eq = raw.indexOf('=');
    if (eq <= 0) {
      throw new SkyfleetError(ExitCode.INVALID_INPUT, `${flag} expects name=value, got "${raw}"`);
    }
    out[raw.slice(0, eq)] = raw.slice(eq + 1);
  }
  return out;
}

/**
 * Parse a JSON request body; non-JSON text is sent as-is.
 */
export function parseBodyArgument(text: string): unknown {
  const trimmed = text.trim();
  if (!trimmed.startsWith('{') && !trimmed.startsWith('[')) {
    return text;
  }
  try {
    return JSON.parse(trimmed);
  } catch (err) {
    throw new SkyfleetError(ExitCode.INVALID_INPUT, 'Request body is not valid JSON', {
      cause: err,
      fix: 'Quote the body, e.g. --body \'{"name":"value"}\'',
    });
  }
}

async function readBody(opts: Record<string, unknown>): Promise<unknown> {
  const file = opts['bodyFile'];
  if (typeof file === 'string') {
    const content = await safeReadFile(file);
    if (content === null) {
      throw new SkyfleetError(ExitCode.FILE_ERROR, `Body file not found: ${file}`);
    }
    return parseBodyArgument(content);
  }
  const body = opts['body'];
  return typeof body === 'string' ? parseBodyArgument(body) : undefined;
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

/**
 * Build descriptor input from command arguments.
 */
export async function buildInvokeInput(
  method: string,
  uri: string,
  opts: Record<string, unknown>,
): Promise<DescriptorInput> {
  const body = await readBody(opts);
  return {
    method,
    uri,
    ...(body !== undefined && { body }),
    query: parsePairs(stringList(opts['query']), '--query'),
    headers: parsePairs(stringList(opts['header']), '--header'),
    collection: opts['collection'] === true,
    skipPaginationLimit: opts['all'] === true,
    skipSessionCheck: opts['session'] === false,
    workspaceScoped: opts['workspaceScoped'] === true,
    dryRun: opts['dryRun'] === true,
  };
}

/**
 * Write an outcome in the resolved format; returns the exit code.
 */
export function emitOutcome(outcome: Outcome): ExitCode {
  const code = outcomeExitCode(outcome);
  const { quiet } = getFormatContext();

  if (isFailureOutcome(outcome) && outcome.kind !== 'partial-success') {
    const details: Record<string, unknown> = { outcome: outcome.kind, ...outcome.detail };
    if (outcome.kind === 'failed' || outcome.kind === 'authentication') details['reason'] = outcome.reason;
    if (outcome.kind === 'invalid') details['issues'] = outcome.issues;
    if (outcome.kind === 'cancelled') {
      details['pagesFetched'] = outcome.pagesFetched;
      details['itemsFetched'] = outcome.itemsFetched;
    }
    if (getFormatContext().format === 'human') {
      console.error(renderOutcome(outcome, quiet));
    } else {
      cliError(new SkyfleetError(code, outcome.detail.message, { details }), 'invoke');
    }
    return code;
  }

  const human = renderOutcome(outcome, quiet);
  switch (outcome.kind) {
    case 'complete':
      cliOutput(outcome.data, {
        command: 'invoke',
        operation: 'invoke',
        human,
        extensions: { status: outcome.status, pages: outcome.pages, attempts: outcome.attempts },
      });
      break;
    case 'partial-success':
      cliOutput({ items: outcome.items, data: outcome.data }, {
        command: 'invoke',
        operation: 'invoke',
        human,
        message: outcome.detail.message,
        extensions: { status: outcome.status, partial: true },
      });
      break;
    case 'dry-run':
      cliOutput({ request: outcome.request }, { command: 'invoke', operation: 'invoke', human, message: 'Dry run; nothing was sent' });
      break;
  }
  return code;
}

export function registerInvokeCommand(program: Command): void {
  program
    .command('invoke <method> <uri>')
    .description('Send one request through the orchestration core')
    .option('--body <json>', 'Request body (JSON)')
    .option('--body-file <path>', 'Read the request body from a file')
    .option('--query <name=value>', 'Query parameter (repeatable)', collect, [])
    .option('--header <name=value>', 'Extra header (repeatable)', collect, [])
    .option('--collection', 'Aggregate every page of a collection')
    .option('--all', 'Follow pagination without page size or page ceiling')
    .option('--no-session', 'Send without resolving or refreshing the session')
    .option('--workspace-scoped', 'Require a session bound to a workspace')
    .option('--dry-run', 'Print the request instead of sending it')
    .action(async (method: string, uri: string, opts: Record<string, unknown>) => {
      const controller = new AbortController();
      const onSigint = (): void => controller.abort();
      process.once('SIGINT', onSigint);
      try {
        const { executor } = await createRuntime();
        const input = await buildInvokeInput(method, uri, opts);
        const code = emitOutcome(await executor.execute(input, { signal: controller.signal }));
        if (code !== ExitCode.SUCCESS) {
          process.exitCode = code;
        }
      } catch (err) {
        exitWithError(err, 'invoke');
      } finally {
        process.off('SIGINT', onSigint);
      }
    });
}
