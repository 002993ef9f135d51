/**
 * Output format resolution from --json/--human/--quiet flags.
 *
 * Precedence: explicit flag, then SKYFLEET_FORMAT, then JSON.
 */

import { SkyfleetError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { FlagResolution, OutputFormat } from '../format-context.js';

export type { FlagResolution };

function isOutputFormat(value: string | undefined): value is OutputFormat {
  return value === 'json' || value === 'human';
}

/**
 * Resolve the output format from commander option values.
 */
export function resolveFormat(
  opts: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): FlagResolution {
  const quiet = opts['quiet'] === true;
  const json = opts['json'] === true;
  const human = opts['human'] === true;

  if (json && human) {
    throw new SkyfleetError(ExitCode.INVALID_INPUT, '--json and --human cannot be combined', {
      fix: 'Pass only one of --json or --human',
    });
  }
  if (json) return { format: 'json', source: 'flag', quiet };
  if (human) return { format: 'human', source: 'flag', quiet };

  const fromEnv = env['SKYFLEET_FORMAT'];
  if (isOutputFormat(fromEnv)) {
    return { format: fromEnv, source: 'env', quiet };
  }
  return { format: 'json', source: 'default', quiet };
}
