/**
 * CLI connect / disconnect commands.
 */

import type { Command } from 'commander';
import { CredentialsSchema } from '../../types/session.js';
import type { Credentials } from '../../types/session.js';
import { SkyfleetError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { summarizeSession } from '../../core/session/summary.js';
import { cliOutput, exitWithError } from '../renderers/index.js';
import { createRuntime } from '../runtime.js';

/**
 * Credentials from flags, falling back to SKYFLEET_CLIENT_ID / SKYFLEET_CLIENT_SECRET.
 */
export function resolveCredentials(
  opts: Record<string, unknown>,
  defaultTokenUrl: string,
  env: NodeJS.ProcessEnv = process.env,
): Credentials {
  const pick = (flag: string, envName: string): unknown => opts[flag] ?? env[envName];
  const parsed = CredentialsSchema.safeParse({
    clientId: pick('clientId', 'SKYFLEET_CLIENT_ID'),
    clientSecret: pick('clientSecret', 'SKYFLEET_CLIENT_SECRET'),
    tokenUrl: opts['tokenUrl'] ?? defaultTokenUrl,
  });
  if (!parsed.success) {
    const fields = parsed.error.issues.map((i) => i.path.join('.')).join(', ');
    throw new SkyfleetError(ExitCode.INVALID_INPUT, `Missing or invalid credentials: ${fields}`, {
      fix: 'Pass --client-id and --client-secret, or set SKYFLEET_CLIENT_ID and SKYFLEET_CLIENT_SECRET',
    });
  }
  return parsed.data;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

export function registerConnectCommand(program: Command): void {
  program
    .command('connect')
    .description('Authenticate and store a session')
    .option('--client-id <id>', 'API client id (or SKYFLEET_CLIENT_ID)')
    .option('--client-secret <secret>', 'API client secret (or SKYFLEET_CLIENT_SECRET)')
    .option('--token-url <url>', 'Token endpoint (defaults to api.tokenUrl)')
    .option('--workspace-id <id>', 'Scope the session to a workspace')
    .option('--workspace-name <name>', 'Display name of that workspace')
    .action(async (opts: Record<string, unknown>) => {
      try {
        const { config, store } = await createRuntime();
        const credentials = resolveCredentials(opts, config.api.tokenUrl);
        const workspaceId = optionalString(opts['workspaceId']);
        const workspaceName = optionalString(opts['workspaceName']);
        const session = await store.connect(credentials, {
          ...(workspaceId && { workspaceId }),
          ...(workspaceName && { workspaceName }),
        });
        cliOutput(summarizeSession(session, store.isStale(session)), {
          command: 'connect',
          operation: 'session.connect',
          message: 'Connected',
          ...(session.workspaceId && { workspaceId: session.workspaceId }),
        });
      } catch (err) {
        exitWithError(err, 'session.connect');
      }
    });

  program
    .command('disconnect')
    .description('Drop the session and delete the session cache')
    .action(async () => {
      try {
        const { store } = await createRuntime();
        await store.disconnect();
        cliOutput({ connected: false }, { command: 'session', operation: 'session.disconnect', message: 'Disconnected' });
      } catch (err) {
        exitWithError(err, 'session.disconnect');
      }
    });
}
