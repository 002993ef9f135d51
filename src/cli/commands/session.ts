/**
 * CLI session and workspace command groups.
 */

import type { Command } from 'commander';
import { summarizeSession } from '../../core/session/summary.js';
import { cliOutput, exitWithError } from '../renderers/index.js';
import { createRuntime } from '../runtime.js';

export function registerSessionCommand(program: Command): void {
  const session = program
    .command('session')
    .description('Inspect the current session');

  session
    .command('show')
    .description('Show the current session (the token is never printed)')
    .action(async () => {
      try {
        const { store } = await createRuntime();
        const current = store.peek();
        if (!current) {
          cliOutput({ connected: false }, { command: 'session', operation: 'session.show' });
          return;
        }
        cliOutput(summarizeSession(current, store.isStale(current)), {
          command: 'session',
          operation: 'session.show',
          ...(current.workspaceId && { workspaceId: current.workspaceId }),
        });
      } catch (err) {
        exitWithError(err, 'session.show');
      }
    });
}

export function registerWorkspaceCommand(program: Command): void {
  const workspace = program
    .command('workspace')
    .description('Select the workspace the session is scoped to');

  workspace
    .command('switch <workspaceId>')
    .description('Re-scope the session to another workspace')
    .option('--name <name>', 'Workspace display name')
    .action(async (workspaceId: string, opts: Record<string, unknown>) => {
      try {
        const { store } = await createRuntime();
        const name = typeof opts['name'] === 'string' ? opts['name'] : undefined;
        const next = await store.switchWorkspace(workspaceId, name);
        cliOutput(summarizeSession(next, store.isStale(next)), {
          command: 'session',
          operation: 'workspace.switch',
          message: `Switched to ${next.workspaceName ?? workspaceId}`,
          workspaceId,
        });
      } catch (err) {
        exitWithError(err, 'workspace.switch');
      }
    });

  workspace
    .command('show')
    .description('Show the selected workspace')
    .action(async () => {
      try {
        const { store } = await createRuntime();
        const current = store.resolveSession();
        cliOutput({ workspaceId: current.workspaceId, workspaceName: current.workspaceName }, {
          command: 'workspace',
          operation: 'workspace.show',
          ...(current.workspaceId && { workspaceId: current.workspaceId }),
        });
      } catch (err) {
        exitWithError(err, 'workspace.show');
      }
    });
}
