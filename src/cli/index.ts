/**
 * skyfleet CLI entry point.
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { registerConnectCommand } from './commands/connect.js';
import { registerSessionCommand, registerWorkspaceCommand } from './commands/session.js';
import { registerInvokeCommand } from './commands/invoke.js';
import { registerConfigCommand } from './commands/config.js';
import { resolveFormat } from './middleware/output-format.js';
import { setFormatContext } from './format-context.js';
import { cliOutput, exitWithError } from './renderers/index.js';
import { initLogger, closeLogger, getLogger } from '../core/logger.js';
import { loadConfig } from '../core/config.js';
import { getSkyfleetHome } from '../core/paths.js';

const PackageJsonSchema = z.object({ version: z.string() });

/** Read version from package.json (single source of truth). */
function getPackageVersion(): string {
  try {
    // src/cli/index.ts and dist/cli/index.js both sit two levels below the root
    const pkgPath = fileURLToPath(new URL('../../package.json', import.meta.url));
    const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(pkgPath, 'utf-8')));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

const CLI_VERSION = getPackageVersion();
const program = new Command();

program
  .name('skyfleet')
  .description('Request orchestration for the skyfleet cloud management API')
  .version(CLI_VERSION)
  .option('--json', 'Output in JSON format (default)')
  .option('--human', 'Output in human-readable format')
  .option('--quiet', 'Suppress non-essential output for scripting');

program
  .command('version')
  .description('Display skyfleet version')
  .action(() => {
    cliOutput({ version: CLI_VERSION }, { command: 'version', operation: 'version' });
  });

registerConnectCommand(program);
registerSessionCommand(program);
registerWorkspaceCommand(program);
registerInvokeCommand(program);
registerConfigCommand(program);

// Logger init is best-effort: with a broken config the stderr fallback
// logger stays in place and the command reports the config error itself.
let loggerInitialized = false;
program.hook('preAction', async () => {
  if (loggerInitialized) return;
  loggerInitialized = true;
  try {
    const config = await loadConfig();
    initLogger(getSkyfleetHome(), config.logging);
  } catch (err) {
    getLogger('cli').debug({ err }, 'file logging not initialized');
  }
});

program.hook('preAction', (thisCommand) => {
  try {
    setFormatContext(resolveFormat(thisCommand.optsWithGlobals()));
  } catch (err) {
    exitWithError(err, 'cli');
  }
});

program.hook('postAction', () => {
  closeLogger();
});

await program.parseAsync();
