/**
 * CLI config command - configuration management.
 */

import type { Command } from 'commander';
import { getConfigValue, loadConfig, setConfigValue } from '../../core/config.js';
import { cliOutput, exitWithError } from '../renderers/index.js';

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Configuration management');

  config
    .command('get <key>')
    .description('Get a configuration value and where it came from')
    .action(async (key: string) => {
      try {
        const resolved = await getConfigValue(key);
        cliOutput({ key, value: resolved.value, source: resolved.source }, {
          command: 'config',
          operation: 'config.get',
        });
      } catch (err) {
        exitWithError(err, 'config.get');
      }
    });

  config
    .command('set <key> <value>')
    .description('Set a configuration value')
    .option('--global', 'Set in global config instead of project config')
    .action(async (key: string, value: string, opts: Record<string, unknown>) => {
      try {
        const result = await setConfigValue(key, value, undefined, { global: opts['global'] === true });
        cliOutput(result, { command: 'config', operation: 'config.set' });
      } catch (err) {
        exitWithError(err, 'config.set');
      }
    });

  config
    .command('list')
    .description('Show all resolved configuration')
    .action(async () => {
      try {
        const resolved = await loadConfig();
        cliOutput({ config: resolved }, { command: 'config', operation: 'config.list' });
      } catch (err) {
        exitWithError(err, 'config.list');
      }
    });
}
