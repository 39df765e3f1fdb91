/**
 * Config CLI Command
 *
 * Lists every environment variable the configuration reads.
 */

import type { Command } from 'commander';
import { configRegistry, getAllEnvVars } from '../../config/registry/index.js';
import { formatOutput } from '../utils/output.js';
import { typedCommandAction } from '../utils/typed-action.js';

export function addConfigCommand(program: Command): void {
  program
    .command('config')
    .description('List configuration environment variables and their defaults')
    .action(
      typedCommandAction(async (options) => {
        const envVars = getAllEnvVars(configRegistry);

        if (options.format === 'text') {
          console.log(
            envVars
              .map(
                (v) =>
                  `${v.envKey}${v.defaultValue !== undefined ? ` (default: ${String(v.defaultValue)})` : ''}\n  ${v.description}`
              )
              .join('\n')
          );
          return;
        }

        console.log(formatOutput(envVars, options.format));
      })
    );
}
