/**
 * `tvship init` — write the default global configuration.
 */

import { Command } from 'commander';
import { configManagerFor, type CliContext } from '../context.js';

export function createInitCommand(ctx: CliContext): Command {
  const cmd = new Command('init');

  cmd
    .description('Write a default config.yaml to the data directory')
    .action(() => {
      const path = configManagerFor(ctx.globals()).createDefaultConfig();
      ctx.io.out(`Config: ${path}`);
    });

  return cmd;
}
