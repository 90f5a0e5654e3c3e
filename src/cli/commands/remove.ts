/**
 * `tvship remove <alias>` — forget a device.
 */

import { Command } from 'commander';
import type { CliContext } from '../context.js';

export function createRemoveCommand(ctx: CliContext): Command {
  const cmd = new Command('remove');

  cmd
    .description('Remove a device from the registry')
    .argument('<alias>', 'Registered device alias')
    .action(async (alias: string) => {
      const device = await ctx.runtime().registry.remove(alias);
      ctx.io.out(`Removed "${device.alias}" (${device.host}:${device.port})`);
    });

  return cmd;
}
