/**
 * `tvship history [alias]` — show recorded deployments, newest first.
 */

import { Command } from 'commander';
import type { CliContext } from '../context.js';
import { formatHistory, parsePositiveInt } from '../format.js';

interface HistoryOptions {
  limit: number;
  json?: boolean;
}

export function createHistoryCommand(ctx: CliContext): Command {
  const cmd = new Command('history');

  cmd
    .description('Show recorded deployments')
    .argument('[alias]', 'Only deployments to this device')
    .option('-n, --limit <n>', 'Maximum entries', parsePositiveInt, 20)
    .option('--json', 'Output as JSON')
    .action(async (alias: string | undefined, options: HistoryOptions) => {
      const records = await ctx.runtime().history.list({ alias, limit: options.limit });
      if (options.json) {
        ctx.io.out(JSON.stringify(records, null, 2));
        return;
      }
      for (const line of formatHistory(records)) ctx.io.out(line);
    });

  return cmd;
}
