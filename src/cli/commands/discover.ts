/**
 * `tvship discover` — list TVs answering an SSDP search on the local network.
 */

import { Command } from 'commander';
import type { CliContext } from '../context.js';
import { formatDiscovered, parsePositiveInt } from '../format.js';

interface DiscoverCommandOptions {
  timeout?: number;
  target?: string;
  json?: boolean;
}

export function createDiscoverCommand(ctx: CliContext): Command {
  const cmd = new Command('discover');

  cmd
    .description('Search the local network for TVs to pair with')
    .option('-t, --timeout <ms>', 'How long to collect answers', parsePositiveInt)
    .option('--target <st>', 'SSDP search target (default from config)')
    .option('--json', 'Output as JSON')
    .action(async (options: DiscoverCommandOptions) => {
      const runtime = ctx.runtime();
      const devices = await runtime.discovery.discover({
        searchTarget: options.target ?? runtime.config.discovery.searchTarget,
        timeoutMs: options.timeout ?? runtime.config.discovery.timeoutMs,
        signal: ctx.signal,
      });

      if (options.json) {
        ctx.io.out(JSON.stringify(devices, null, 2));
        return;
      }
      for (const line of formatDiscovered(devices)) ctx.io.out(line);
    });

  return cmd;
}
