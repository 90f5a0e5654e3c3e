/**
 * `tvship pair <host> <port> <alias>` — pair with a TV and register it.
 */

import { Command } from 'commander';
import type { CliContext } from '../context.js';
import { parsePort, parsePositiveInt } from '../format.js';

interface PairOptions {
  timeout?: number;
}

export function createPairCommand(ctx: CliContext): Command {
  const cmd = new Command('pair');

  cmd
    .description('Pair with a TV and register it under an alias')
    .argument('<host>', 'Device IP address or hostname')
    .argument('<port>', 'Device WebSocket port', parsePort)
    .argument('<alias>', 'Name to register the device under')
    .option('--timeout <ms>', 'How long to wait for confirmation on the TV', parsePositiveInt)
    .action(async (host: string, port: number, alias: string, options: PairOptions) => {
      const device = await ctx.runtime().pairing.pair(host, port, alias, {
        timeoutMs: options.timeout,
        signal: ctx.signal,
        onChallenge: (challenge) => {
          if (challenge.requiresConfirmation) ctx.io.err(challenge.prompt);
        },
      });
      const model = device.modelName ? ` (${device.modelName})` : '';
      ctx.io.out(`Paired "${device.alias}" at ${device.host}:${device.port}${model}`);
    });

  return cmd;
}
