/**
 * `tvship devices` — list registered devices.
 */

import { Command } from 'commander';
import type { Device } from '../../registry/types.js';
import type { CliContext } from '../context.js';
import { formatDevices } from '../format.js';

export function createDevicesCommand(ctx: CliContext): Command {
  const cmd = new Command('devices');

  cmd
    .description('List registered devices')
    .option('--json', 'Output as JSON (pairing tokens are omitted)')
    .action(async (options: { json?: boolean }) => {
      const devices = await ctx.runtime().registry.list();
      if (options.json) {
        ctx.io.out(JSON.stringify(devices.map(redact), null, 2));
        return;
      }
      for (const line of formatDevices(devices)) ctx.io.out(line);
    });

  return cmd;
}

function redact(device: Device): Omit<Device, 'pairingToken'> {
  const { pairingToken: _token, ...rest } = device;
  return rest;
}
