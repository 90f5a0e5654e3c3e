/**
 * Device Registry Types
 *
 * A device record is a discriminated union on `state`: only a `Paired`
 * device carries a pairing token, every other state carries none.
 */

import { z } from 'zod';

export const DEVICE_STATES = ['Unpaired', 'Pairing', 'Paired', 'Unreachable'] as const;

export type DeviceState = (typeof DEVICE_STATES)[number];

const DeviceBaseSchema = z.object({
  /** Operator-chosen unique name */
  alias: z.string().min(1).max(64),
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  /** Model or device type reported by the probe */
  modelName: z.string().optional(),
  /** Firmware / OS version reported by the probe */
  firmware: z.string().optional(),
  /** ISO timestamp of the last successful pairing */
  pairedAt: z.string().optional(),
  /** ISO timestamp of the last confirmed contact */
  lastSeenAt: z.string().optional(),
});

export const PairedDeviceSchema = DeviceBaseSchema.extend({
  state: z.literal('Paired'),
  pairingToken: z.string().min(1),
});

export const UntrustedDeviceSchema = DeviceBaseSchema.extend({
  state: z.enum(['Unpaired', 'Pairing', 'Unreachable']),
  pairingToken: z.undefined().optional(),
});

export const DeviceSchema = z.discriminatedUnion('state', [PairedDeviceSchema, UntrustedDeviceSchema]);

export type Device = z.infer<typeof DeviceSchema>;
export type PairedDevice = z.infer<typeof PairedDeviceSchema>;

export const RegistryFileSchema = z.object({
  version: z.literal(1),
  devices: z.record(DeviceSchema),
});

export type RegistryFile = z.infer<typeof RegistryFileSchema>;

export function isPaired(device: Device): device is PairedDevice {
  return device.state === 'Paired';
}

/**
 * Strip the token and move the device to Unreachable.
 */
export function toUnreachable(device: Device, lastSeenAt?: string): Device {
  return {
    alias: device.alias,
    host: device.host,
    port: device.port,
    modelName: device.modelName,
    firmware: device.firmware,
    pairedAt: device.pairedAt,
    lastSeenAt: lastSeenAt ?? device.lastSeenAt,
    state: 'Unreachable',
  };
}
