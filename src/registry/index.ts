export { DeviceRegistry, type DeviceUpdater } from './device-registry.js';
export {
  DEVICE_STATES,
  DeviceSchema,
  PairedDeviceSchema,
  RegistryFileSchema,
  isPaired,
  toUnreachable,
} from './types.js';
export type { Device, DeviceState, PairedDevice, RegistryFile } from './types.js';
