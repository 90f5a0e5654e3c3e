export { PairingManager } from './pairing-manager.js';
export type { PairingConfig, PairingManagerDeps, PairOptions } from './pairing-manager.js';
