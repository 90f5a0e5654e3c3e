/**
 * tvship — smart-TV app deployment pipeline
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { ConfigManager, createRuntime, loadArtifact } from 'tvship';
 *
 * const runtime = createRuntime(new ConfigManager().load());
 * await runtime.pairing.pair('192.168.1.50', 3000, 'livingroom');
 * const artifact = await runtime.packager.package('./app', manifest);
 * const deployment = await runtime.deployer.deploy('livingroom', artifact);
 * await runtime.close();
 * ```
 */

// Core
export { ConfigManager } from './core/config.js';
export { TvshipConfigSchema, DEFAULT_DATA_DIR, type TvshipConfig, type TvshipConfigInput } from './core/types.js';
export { createLogger, getLogger, setLogger, type Logger } from './core/logger.js';
export { AsyncMutex, KeyedMutex } from './core/mutex.js';
export {
  TvshipError,
  ConfigError,
  NotFoundError,
  DuplicateAliasError,
  NetworkUnreachableError,
  PairingTimeoutError,
  PairingRejectedError,
  InvalidManifestError,
  PackagingFailedError,
  DeviceNotPairedError,
  ChecksumMismatchError,
  InstallFailedError,
  LaunchFailedError,
  LaunchTimeoutError,
  CancelledError,
  DeviceConnectionError,
  exitCodeFor,
  exitCodeForKind,
  isTransient,
  type ErrorKind,
  type ManifestProblem,
  type Stage,
} from './core/errors.js';

// Components
export * from './registry/index.js';
export * from './device/index.js';
export * from './discovery/index.js';
export * from './pairing/index.js';
export * from './deploy/index.js';
export * from './logs/index.js';

// CLI wiring
export { createRuntime, loadConfig, type Runtime, type RuntimeOverrides } from './cli/context.js';
export { run } from './cli/index.js';
export { NAME, VERSION } from './version.js';
