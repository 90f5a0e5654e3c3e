/**
 * Runtime wiring for the CLI: config → logger → registry → components.
 */

import { join } from 'path';
import { ConfigManager } from '../core/config.js';
import { createLogger, setLogger } from '../core/logger.js';
import { KeyedMutex } from '../core/mutex.js';
import type { TvshipConfig } from '../core/types.js';
import { Deployer } from '../deploy/deployer.js';
import { DeploymentHistory } from '../deploy/history.js';
import { CommandPackageTool } from '../deploy/package-tool.js';
import { Packager } from '../deploy/packager.js';
import type { PackageTool } from '../deploy/types.js';
import type { DeviceTransport } from '../device/types.js';
import { DeviceDiscovery } from '../discovery/ssdp.js';
import { WebSocketTransport } from '../device/websocket-transport.js';
import { LogRelay } from '../logs/log-relay.js';
import { PairingManager } from '../pairing/pairing-manager.js';
import { DeviceRegistry } from '../registry/device-registry.js';

export interface GlobalOptions {
  verbose?: boolean;
  dataDir?: string;
}

export interface Runtime {
  config: TvshipConfig;
  registry: DeviceRegistry;
  discovery: DeviceDiscovery;
  pairing: PairingManager;
  packager: Packager;
  deployer: Deployer;
  relay: LogRelay;
  history: DeploymentHistory;
  /** Flush and close the registry */
  close(): Promise<void>;
}

export interface RuntimeOverrides {
  transport?: DeviceTransport;
  packageTool?: PackageTool;
  discovery?: DeviceDiscovery;
}

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

/**
 * What every command handler receives.
 */
export interface CliContext {
  io: CliIO;
  /** Aborted on Ctrl-C */
  signal: AbortSignal;
  globals(): GlobalOptions;
  /** Built once, on first use */
  runtime(): Runtime;
  /** Exit code to use when the handler returns normally */
  exitCode: number;
}

export const REGISTRY_FILE = 'devices.json';
export const HISTORY_FILE = 'history.jsonl';

export function configManagerFor(globals: GlobalOptions, env: NodeJS.ProcessEnv = process.env): ConfigManager {
  return new ConfigManager({ globalDir: globals.dataDir ?? env.TVSHIP_DATA_DIR, env });
}

export function loadConfig(globals: GlobalOptions, env: NodeJS.ProcessEnv = process.env): TvshipConfig {
  return configManagerFor(globals, env).load(globals.dataDir ? { dataDir: globals.dataDir } : undefined);
}

export function createRuntime(config: TvshipConfig, overrides: RuntimeOverrides = {}): Runtime {
  const registry = new DeviceRegistry(join(config.dataDir, REGISTRY_FILE));
  const locks = new KeyedMutex();
  const transport =
    overrides.transport ??
    new WebSocketTransport({ requestTimeoutMs: config.device.requestTimeoutMs, securePorts: config.device.securePorts });
  const packageTool =
    overrides.packageTool ??
    new CommandPackageTool({
      command: config.packaging.command,
      args: config.packaging.args,
      timeoutMs: config.packaging.timeoutMs,
    });
  const history = new DeploymentHistory(join(config.dataDir, HISTORY_FILE));

  return {
    config,
    registry,
    history,
    discovery: overrides.discovery ?? new DeviceDiscovery(),
    pairing: new PairingManager({ registry, transport, locks, config: config.pairing }),
    packager: new Packager({
      cacheDir: join(config.dataDir, 'artifacts'),
      tool: packageTool,
      cache: config.packaging.cache,
    }),
    deployer: new Deployer({
      registry,
      transport,
      locks,
      config: config.deploy,
      history: config.deploy.recordHistory ? history : undefined,
    }),
    relay: new LogRelay({ registry, transport, config: config.logs }),
    close: () => registry.close(),
  };
}

/**
 * Load config, install the process logger and build the runtime.
 */
export function bootstrap(globals: GlobalOptions): Runtime {
  const config = loadConfig(globals);
  setLogger(
    createLogger('tvship', {
      verbose: globals.verbose === true || config.logging.pretty,
      level: globals.verbose ? 'debug' : config.logging.level,
      logDir: join(config.dataDir, 'logs'),
    }),
  );
  return createRuntime(config);
}
