import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigManager } from '../../../src/core/config.js';
import { ConfigError } from '../../../src/core/errors.js';
import { DEFAULT_DATA_DIR } from '../../../src/core/types.js';
import { tempDir, type TempDir } from '../../helpers/fixtures.js';

describe('ConfigManager', () => {
  let globalDir: TempDir;
  let projectDir: TempDir;

  beforeEach(async () => {
    globalDir = await tempDir();
    projectDir = await tempDir();
  });

  afterEach(async () => {
    await globalDir.cleanup();
    await projectDir.cleanup();
  });

  function manager(env: NodeJS.ProcessEnv = {}): ConfigManager {
    return new ConfigManager({ globalDir: globalDir.path, projectDir: projectDir.path, env });
  }

  it('should fill in defaults when no config exists', () => {
    const config = manager().load();

    expect(config.dataDir).toBe(DEFAULT_DATA_DIR);
    expect(config.pairing).toEqual({ timeoutMs: 60_000, probeAttempts: 3, probeBaseDelayMs: 500 });
    expect(config.deploy.installRetryDelaysMs).toEqual([1000, 2000, 4000]);
    expect(config.deploy.healthGracePeriodMs).toBe(10_000);
    expect(config.logs.reconnectMaxDelayMs).toBe(30_000);
    expect(config.packaging.args).toEqual(['{sourceDir}', '--outdir', '{outDir}']);
    expect(config.device.securePorts).toEqual([3001]);
    expect(config.discovery).toEqual({ searchTarget: 'urn:lge-com:service:webos-second-screen:1', timeoutMs: 3000 });
  });

  it('should merge global, project, env and override layers in order', async () => {
    await writeFile(join(globalDir.path, 'config.yaml'), 'pairing:\n  timeoutMs: 30000\n  probeAttempts: 4\n');
    await writeFile(join(projectDir.path, '.tvship.yaml'), 'pairing:\n  probeAttempts: 5\n');

    const config = manager({ TVSHIP_PACKAGE_COMMAND: 'fake-package' }).load({ deploy: { healthGracePeriodMs: 2000 } });

    expect(config.pairing.timeoutMs).toBe(30_000);
    expect(config.pairing.probeAttempts).toBe(5);
    expect(config.packaging.command).toBe('fake-package');
    expect(config.deploy.healthGracePeriodMs).toBe(2000);
    expect(config.deploy.healthPollIntervalMs).toBe(500);
  });

  it('should read the pairing timeout and data dir from the environment', () => {
    const config = manager({ TVSHIP_PAIRING_TIMEOUT_MS: '15000', TVSHIP_DATA_DIR: '/tmp/tvship-data' }).load();

    expect(config.pairing.timeoutMs).toBe(15_000);
    expect(config.dataDir).toBe('/tmp/tvship-data');
  });

  it('should reject invalid values with ConfigError', async () => {
    await writeFile(join(globalDir.path, 'config.yaml'), 'pairing:\n  probeAttempts: 0\n');

    expect(() => manager().load()).toThrow(ConfigError);
  });

  it('should reject unparseable YAML with ConfigError', async () => {
    await writeFile(join(projectDir.path, '.tvship.yaml'), 'pairing: [unclosed\n');

    expect(() => manager().load()).toThrow(ConfigError);
  });

  it('should write a default config that loads back', () => {
    const m = manager();
    const path = m.createDefaultConfig();

    expect(path).toBe(join(globalDir.path, 'config.yaml'));
    expect(m.load().logging.level).toBe('info');
  });
});
