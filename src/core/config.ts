import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { TvshipConfigSchema, type TvshipConfig, type TvshipConfigInput } from './types.js';
import { ConfigError, toError } from './errors.js';

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigManager {
  private config: TvshipConfig | null = null;
  private globalDir: string;
  private projectDir: string;
  private env: NodeJS.ProcessEnv;

  constructor(options: { projectDir?: string; globalDir?: string; env?: NodeJS.ProcessEnv } = {}) {
    this.globalDir = options.globalDir ?? join(homedir(), '.tvship');
    this.projectDir = options.projectDir ?? process.cwd();
    this.env = options.env ?? process.env;
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: TvshipConfigInput): TvshipConfig {
    let raw: RawConfig = {};

    raw = this.deepMerge(raw, this.readYaml(join(this.globalDir, 'config.yaml'), 'global'));
    raw = this.deepMerge(raw, this.readYaml(join(this.projectDir, '.tvship.yaml'), 'project'));
    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, overrides);
    }

    const parsed = TvshipConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const details = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration: ${details}`, parsed.error);
    }

    this.config = parsed.data;
    return this.config;
  }

  /**
   * Get the loaded configuration
   */
  get(): TvshipConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getGlobalDir(): string {
    return this.globalDir;
  }

  getProjectDir(): string {
    return this.projectDir;
  }

  /**
   * Create default global config if it doesn't exist. Returns the path.
   */
  createDefaultConfig(): string {
    mkdirSync(this.globalDir, { recursive: true });
    const configPath = join(this.globalDir, 'config.yaml');
    if (!existsSync(configPath)) {
      const defaultConfig = `# tvship global configuration
# dataDir: ~/.tvship

logging:
  level: info

pairing:
  timeoutMs: 60000

packaging:
  command: ares-package
  args: ["{sourceDir}", "--outdir", "{outDir}"]

deploy:
  installRetryDelaysMs: [1000, 2000, 4000]
  healthGracePeriodMs: 10000
  recordHistory: true

logs:
  reconnectMaxDelayMs: 30000

device:
  securePorts: [3001]

discovery:
  timeoutMs: 3000
`;
      writeFileSync(configPath, defaultConfig, 'utf-8');
    }
    return configPath;
  }

  private readYaml(path: string, label: string): RawConfig {
    if (!existsSync(path)) return {};
    try {
      const parsed: unknown = parseYaml(readFileSync(path, 'utf-8'));
      return isRecord(parsed) ? parsed : {};
    } catch (err) {
      throw new ConfigError(`Failed to parse ${label} config at ${path}`, toError(err));
    }
  }

  private applyEnvVars(raw: RawConfig): RawConfig {
    const result: RawConfig = { ...raw };
    const section = (key: string): RawConfig => {
      const existing = result[key];
      const copy: RawConfig = isRecord(existing) ? { ...existing } : {};
      result[key] = copy;
      return copy;
    };

    if (this.env.TVSHIP_DATA_DIR) {
      result.dataDir = this.env.TVSHIP_DATA_DIR;
    }
    if (this.env.TVSHIP_LOG_LEVEL) {
      section('logging').level = this.env.TVSHIP_LOG_LEVEL;
    }
    if (this.env.TVSHIP_PACKAGE_COMMAND) {
      section('packaging').command = this.env.TVSHIP_PACKAGE_COMMAND;
    }
    if (this.env.TVSHIP_PAIRING_TIMEOUT_MS) {
      section('pairing').timeoutMs = Number(this.env.TVSHIP_PAIRING_TIMEOUT_MS);
    }

    return result;
  }

  private deepMerge(target: RawConfig, source: object): RawConfig {
    const result: RawConfig = { ...target };
    for (const [key, value] of Object.entries(source)) {
      const existing = result[key];
      if (isRecord(value) && isRecord(existing)) {
        result[key] = this.deepMerge(existing, value);
      } else if (value !== undefined) {
        result[key] = value;
      }
    }
    return result;
  }
}
