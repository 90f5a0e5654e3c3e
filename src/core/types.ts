import { z } from 'zod';
import { homedir } from 'os';
import { join } from 'path';

// ===== Configuration =====

export const DEFAULT_DATA_DIR = join(homedir(), '.tvship');

export const TvshipConfigSchema = z.object({
  dataDir: z.string().min(1).default(DEFAULT_DATA_DIR),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('debug'),
    pretty: z.boolean().default(false),
  }).default({}),
  pairing: z.object({
    timeoutMs: z.number().int().positive().default(60_000),
    probeAttempts: z.number().int().min(1).max(10).default(3),
    probeBaseDelayMs: z.number().int().nonnegative().default(500),
  }).default({}),
  packaging: z.object({
    command: z.string().min(1).default('ares-package'),
    /** `{sourceDir}`, `{manifest}` and `{outDir}` are substituted per run */
    args: z.array(z.string()).default(['{sourceDir}', '--outdir', '{outDir}']),
    timeoutMs: z.number().int().positive().default(120_000),
    cache: z.boolean().default(true),
  }).default({}),
  deploy: z.object({
    installRetryDelaysMs: z.array(z.number().int().nonnegative()).default([1000, 2000, 4000]),
    healthGracePeriodMs: z.number().int().positive().default(10_000),
    healthPollIntervalMs: z.number().int().positive().default(500),
    recordHistory: z.boolean().default(true),
  }).default({}),
  logs: z.object({
    reconnectBaseDelayMs: z.number().int().positive().default(500),
    reconnectMaxDelayMs: z.number().int().positive().default(30_000),
  }).default({}),
  device: z.object({
    requestTimeoutMs: z.number().int().positive().default(10_000),
    /** Ports reached over wss:// with the TV's self-signed certificate */
    securePorts: z.array(z.number().int().min(1).max(65535)).default([3001]),
  }).default({}),
  discovery: z.object({
    /** SSDP search target; webOS TVs answer the second-screen service */
    searchTarget: z.string().min(1).default('urn:lge-com:service:webos-second-screen:1'),
    timeoutMs: z.number().int().positive().default(3_000),
  }).default({}),
});

export type TvshipConfig = z.infer<typeof TvshipConfigSchema>;

/** Deep-partial shape accepted from YAML files, env vars and overrides */
export type TvshipConfigInput = z.input<typeof TvshipConfigSchema>;
