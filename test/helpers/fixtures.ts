/**
 * Temp directories and record builders shared by the unit tests.
 */

import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { Device, PairedDevice } from '../../src/registry/types.js';

export interface TempDir {
  path: string;
  cleanup: () => Promise<void>;
}

export async function tempDir(prefix = 'tvship-test-'): Promise<TempDir> {
  const path = await mkdtemp(join(tmpdir(), prefix));
  return { path, cleanup: () => rm(path, { recursive: true, force: true }) };
}

export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [name, content] of Object.entries(files)) {
    const full = join(root, name);
    await mkdir(dirname(full), { recursive: true });
    await writeFile(full, content);
  }
}

export function pairedDevice(overrides: Partial<PairedDevice> = {}): PairedDevice {
  return {
    alias: 'livingroom',
    host: '192.168.1.50',
    port: 9922,
    state: 'Paired',
    pairingToken: 'test-token',
    ...overrides,
  };
}

export interface UnpairedOverrides {
  alias?: string;
  host?: string;
  port?: number;
  state?: 'Unpaired' | 'Pairing' | 'Unreachable';
}

export function unpairedDevice(overrides: UnpairedOverrides = {}): Device {
  return {
    alias: overrides.alias ?? 'bedroom',
    host: overrides.host ?? '192.168.1.51',
    port: overrides.port ?? 9922,
    state: overrides.state ?? 'Unpaired',
  };
}

export const VALID_MANIFEST = {
  id: 'com.example.foo',
  version: '1.0.0',
  main: 'index.html',
  icon: 'icon.png',
  title: 'Foo',
};

export const APP_FILES = {
  'index.html': '<!doctype html><title>Foo</title>',
  'icon.png': 'not-really-a-png',
  'js/app.js': 'console.log("foo");',
};
