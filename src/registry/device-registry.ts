/**
 * DeviceRegistry — persisted alias → Device map.
 *
 * The file is the source of truth: reads parse it afresh, and every
 * mutation re-reads it under the write lock, changes one entry and writes
 * it back (temp file + rename). Entries written by another process in the
 * meantime are kept, and a failed write leaves the last known-good file.
 * The write lock is never held across network calls.
 */

import { EventEmitter } from 'node:events';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { AsyncMutex } from '../core/mutex.js';
import { ConfigError, DuplicateAliasError, NotFoundError, toError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { DeviceSchema, RegistryFileSchema, type Device, type RegistryFile } from './types.js';

export type DeviceUpdater = (current: Device) => Device;

interface Change<T> {
  /** Replacement entry, or null to delete it */
  next: Device | null;
  result: T;
}

export class DeviceRegistry extends EventEmitter {
  private writeLock = new AsyncMutex();
  private closed = false;

  constructor(private readonly filePath: string) {
    super();
  }

  get path(): string {
    return this.filePath;
  }

  // ─────────────────────────────────────────────────────────
  // CONTRACT
  // ─────────────────────────────────────────────────────────

  /**
   * Create or update a device. Creating an alias that already points at a
   * different host/port fails with DuplicateAliasError.
   */
  async upsert(device: Device): Promise<Device> {
    const next = this.validate(device);

    const created = await this.mutate(next.alias, (existing) => {
      if (existing && (existing.host !== next.host || existing.port !== next.port)) {
        throw new DuplicateAliasError(next.alias, { host: existing.host, port: existing.port });
      }
      return { next, result: !existing };
    });

    this.emit('registry:upserted', { alias: next.alias, state: next.state, created });
    return clone(next);
  }

  /**
   * Atomically read-modify-write one entry. The updater may not re-point
   * the alias at another host/port or rename it.
   */
  async update(alias: string, updater: DeviceUpdater): Promise<Device> {
    const updated = await this.mutate(alias, (existing) => {
      if (!existing) throw new NotFoundError(alias);

      const next = this.validate(updater(clone(existing)));
      if (next.alias !== alias) {
        throw new Error(`Device update may not rename "${alias}" to "${next.alias}"`);
      }
      if (next.host !== existing.host || next.port !== existing.port) {
        throw new DuplicateAliasError(alias, { host: existing.host, port: existing.port });
      }
      return { next, result: next };
    });

    this.emit('registry:updated', { alias, state: updated.state });
    return clone(updated);
  }

  async get(alias: string): Promise<Device> {
    const device = await this.find(alias);
    if (!device) throw new NotFoundError(alias);
    return device;
  }

  async find(alias: string): Promise<Device | undefined> {
    const devices = await this.load();
    return devices.get(alias);
  }

  async list(): Promise<Device[]> {
    const devices = await this.load();
    return [...devices.values()].sort((a, b) => a.alias.localeCompare(b.alias));
  }

  async remove(alias: string): Promise<Device> {
    const removed = await this.mutate(alias, (existing) => {
      if (!existing) throw new NotFoundError(alias);
      return { next: null, result: existing };
    });

    this.emit('registry:removed', { alias });
    return removed;
  }

  // ─────────────────────────────────────────────────────────
  // LIFECYCLE
  // ─────────────────────────────────────────────────────────

  /**
   * Wait for in-flight writes. Every mutation is already on disk once it resolves.
   */
  async flush(): Promise<void> {
    await this.writeLock.withLock(async () => undefined);
  }

  /**
   * Flush and refuse further access.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    await this.flush();
    this.closed = true;
  }

  // ─────────────────────────────────────────────────────────
  // INTERNAL
  // ─────────────────────────────────────────────────────────

  private validate(device: Device): Device {
    const parsed = DeviceSchema.safeParse(device);
    if (!parsed.success) {
      const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new Error(`Invalid device record: ${details}`);
    }
    return parsed.data;
  }

  private async load(): Promise<Map<string, Device>> {
    if (this.closed) throw new Error('Device registry is closed');
    return this.readFromDisk();
  }

  /**
   * Apply a single-entry change to the current file contents.
   */
  private async mutate<T>(alias: string, change: (existing: Device | undefined) => Change<T>): Promise<T> {
    return this.writeLock.withLock(async () => {
      const devices = await this.load();
      const { next, result } = change(devices.get(alias));
      if (next) {
        devices.set(alias, next);
      } else {
        devices.delete(alias);
      }
      await this.writeFileFrom(devices);
      return result;
    });
  }

  private async readFromDisk(): Promise<Map<string, Device>> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return new Map();
      throw err;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new ConfigError(`Device registry at ${this.filePath} is not valid JSON`, toError(err));
    }

    const parsed = RegistryFileSchema.safeParse(data);
    if (!parsed.success) {
      throw new ConfigError(`Device registry at ${this.filePath} is malformed`, parsed.error);
    }

    const devices = new Map<string, Device>();
    for (const [alias, device] of Object.entries(parsed.data.devices)) {
      if (device.alias !== alias) {
        throw new ConfigError(`Device registry entry "${alias}" carries alias "${device.alias}"`);
      }
      devices.set(alias, device);
    }

    getLogger().debug({ path: this.filePath, count: devices.size }, 'Device registry loaded');
    return devices;
  }

  private async writeFileFrom(devices: Map<string, Device>): Promise<void> {
    const file: RegistryFile = { version: 1, devices: Object.fromEntries(devices) };
    const tempPath = `${this.filePath}.${process.pid}.tmp`;

    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(tempPath, JSON.stringify(file, null, 2) + '\n', { encoding: 'utf-8', mode: 0o600 });
    await rename(tempPath, this.filePath);
  }
}

function clone(device: Device): Device {
  return { ...device };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
