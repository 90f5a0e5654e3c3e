/**
 * LogRelay — long-lived, filtered log subscriptions to paired devices.
 *
 * A LogSession connects lazily when first iterated and reconnects with
 * capped exponential backoff whenever the device drops the stream, until
 * the session is cancelled. The cursor (highest sequence number seen) is
 * handed to the device on reconnect and lines at or below it are
 * suppressed as duplicates.
 */

import { EventEmitter } from 'node:events';
import { CancelledError, DeviceNotPairedError, isTransient, toError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import type { DeviceTarget, DeviceTransport, LogConnection, LogLine } from '../device/types.js';
import type { DeviceRegistry } from '../registry/device-registry.js';
import { isPaired } from '../registry/types.js';
import { linkedController } from '../utils/abort.js';
import { backoffDelay, sleep } from '../utils/retry.js';
import { acceptAll, type LogFilter } from './filter.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface LogRelayConfig {
  reconnectBaseDelayMs: number;
  /** Upper bound of the reconnect interval */
  reconnectMaxDelayMs: number;
}

export interface LogRelayDeps {
  registry: DeviceRegistry;
  transport: DeviceTransport;
  config: LogRelayConfig;
}

export interface OpenLogsOptions {
  /** Resume after this sequence number */
  cursor?: number;
  signal?: AbortSignal;
}

export interface LogSessionStats {
  delivered: number;
  filtered: number;
  duplicates: number;
  reconnects: number;
}

// ═══════════════════════════════════════════════════════════════
// SESSION
// ═══════════════════════════════════════════════════════════════

export class LogSession extends EventEmitter implements AsyncIterable<LogLine> {
  private readonly controller: AbortController;
  private readonly detach: () => void;
  private connection: LogConnection | undefined;
  private consumed = false;
  private lastSeq: number | undefined;
  private readonly counters: LogSessionStats = { delivered: 0, filtered: 0, duplicates: 0, reconnects: 0 };

  constructor(
    readonly alias: string,
    private readonly filter: LogFilter,
    private readonly deps: LogRelayDeps,
    options: OpenLogsOptions,
  ) {
    super();
    this.lastSeq = options.cursor;
    const { controller, dispose } = linkedController(options.signal);
    this.controller = controller;
    this.detach = dispose;
    // Release a connection that is still waiting for lines
    controller.signal.addEventListener('abort', () => this.connection?.close(), { once: true });
  }

  /** Highest sequence number received so far */
  get cursor(): number | undefined {
    return this.lastSeq;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  get stats(): LogSessionStats {
    return { ...this.counters };
  }

  /**
   * Stop delivery and release the device connection. Idempotent.
   */
  cancel(): void {
    if (this.controller.signal.aborted) return;
    this.controller.abort(new CancelledError('logs', this.alias));
    this.detach();
    this.emit('logs:session:cancelled', { timestamp: Date.now(), alias: this.alias, cursor: this.lastSeq });
  }

  [Symbol.asyncIterator](): AsyncIterator<LogLine> {
    if (this.consumed) {
      throw new Error(`Log session for "${this.alias}" is already being consumed; open a new one`);
    }
    this.consumed = true;
    return this.lines();
  }

  // ─────────────────────────────────────────────────────────
  // INTERNAL
  // ─────────────────────────────────────────────────────────

  private async *lines(): AsyncGenerator<LogLine> {
    const signal = this.controller.signal;
    const logger = getLogger();
    let failures = 0;

    try {
      while (!signal.aborted) {
        let connection: LogConnection;
        try {
          connection = await this.deps.transport.openLogStream(await this.target(), { cursor: this.lastSeq, signal });
        } catch (err) {
          if (signal.aborted) return;
          if (!isTransient(err)) throw err;
          failures++;
          if (!(await this.backoff(failures, err.message))) return;
          continue;
        }

        this.connection = connection;
        if (signal.aborted) {
          connection.close();
          return;
        }
        failures = 0;
        this.emit('logs:session:connected', { timestamp: Date.now(), alias: this.alias, cursor: this.lastSeq });
        logger.debug({ alias: this.alias, cursor: this.lastSeq }, 'Log stream connected');

        let dropReason = 'stream ended';
        try {
          for await (const line of connection) {
            if (signal.aborted) return;
            if (this.lastSeq !== undefined && line.seq <= this.lastSeq) {
              this.counters.duplicates++;
              continue;
            }
            this.lastSeq = line.seq;
            if (!this.filter(line)) {
              this.counters.filtered++;
              continue;
            }
            this.counters.delivered++;
            yield line;
            if (signal.aborted) return;
          }
        } catch (err) {
          if (signal.aborted) return;
          if (!isTransient(err)) throw err;
          dropReason = err.message;
        } finally {
          connection.close();
          this.connection = undefined;
        }

        if (signal.aborted) return;
        failures++;
        if (!(await this.backoff(failures, dropReason))) return;
      }
    } finally {
      this.detach();
      this.emit('logs:session:closed', { timestamp: Date.now(), alias: this.alias, cursor: this.lastSeq });
    }
  }

  /**
   * Re-read the registry on every connect so a rotated token is picked up.
   */
  private async target(): Promise<DeviceTarget> {
    const device = await this.deps.registry.get(this.alias);
    if (!isPaired(device)) {
      throw new DeviceNotPairedError(this.alias, device.state, 'logs');
    }
    return { alias: device.alias, host: device.host, port: device.port, pairingToken: device.pairingToken };
  }

  /**
   * Wait before the next reconnect. Resolves false when cancelled meanwhile.
   */
  private async backoff(failures: number, reason: string): Promise<boolean> {
    const delay = backoffDelay(failures - 1, {
      baseDelay: this.deps.config.reconnectBaseDelayMs,
      backoffFactor: 2,
      maxDelay: this.deps.config.reconnectMaxDelayMs,
    });
    this.counters.reconnects++;
    this.emit('logs:session:reconnecting', { timestamp: Date.now(), alias: this.alias, attempt: failures, delay, reason });
    getLogger().info({ alias: this.alias, attempt: failures, delay, reason }, 'Log stream dropped; reconnecting');

    try {
      await sleep(delay, this.controller.signal);
      return true;
    } catch (err) {
      if (err instanceof CancelledError) return false;
      throw toError(err);
    }
  }
}

// ═══════════════════════════════════════════════════════════════
// RELAY
// ═══════════════════════════════════════════════════════════════

export class LogRelay extends EventEmitter {
  constructor(private readonly deps: LogRelayDeps) {
    super();
  }

  /**
   * Open a log session for a paired device. The device is checked now; the
   * connection is made when the session is first iterated.
   */
  async openLogs(alias: string, filter: LogFilter = acceptAll, options: OpenLogsOptions = {}): Promise<LogSession> {
    if (options.signal?.aborted) throw new CancelledError('logs', alias);

    const device = await this.deps.registry.get(alias);
    if (!isPaired(device)) {
      throw new DeviceNotPairedError(alias, device.state, 'logs');
    }

    const session = new LogSession(alias, filter, this.deps, options);
    this.emit('logs:session:opened', { timestamp: Date.now(), alias, cursor: options.cursor });
    return session;
  }
}
