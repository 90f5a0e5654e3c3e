/**
 * PairingManager — establishes trust with a TV over the local network.
 *
 * probe (retried) → request challenge → operator confirms on the device →
 * token stored as a Paired registry entry. Nothing is written to the
 * registry until the device has issued a token, so a timed-out, rejected or
 * cancelled pairing leaves the registry exactly as it was.
 */

import { EventEmitter } from 'node:events';
import { z } from 'zod';
import {
  DuplicateAliasError,
  NetworkUnreachableError,
  PairingRejectedError,
  PairingTimeoutError,
  isTransient,
} from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import type { KeyedMutex } from '../core/mutex.js';
import type { DeviceTransport, PairingChallenge, PairingOutcome, ProbeInfo } from '../device/types.js';
import type { DeviceRegistry } from '../registry/device-registry.js';
import { isPaired, type PairedDevice } from '../registry/types.js';
import { withDeadline } from '../utils/abort.js';
import { retry } from '../utils/retry.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface PairingConfig {
  /** How long the operator has to confirm on the device (ms) */
  timeoutMs: number;
  /** Total probe attempts, first one included */
  probeAttempts: number;
  probeBaseDelayMs: number;
}

export interface PairingManagerDeps {
  registry: DeviceRegistry;
  transport: DeviceTransport;
  /** Shared with the deployment orchestrator: one in-flight pair/deploy per alias */
  locks: KeyedMutex;
  config: PairingConfig;
}

export interface PairOptions {
  /** Overrides `config.timeoutMs` for this call */
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Called once the device is waiting for the operator */
  onChallenge?: (challenge: PairingChallenge) => void;
}

const PairRequestSchema = z.object({
  host: z.string().trim().min(1, 'host is required'),
  port: z.number().int().min(1).max(65535),
  alias: z.string().min(1).max(64),
});

// ═══════════════════════════════════════════════════════════════
// PAIRING MANAGER
// ═══════════════════════════════════════════════════════════════

export class PairingManager extends EventEmitter {
  private readonly registry: DeviceRegistry;
  private readonly transport: DeviceTransport;
  private readonly locks: KeyedMutex;
  private readonly config: PairingConfig;

  constructor(deps: PairingManagerDeps) {
    super();
    this.registry = deps.registry;
    this.transport = deps.transport;
    this.locks = deps.locks;
    this.config = deps.config;
  }

  /**
   * Pair with the device at host:port and register it under `alias`.
   * Re-pairing an alias already bound to the same endpoint rotates its token.
   */
  async pair(host: string, port: number, alias: string, options: PairOptions = {}): Promise<PairedDevice> {
    const request = PairRequestSchema.safeParse({ host, port, alias });
    if (!request.success) {
      const details = request.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new Error(`Invalid pairing request: ${details}`);
    }

    const { signal } = options;
    const endpoint = { host: request.data.host, port };
    const timeoutMs = options.timeoutMs ?? this.config.timeoutMs;
    const logger = getLogger();

    return this.locks.withLock(
      alias,
      async () => {
        const existing = await this.registry.find(alias);
        if (existing && (existing.host !== endpoint.host || existing.port !== endpoint.port)) {
          throw new DuplicateAliasError(alias, { host: existing.host, port: existing.port });
        }

        this.emit('pairing:started', { timestamp: Date.now(), alias, host: endpoint.host, port });
        logger.info({ alias, host: endpoint.host, port }, 'Pairing started');

        const probe = await this.probe(alias, endpoint, signal);
        if (!probe.pairingSupported) {
          throw new NetworkUnreachableError(endpoint.host, port, {
            alias,
            diagnostic: 'endpoint does not offer pairing',
          });
        }

        const previousToken = existing && isPaired(existing) ? existing.pairingToken : undefined;
        let challenge: PairingChallenge;
        try {
          challenge = await this.transport.requestPairing(endpoint, { previousToken, signal });
        } catch (err) {
          if (isTransient(err)) {
            throw new NetworkUnreachableError(endpoint.host, port, { alias, diagnostic: err.message, cause: err });
          }
          throw err;
        }

        const outcome = await this.awaitConfirmation(alias, endpoint, challenge, timeoutMs, options);

        if (outcome.status === 'rejected') {
          this.emit('pairing:rejected', { timestamp: Date.now(), alias, reason: outcome.reason });
          logger.warn({ alias, reason: outcome.reason }, 'Pairing rejected by device');
          throw new PairingRejectedError(alias, outcome.reason);
        }

        const now = new Date().toISOString();
        const device: PairedDevice = {
          alias,
          host: endpoint.host,
          port,
          modelName: probe.modelName ?? existing?.modelName,
          firmware: probe.firmware ?? existing?.firmware,
          pairedAt: now,
          lastSeenAt: now,
          state: 'Paired',
          pairingToken: outcome.token,
        };
        await this.registry.upsert(device);

        const rotated = previousToken !== undefined && previousToken !== outcome.token;
        this.emit('pairing:paired', { timestamp: Date.now(), alias, rotated });
        logger.info({ alias, rotated, modelName: device.modelName, firmware: device.firmware }, 'Device paired');
        return device;
      },
      signal,
    );
  }

  // ─────────────────────────────────────────────────────────
  // INTERNAL
  // ─────────────────────────────────────────────────────────

  private async probe(
    alias: string,
    endpoint: { host: string; port: number },
    signal: AbortSignal | undefined,
  ): Promise<ProbeInfo> {
    try {
      return await retry(() => this.transport.probe(endpoint, signal), {
        maxRetries: this.config.probeAttempts - 1,
        baseDelay: this.config.probeBaseDelayMs,
        backoffFactor: 2,
        shouldRetry: (err) => isTransient(err),
        onRetry: (attempt, err, delay) => {
          this.emit('pairing:probe:retry', { timestamp: Date.now(), alias, attempt, delay, error: err.message });
        },
        signal,
      });
    } catch (err) {
      if (isTransient(err)) {
        throw new NetworkUnreachableError(endpoint.host, endpoint.port, {
          alias,
          diagnostic: err.message,
          cause: err,
        });
      }
      throw err;
    }
  }

  private async awaitConfirmation(
    alias: string,
    endpoint: { host: string; port: number },
    challenge: PairingChallenge,
    timeoutMs: number,
    options: PairOptions,
  ): Promise<PairingOutcome> {
    try {
      this.emit('pairing:challenge', {
        timestamp: Date.now(),
        alias,
        prompt: challenge.prompt,
        requiresConfirmation: challenge.requiresConfirmation,
      });
      if (challenge.requiresConfirmation) {
        getLogger().info({ alias, timeoutMs }, 'Waiting for confirmation on the device');
      }
      options.onChallenge?.(challenge);

      return await withDeadline(timeoutMs, options.signal, async (signal, timedOut) => {
        try {
          return await challenge.wait(signal);
        } catch (err) {
          if (timedOut()) throw new PairingTimeoutError(alias, timeoutMs);
          if (isTransient(err)) {
            throw new NetworkUnreachableError(endpoint.host, endpoint.port, {
              alias,
              diagnostic: err.message,
              cause: err,
            });
          }
          throw err;
        }
      });
    } finally {
      challenge.cancel();
    }
  }
}
