/**
 * Deployer — Deployment Orchestrator
 *
 * One deploy call runs the state machine
 *   Pending → Installing → Launching → Running
 * with any state able to drop to Failed. Install is the only retried stage
 * (connectivity failures, on the configured 1s/2s/4s schedule); launch is
 * never retried and the health probe waits a bounded grace period. The
 * outcome is reported in the returned Deployment rather than thrown.
 */

import { EventEmitter } from 'node:events';
import { nanoid } from 'nanoid';
import {
  ChecksumMismatchError,
  DeviceNotPairedError,
  InstallFailedError,
  LaunchFailedError,
  LaunchTimeoutError,
  NotFoundError,
  TvshipError,
  isTransient,
  toError,
  type Stage,
} from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import type { KeyedMutex } from '../core/mutex.js';
import type { AppStatus, DeviceTarget, DeviceTransport, InstallOutcome, LaunchOutcome } from '../device/types.js';
import type { DeviceRegistry } from '../registry/device-registry.js';
import { isPaired, toUnreachable } from '../registry/types.js';
import { withDeadline } from '../utils/abort.js';
import { sha256File } from '../utils/crypto.js';
import { retry, sleep } from '../utils/retry.js';
import { isMissing } from './artifact.js';
import type { DeploymentHistory } from './history.js';
import type { Artifact, Deployment, DeploymentStatus } from './types.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface DeployerConfig {
  /** Delay before each install retry; its length is the retry count */
  installRetryDelaysMs: readonly number[];
  healthGracePeriodMs: number;
  healthPollIntervalMs: number;
}

export interface DeployerDeps {
  registry: DeviceRegistry;
  transport: DeviceTransport;
  /** Shared with the pairing manager: one in-flight pair/deploy per alias */
  locks: KeyedMutex;
  config: DeployerConfig;
  /** Finished deployments are appended here when given */
  history?: DeploymentHistory;
}

const STAGE_OF: Record<DeploymentStatus, Stage> = {
  Pending: 'verify',
  Installing: 'install',
  Launching: 'launch',
  Running: 'health',
  Failed: 'health',
};

// ═══════════════════════════════════════════════════════════════
// DEPLOYER
// ═══════════════════════════════════════════════════════════════

export class Deployer extends EventEmitter {
  private readonly registry: DeviceRegistry;
  private readonly transport: DeviceTransport;
  private readonly locks: KeyedMutex;
  private readonly config: DeployerConfig;
  private readonly history?: DeploymentHistory;

  constructor(deps: DeployerDeps) {
    super();
    this.registry = deps.registry;
    this.transport = deps.transport;
    this.locks = deps.locks;
    this.config = deps.config;
    this.history = deps.history;
  }

  // ─────────────────────────────────────────────────────────
  // CORE OPERATIONS
  // ─────────────────────────────────────────────────────────

  /**
   * Install, launch and health-check `artifact` on the device registered as
   * `alias`. Always resolves; a failure is a Deployment with status Failed.
   */
  async deploy(alias: string, artifact: Artifact, options: { signal?: AbortSignal } = {}): Promise<Deployment> {
    const { signal } = options;
    const startedAt = new Date();
    const deployment: Deployment = {
      id: `dep_${nanoid(10)}`,
      alias,
      artifact,
      status: 'Pending',
      attempts: 0,
      transitions: [{ status: 'Pending', at: startedAt.toISOString() }],
      startedAt: startedAt.toISOString(),
    };

    this.emit('deploy:pipeline:start', {
      timestamp: Date.now(),
      deploymentId: deployment.id,
      alias,
      packageId: artifact.packageId,
      version: artifact.version,
    });

    try {
      await this.locks.withLock(alias, () => this.run(deployment, signal), signal);
    } catch (err) {
      this.fail(deployment, toError(err));
    }

    const finishedAt = new Date();
    deployment.finishedAt = finishedAt.toISOString();
    deployment.durationMs = finishedAt.getTime() - startedAt.getTime();

    if (deployment.status === 'Running') {
      this.emit('deploy:pipeline:complete', { timestamp: Date.now(), deploymentId: deployment.id, deployment });
    } else {
      this.emit('deploy:pipeline:failed', {
        timestamp: Date.now(),
        deploymentId: deployment.id,
        reason: deployment.reason,
        error: deployment.error,
      });
    }

    await this.record(deployment);
    return deployment;
  }

  // ─────────────────────────────────────────────────────────
  // STAGES
  // ─────────────────────────────────────────────────────────

  private async run(deployment: Deployment, signal?: AbortSignal): Promise<void> {
    const { alias, artifact } = deployment;
    const logger = getLogger();

    const device = await this.registry.get(alias);
    if (!isPaired(device)) {
      throw new DeviceNotPairedError(alias, device.state);
    }
    await this.verifyChecksum(artifact);

    const target: DeviceTarget = {
      alias,
      host: device.host,
      port: device.port,
      pairingToken: device.pairingToken,
    };

    this.transition(deployment, 'Installing');
    await this.install(deployment, target, signal);

    this.transition(deployment, 'Launching');
    await this.launch(target, artifact.packageId, signal);
    await this.awaitRunning(target, artifact.packageId, signal);

    this.transition(deployment, 'Running');
    logger.info({ alias, packageId: artifact.packageId, version: artifact.version }, 'App running on device');
    await this.touch(alias);
  }

  private async verifyChecksum(artifact: Artifact): Promise<void> {
    let actual: string;
    try {
      actual = await sha256File(artifact.path);
    } catch (err) {
      if (isMissing(err)) throw new NotFoundError(artifact.path, 'verify');
      throw err;
    }
    if (actual !== artifact.checksum) {
      throw new ChecksumMismatchError(artifact.path, artifact.checksum, actual);
    }
  }

  /**
   * Connectivity failures are retried; an on-device rejection is final and
   * leaves the device Paired. Exhausted retries mark it Unreachable.
   */
  private async install(deployment: Deployment, target: DeviceTarget, signal?: AbortSignal): Promise<void> {
    const { artifact } = deployment;
    const request = {
      packageId: artifact.packageId,
      version: artifact.version,
      path: artifact.path,
      checksum: artifact.checksum,
      size: artifact.size,
    };

    let outcome: InstallOutcome;
    try {
      outcome = await retry(
        (attempt) => {
          deployment.attempts = attempt;
          return this.transport.install(target, request, signal);
        },
        {
          delays: this.config.installRetryDelaysMs,
          jitter: 0,
          shouldRetry: (err) => isTransient(err),
          onRetry: (attempt, err, delay) => {
            getLogger().warn({ alias: target.alias, attempt, delay, error: err.message }, 'Install attempt failed; retrying');
            this.emit('deploy:install:retry', { timestamp: Date.now(), deploymentId: deployment.id, attempt, delay });
          },
          signal,
        },
      );
    } catch (err) {
      if (err instanceof TvshipError) throw err;
      const error = toError(err);
      if (isTransient(error)) {
        await this.markUnreachable(target.alias);
        throw new InstallFailedError(target.alias, deployment.attempts, true, error.message, error);
      }
      throw new InstallFailedError(target.alias, deployment.attempts, false, error.message, error);
    }

    if (!outcome.ok) {
      throw new InstallFailedError(target.alias, deployment.attempts, false, outcome.reason);
    }
  }

  private async launch(target: DeviceTarget, appId: string, signal?: AbortSignal): Promise<void> {
    let outcome: LaunchOutcome;
    try {
      outcome = await this.transport.launch(target, appId, signal);
    } catch (err) {
      if (err instanceof TvshipError) throw err;
      const error = toError(err);
      throw new LaunchFailedError(target.alias, error.message, error);
    }
    if (!outcome.started) {
      throw new LaunchFailedError(target.alias, outcome.reason);
    }
  }

  /**
   * Poll the app status until it reports running or the grace period ends.
   */
  private async awaitRunning(target: DeviceTarget, appId: string, signal?: AbortSignal): Promise<void> {
    const { healthGracePeriodMs, healthPollIntervalMs } = this.config;

    await withDeadline(healthGracePeriodMs, signal, async (deadline, timedOut) => {
      try {
        for (;;) {
          const status = await this.pollStatus(target, appId, deadline);
          if (status === 'running') return;
          await sleep(healthPollIntervalMs, deadline);
        }
      } catch (err) {
        if (timedOut()) throw new LaunchTimeoutError(target.alias, healthGracePeriodMs);
        throw err;
      }
    });
  }

  private async pollStatus(target: DeviceTarget, appId: string, signal: AbortSignal): Promise<AppStatus> {
    try {
      return await this.transport.appStatus(target, appId, signal);
    } catch (err) {
      if (!isTransient(err)) throw err;
      getLogger().debug({ alias: target.alias, error: err.message }, 'Health probe failed; polling again');
      return 'unknown';
    }
  }

  // ─────────────────────────────────────────────────────────
  // INTERNAL
  // ─────────────────────────────────────────────────────────

  private transition(deployment: Deployment, status: DeploymentStatus): void {
    deployment.status = status;
    deployment.transitions.push({ status, at: new Date().toISOString() });
    getLogger().debug({ deploymentId: deployment.id, alias: deployment.alias, status }, 'Deployment stage');
    this.emit('deploy:stage', { timestamp: Date.now(), deploymentId: deployment.id, status });
  }

  private fail(deployment: Deployment, error: Error): void {
    const stage = error instanceof TvshipError && error.stage ? error.stage : STAGE_OF[deployment.status];
    deployment.reason = error instanceof TvshipError ? error.code : 'Unexpected';
    deployment.error = error.message;
    deployment.stage = stage;
    if (error instanceof TvshipError && error.diagnostic) {
      deployment.diagnostic = error.diagnostic;
    }
    this.transition(deployment, 'Failed');
    getLogger().warn(
      { deploymentId: deployment.id, alias: deployment.alias, reason: deployment.reason, stage },
      `Deployment failed: ${error.message}`,
    );
  }

  private async markUnreachable(alias: string): Promise<void> {
    try {
      await this.registry.update(alias, (device) => toUnreachable(device));
    } catch (err) {
      getLogger().error({ alias, error: toError(err).message }, 'Could not mark device unreachable');
      return;
    }
    getLogger().warn({ alias }, 'Device marked unreachable; pair it again once it is back online');
    this.emit('deploy:device:unreachable', { timestamp: Date.now(), alias });
  }

  private async touch(alias: string): Promise<void> {
    const now = new Date().toISOString();
    try {
      await this.registry.update(alias, (device) => (isPaired(device) ? { ...device, lastSeenAt: now } : device));
    } catch (err) {
      getLogger().warn({ alias, error: toError(err).message }, 'Could not record last-seen time');
    }
  }

  private async record(deployment: Deployment): Promise<void> {
    if (!this.history) return;
    try {
      await this.history.append(deployment);
    } catch (err) {
      getLogger().error(
        { deploymentId: deployment.id, path: this.history.path, error: toError(err).message },
        'Could not record deployment history',
      );
    }
  }
}
