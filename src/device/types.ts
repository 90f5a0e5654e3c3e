/**
 * Device transport contract.
 *
 * Everything the pipeline needs from a TV goes through this interface so
 * the pairing, deployment and log components can run against an in-process
 * substitute. Implementations throw `DeviceConnectionError` for connectivity
 * problems (refused, closed, timed out); every other outcome is reported in
 * the return value.
 */

export interface DeviceEndpoint {
  host: string;
  port: number;
}

/** Endpoint plus the credential issued during pairing */
export interface DeviceTarget extends DeviceEndpoint {
  alias: string;
  pairingToken: string;
}

export interface ProbeInfo {
  /** The endpoint speaks the pairing protocol */
  pairingSupported: boolean;
  modelName?: string;
  firmware?: string;
}

export type PairingOutcome =
  | { status: 'accepted'; token: string }
  | { status: 'rejected'; reason: string };

export interface PairingChallenge {
  /** Message to show the operator while the device waits for confirmation */
  readonly prompt: string;
  /** False when the device accepted immediately (e.g. a previous token was honoured) */
  readonly requiresConfirmation: boolean;
  /** Settles once the device accepts or denies; rejects when `signal` aborts */
  wait(signal: AbortSignal): Promise<PairingOutcome>;
  /** Release the underlying connection */
  cancel(): void;
}

export interface InstallRequest {
  packageId: string;
  version: string;
  path: string;
  checksum: string;
  size: number;
}

export type InstallOutcome = { ok: true } | { ok: false; reason: string };

export type LaunchOutcome = { started: true } | { started: false; reason: string };

export type AppStatus = 'running' | 'starting' | 'stopped' | 'unknown';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogLine {
  /** Monotonic per device; used as the resume cursor */
  seq: number;
  timestamp: string;
  level: LogLevel;
  source?: string;
  text: string;
}

/**
 * A live log channel. Iteration ends when `close()` is called and throws
 * `DeviceConnectionError` when the device drops the connection.
 */
export interface LogConnection extends AsyncIterable<LogLine> {
  close(): void;
}

export interface DeviceTransport {
  probe(endpoint: DeviceEndpoint, signal?: AbortSignal): Promise<ProbeInfo>;
  requestPairing(
    endpoint: DeviceEndpoint,
    options?: { previousToken?: string; signal?: AbortSignal },
  ): Promise<PairingChallenge>;
  install(target: DeviceTarget, request: InstallRequest, signal?: AbortSignal): Promise<InstallOutcome>;
  launch(target: DeviceTarget, appId: string, signal?: AbortSignal): Promise<LaunchOutcome>;
  appStatus(target: DeviceTarget, appId: string, signal?: AbortSignal): Promise<AppStatus>;
  openLogStream(
    target: DeviceTarget,
    options?: { cursor?: number; signal?: AbortSignal },
  ): Promise<LogConnection>;
}
