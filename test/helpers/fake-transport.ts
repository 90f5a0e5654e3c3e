/**
 * Scripted in-process DeviceTransport for component tests.
 *
 * Each operation pops the next scripted result (a value, or an Error to
 * throw) and falls back to a default once the script runs out.
 */

import { CancelledError, DeviceConnectionError } from '../../src/core/errors.js';
import type {
  AppStatus,
  DeviceEndpoint,
  DeviceTarget,
  DeviceTransport,
  InstallOutcome,
  InstallRequest,
  LaunchOutcome,
  LogConnection,
  LogLine,
  PairingChallenge,
  PairingOutcome,
  ProbeInfo,
} from '../../src/device/types.js';
import { fromCallback } from '../../src/utils/stream.js';

type Scripted<T> = T | Error;

function next<T>(script: Array<Scripted<T>>, fallback: T): T {
  const step = script.length > 0 ? script.splice(0, 1)[0] : fallback;
  if (step instanceof Error) throw step;
  return step ?? fallback;
}

export function connectionLost(message = 'socket hang up'): DeviceConnectionError {
  return new DeviceConnectionError(message);
}

// ── Pairing ──────────────────────────────────────────────────

export interface ChallengeScript {
  /** 'never' keeps the challenge pending until aborted */
  outcome: PairingOutcome | Error | 'never';
  delayMs?: number;
  requiresConfirmation?: boolean;
}

export class FakeChallenge implements PairingChallenge {
  readonly prompt = 'Accept the connection request on the TV';
  readonly requiresConfirmation: boolean;
  cancelled = false;

  constructor(private readonly script: ChallengeScript) {
    this.requiresConfirmation = script.requiresConfirmation ?? true;
  }

  wait(signal: AbortSignal): Promise<PairingOutcome> {
    const { outcome, delayMs = 0 } = this.script;
    return new Promise<PairingOutcome>((resolve, reject) => {
      if (signal.aborted) {
        reject(new CancelledError('pairing'));
        return;
      }
      let timer: NodeJS.Timeout | undefined;
      const onAbort = (): void => {
        clearTimeout(timer);
        reject(new CancelledError('pairing'));
      };
      signal.addEventListener('abort', onAbort, { once: true });
      if (outcome === 'never') return;
      timer = setTimeout(() => {
        signal.removeEventListener('abort', onAbort);
        if (outcome instanceof Error) reject(outcome);
        else resolve(outcome);
      }, delayMs);
    });
  }

  cancel(): void {
    this.cancelled = true;
  }
}

// ── Logs ─────────────────────────────────────────────────────

export interface LogScript {
  lines: LogLine[];
  /** What happens after the lines: drop (transient error), end, or stay open */
  then: 'drop' | 'end' | 'hold';
}

export class FakeLogConnection implements LogConnection {
  closed = false;
  private readonly stream = fromCallback<LogLine>(() => this.close());

  constructor(script: LogScript) {
    for (const line of script.lines) this.stream.push(line);
    if (script.then === 'drop') this.stream.error(connectionLost('log stream dropped'));
    if (script.then === 'end') this.stream.done();
  }

  push(line: LogLine): void {
    this.stream.push(line);
  }

  drop(): void {
    this.stream.error(connectionLost('log stream dropped'));
  }

  close(): void {
    this.closed = true;
    this.stream.done();
  }

  [Symbol.asyncIterator](): AsyncIterator<LogLine> {
    return this.stream.iterable[Symbol.asyncIterator]();
  }
}

export function logLine(seq: number, text: string, level: LogLine['level'] = 'info'): LogLine {
  return { seq, timestamp: `2026-01-01T00:00:${String(seq % 60).padStart(2, '0')}.000Z`, level, text };
}

// ── Transport ────────────────────────────────────────────────

export class FakeDeviceTransport implements DeviceTransport {
  probeScript: Array<Scripted<ProbeInfo>> = [];
  challengeScript: Array<Scripted<ChallengeScript>> = [];
  installScript: Array<Scripted<InstallOutcome>> = [];
  launchScript: Array<Scripted<LaunchOutcome>> = [];
  statusScript: Array<Scripted<AppStatus>> = [];
  logScript: Array<Scripted<LogScript>> = [];

  defaultProbe: ProbeInfo = { pairingSupported: true, modelName: 'TestTV 55' };
  defaultChallenge: ChallengeScript = { outcome: { status: 'accepted', token: 'test-token' } };
  defaultStatus: AppStatus = 'running';

  readonly calls = { probe: 0, requestPairing: 0, install: 0, launch: 0, appStatus: 0, openLogStream: 0 };
  readonly previousTokens: Array<string | undefined> = [];
  readonly installTargets: DeviceTarget[] = [];
  readonly installRequests: InstallRequest[] = [];
  readonly logCursors: Array<number | undefined> = [];
  readonly challenges: FakeChallenge[] = [];
  readonly connections: FakeLogConnection[] = [];

  async probe(_endpoint: DeviceEndpoint): Promise<ProbeInfo> {
    this.calls.probe++;
    return next(this.probeScript, this.defaultProbe);
  }

  async requestPairing(
    _endpoint: DeviceEndpoint,
    options: { previousToken?: string; signal?: AbortSignal } = {},
  ): Promise<PairingChallenge> {
    this.calls.requestPairing++;
    this.previousTokens.push(options.previousToken);
    const challenge = new FakeChallenge(next(this.challengeScript, this.defaultChallenge));
    this.challenges.push(challenge);
    return challenge;
  }

  async install(target: DeviceTarget, request: InstallRequest): Promise<InstallOutcome> {
    this.calls.install++;
    this.installTargets.push(target);
    this.installRequests.push(request);
    return next(this.installScript, { ok: true });
  }

  async launch(_target: DeviceTarget, _appId: string): Promise<LaunchOutcome> {
    this.calls.launch++;
    return next(this.launchScript, { started: true });
  }

  async appStatus(_target: DeviceTarget, _appId: string): Promise<AppStatus> {
    this.calls.appStatus++;
    return next(this.statusScript, this.defaultStatus);
  }

  async openLogStream(
    _target: DeviceTarget,
    options: { cursor?: number; signal?: AbortSignal } = {},
  ): Promise<LogConnection> {
    this.calls.openLogStream++;
    this.logCursors.push(options.cursor);
    const connection = new FakeLogConnection(next(this.logScript, { lines: [], then: 'hold' }));
    this.connections.push(connection);
    return connection;
  }
}
