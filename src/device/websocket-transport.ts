/**
 * WebSocketTransport — DeviceTransport over the TV's local WebSocket API.
 *
 * Speaks JSON messages on `ws://host:port` (`wss://` on the secure ports,
 * default 3001, where TVs present a self-signed certificate) with the
 * `lgtv2` sub-protocol:
 * `{type, id, uri?, payload?}` out, `{type: registered|response|error, id,
 * payload?, error?}` back. Pairing is a `register` exchange: the device
 * answers `response` + `pairingType: PROMPT` while its confirmation dialog is
 * shown, then `registered` with a `client-key` (the pairing token) or `error`
 * when the viewer declines. Every later operation opens a fresh socket and
 * re-registers with the stored key before issuing `ssap://` requests.
 */

import WebSocket from 'ws';
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { CancelledError, DeviceConnectionError, DeviceNotPairedError, isTransient, type Stage } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { fromCallback } from '../utils/stream.js';
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
} from './types.js';

export const SUBPROTOCOL = 'lgtv2';

export const URIS = {
  launch: 'ssap://system.launcher/launch',
  foregroundApp: 'ssap://com.webos.applicationManager/getForegroundAppInfo',
  install: 'ssap://com.webos.service.devmode/install',
  logs: 'ssap://com.webos.service.logs/subscribe',
} as const;

export const SECURE_PORTS: readonly number[] = [3001];

const INSTALL_CHUNK_BYTES = 256 * 1024;

const PERMISSIONS = [
  'LAUNCH',
  'LAUNCH_WEBAPP',
  'APP_TO_APP',
  'CONTROL_INPUT_MEDIA_PLAYBACK',
  'READ_INSTALLED_APPS',
  'READ_NETWORK_STATE',
  'READ_RUNNING_APPS',
];

/** Client manifest presented to the device when registering */
export const CLIENT_MANIFEST = {
  manifestVersion: 1,
  appVersion: '1.0',
  signed: {
    appId: 'io.tvship.cli',
    vendorId: 'io.tvship',
    localizedAppNames: { '': 'tvship' },
    localizedVendorNames: { '': 'tvship' },
    permissions: PERMISSIONS,
    serial: '000000',
  },
  permissions: PERMISSIONS,
};

const ReplySchema = z.object({
  type: z.string(),
  id: z.string().optional(),
  payload: z.record(z.unknown()).optional(),
  error: z.string().optional(),
});

type Reply = z.infer<typeof ReplySchema>;

const LogLineSchema = z.object({
  seq: z.number().int().nonnegative(),
  timestamp: z.string(),
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  source: z.string().optional(),
  text: z.string(),
});

const LogBatchSchema = z.object({ lines: z.array(LogLineSchema) });

export interface SsapMessage {
  type: 'hello' | 'register' | 'request' | 'subscribe' | 'unsubscribe';
  id: string;
  uri?: string;
  payload?: Record<string, unknown>;
}

/**
 * `wss://` for the secure ports, `ws://` otherwise.
 */
export function deviceUrl(endpoint: DeviceEndpoint, securePorts: readonly number[] = SECURE_PORTS): string {
  const scheme = securePorts.includes(endpoint.port) ? 'wss' : 'ws';
  return `${scheme}://${endpoint.host}:${endpoint.port}`;
}

interface OpenOptions {
  timeoutMs: number;
  securePorts: readonly number[];
  signal?: AbortSignal;
}

interface ExchangeOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

// ═══════════════════════════════════════════════════════════════
// SOCKET
// ═══════════════════════════════════════════════════════════════

class SsapSocket {
  private handlers = new Map<string, Set<(reply: Reply) => void>>();
  private closeListeners = new Set<(err: DeviceConnectionError) => void>();
  private nextId = 0;

  private constructor(private readonly ws: WebSocket, readonly url: string) {
    ws.on('message', (data: WebSocket.RawData) => this.dispatch(data));
    ws.on('close', () => this.notifyClosed(new DeviceConnectionError(`Connection to ${url} closed`)));
    ws.on('error', (err: Error) => this.notifyClosed(new DeviceConnectionError(`Connection to ${url} failed: ${err.message}`, err)));
  }

  static open(endpoint: DeviceEndpoint, options: OpenOptions): Promise<SsapSocket> {
    const { timeoutMs, signal } = options;
    const url = deviceUrl(endpoint, options.securePorts);
    const secure = url.startsWith('wss:');

    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new CancelledError());
        return;
      }

      // TVs sign their own certificates
      const ws = new WebSocket(url, [SUBPROTOCOL], {
        handshakeTimeout: timeoutMs,
        ...(secure ? { rejectUnauthorized: false } : {}),
      });
      const onAbort = (): void => {
        ws.terminate();
        reject(new CancelledError());
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      ws.once('open', () => {
        signal?.removeEventListener('abort', onAbort);
        resolve(new SsapSocket(ws, url));
      });
      ws.once('error', (err: Error) => {
        signal?.removeEventListener('abort', onAbort);
        reject(new DeviceConnectionError(`Cannot connect to ${url}: ${err.message}`, err));
      });
    });
  }

  get protocol(): string {
    return this.ws.protocol;
  }

  messageId(prefix: string): string {
    return `${prefix}_${this.nextId++}`;
  }

  send(message: SsapMessage): void {
    if (this.ws.readyState !== WebSocket.OPEN) {
      throw new DeviceConnectionError(`Connection to ${this.url} is not open`);
    }
    this.ws.send(JSON.stringify(message));
  }

  listen(id: string, handler: (reply: Reply) => void): () => void {
    let set = this.handlers.get(id);
    if (!set) {
      set = new Set();
      this.handlers.set(id, set);
    }
    const listeners = set;
    listeners.add(handler);
    return () => {
      listeners.delete(handler);
      if (listeners.size === 0 && this.handlers.get(id) === listeners) this.handlers.delete(id);
    };
  }

  onClose(listener: (err: DeviceConnectionError) => void): () => void {
    this.closeListeners.add(listener);
    return () => {
      this.closeListeners.delete(listener);
    };
  }

  /**
   * Send `message` and settle on the first reply `interpret` maps to a value.
   * `interpret` returns undefined to keep waiting and may throw to reject.
   */
  exchange<T>(
    message: SsapMessage,
    options: ExchangeOptions,
    interpret: (reply: Reply) => T | undefined,
  ): Promise<T> {
    const { timeoutMs, signal } = options;
    if (signal?.aborted) return Promise.reject(new CancelledError());

    return new Promise<T>((resolve, reject) => {
      const stops: Array<() => void> = [];
      const finish = (fn: () => void): void => {
        for (const stop of stops) stop();
        fn();
      };

      const timer = setTimeout(() => {
        finish(() => reject(new DeviceConnectionError(`No reply to ${message.uri ?? message.type} within ${timeoutMs}ms`)));
      }, timeoutMs);
      stops.push(() => clearTimeout(timer));

      const onAbort = (): void => finish(() => reject(new CancelledError()));
      signal?.addEventListener('abort', onAbort, { once: true });
      stops.push(() => signal?.removeEventListener('abort', onAbort));

      stops.push(this.listen(message.id, (reply) => {
        let value: T | undefined;
        try {
          value = interpret(reply);
        } catch (err) {
          finish(() => reject(err));
          return;
        }
        if (value !== undefined) {
          const settled = value;
          finish(() => resolve(settled));
        }
      }));
      stops.push(this.onClose((err) => finish(() => reject(err))));

      try {
        this.send(message);
      } catch (err) {
        finish(() => reject(err));
      }
    });
  }

  /**
   * Issue an `ssap://` request and return its payload. Error replies come
   * back as `{returnValue: false, errorText}`.
   */
  request(uri: string, payload: Record<string, unknown>, options: ExchangeOptions): Promise<Record<string, unknown>> {
    const message: SsapMessage = { type: 'request', id: this.messageId('request'), uri, payload };
    return this.exchange(message, options, (reply) => {
      if (reply.type === 'error') {
        return { returnValue: false, errorText: reply.error ?? 'request failed' };
      }
      return reply.payload ?? {};
    });
  }

  close(): void {
    this.closeListeners.clear();
    this.handlers.clear();
    if (this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.terminate();
    } else if (this.ws.readyState === WebSocket.OPEN) {
      this.ws.close();
    }
  }

  private dispatch(data: WebSocket.RawData): void {
    let json: unknown;
    try {
      json = JSON.parse(data.toString());
    } catch {
      getLogger().debug({ url: this.url }, 'Ignoring non-JSON frame from device');
      return;
    }

    const parsed = ReplySchema.safeParse(json);
    if (!parsed.success || !parsed.data.id) return;
    const listeners = this.handlers.get(parsed.data.id);
    if (!listeners) return;
    for (const handler of [...listeners]) handler(parsed.data);
  }

  private notifyClosed(err: DeviceConnectionError): void {
    const listeners = [...this.closeListeners];
    this.closeListeners.clear();
    for (const listener of listeners) listener(err);
  }
}

// ═══════════════════════════════════════════════════════════════
// PAIRING CHALLENGE
// ═══════════════════════════════════════════════════════════════

type ChallengeState =
  | { kind: 'pending' }
  | { kind: 'settled'; outcome: PairingOutcome }
  | { kind: 'failed'; error: Error };

class SocketPairingChallenge implements PairingChallenge {
  private state: ChallengeState = { kind: 'pending' };
  private waiters: Array<() => void> = [];
  readonly prompt: string;
  requiresConfirmation = false;

  constructor(private readonly socket: SsapSocket) {
    this.prompt = `Accept the connection request shown on the TV at ${socket.url}`;
  }

  settle(outcome: PairingOutcome): void {
    if (this.state.kind !== 'pending') return;
    this.state = { kind: 'settled', outcome };
    this.wake();
  }

  fail(error: Error): void {
    if (this.state.kind !== 'pending') return;
    this.state = { kind: 'failed', error };
    this.wake();
  }

  get settled(): boolean {
    return this.state.kind !== 'pending';
  }

  wait(signal: AbortSignal): Promise<PairingOutcome> {
    return new Promise<PairingOutcome>((resolve, reject) => {
      const check = (): boolean => {
        if (this.state.kind === 'settled') {
          resolve(this.state.outcome);
          return true;
        }
        if (this.state.kind === 'failed') {
          reject(this.state.error);
          return true;
        }
        return false;
      };
      if (check()) return;
      if (signal.aborted) {
        reject(new CancelledError('pairing'));
        return;
      }

      const onAbort = (): void => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        reject(new CancelledError('pairing'));
      };
      const waiter = (): void => {
        signal.removeEventListener('abort', onAbort);
        check();
      };
      signal.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  cancel(): void {
    this.socket.close();
  }

  private wake(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter();
  }
}

// ═══════════════════════════════════════════════════════════════
// TRANSPORT
// ═══════════════════════════════════════════════════════════════

export interface WebSocketTransportOptions {
  /** Per-request reply deadline (ms) */
  requestTimeoutMs?: number;
  /** Ports reached over `wss://` */
  securePorts?: readonly number[];
}

export class WebSocketTransport implements DeviceTransport {
  private readonly requestTimeoutMs: number;
  private readonly securePorts: readonly number[];

  constructor(options: WebSocketTransportOptions = {}) {
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10_000;
    this.securePorts = options.securePorts ?? SECURE_PORTS;
  }

  async probe(endpoint: DeviceEndpoint, signal?: AbortSignal): Promise<ProbeInfo> {
    const socket = await this.open(endpoint, signal);
    try {
      if (socket.protocol !== SUBPROTOCOL) {
        return { pairingSupported: false };
      }

      let hello: Record<string, unknown> = {};
      try {
        hello = await socket.exchange(
          { type: 'hello', id: socket.messageId('hello'), payload: {} },
          { timeoutMs: this.requestTimeoutMs, signal },
          (reply) => (reply.type === 'hello' ? reply.payload ?? {} : undefined),
        );
      } catch (err) {
        if (!isTransient(err)) throw err;
        getLogger().debug({ url: socket.url, error: err.message }, 'Device did not answer hello');
      }

      return {
        pairingSupported: true,
        modelName: stringField(hello, 'modelName') ?? stringField(hello, 'deviceType'),
        firmware: stringField(hello, 'deviceOSVersion'),
      };
    } finally {
      socket.close();
    }
  }

  async requestPairing(
    endpoint: DeviceEndpoint,
    options: { previousToken?: string; signal?: AbortSignal } = {},
  ): Promise<PairingChallenge> {
    const socket = await this.open(endpoint, options.signal);
    const challenge = new SocketPairingChallenge(socket);

    const payload: Record<string, unknown> = {
      forcePairing: false,
      pairingType: 'PROMPT',
      manifest: CLIENT_MANIFEST,
    };
    if (options.previousToken) {
      payload['client-key'] = options.previousToken;
    }

    const id = socket.messageId('register');
    socket.listen(id, (reply) => {
      const outcome = interpretRegistration(reply);
      if (outcome) challenge.settle(outcome);
    });
    socket.onClose((err) => challenge.fail(err));

    try {
      // The first reply tells whether the device is prompting or already decided.
      const first = await socket.exchange(
        { type: 'register', id, payload },
        { timeoutMs: this.requestTimeoutMs, signal: options.signal },
        (reply) => (isPromptReply(reply) ? 'prompt' : interpretRegistration(reply) ? 'decided' : undefined),
      );
      challenge.requiresConfirmation = first === 'prompt' && !challenge.settled;
      return challenge;
    } catch (err) {
      socket.close();
      throw err;
    }
  }

  install(target: DeviceTarget, request: InstallRequest, signal?: AbortSignal): Promise<InstallOutcome> {
    return this.withSession(target, 'install', signal, async (socket) => {
      const data = await readFile(request.path);
      const chunkCount = Math.max(1, Math.ceil(data.length / INSTALL_CHUNK_BYTES));

      for (let index = 0; index < chunkCount; index++) {
        const chunk = data.subarray(index * INSTALL_CHUNK_BYTES, (index + 1) * INSTALL_CHUNK_BYTES);
        const reply = await socket.request(
          URIS.install,
          {
            id: request.packageId,
            version: request.version,
            checksum: request.checksum,
            size: request.size,
            chunkIndex: index,
            chunkCount,
            data: chunk.toString('base64'),
          },
          { timeoutMs: this.requestTimeoutMs, signal },
        );
        if (reply.returnValue === false) {
          return { ok: false, reason: stringField(reply, 'errorText') ?? 'install refused by device' };
        }
      }

      return { ok: true };
    });
  }

  launch(target: DeviceTarget, appId: string, signal?: AbortSignal): Promise<LaunchOutcome> {
    return this.withSession(target, 'launch', signal, async (socket) => {
      const reply = await socket.request(URIS.launch, { id: appId }, { timeoutMs: this.requestTimeoutMs, signal });
      if (reply.returnValue === false) {
        return { started: false, reason: stringField(reply, 'errorText') ?? 'launch refused by device' };
      }
      return { started: true };
    });
  }

  appStatus(target: DeviceTarget, appId: string, signal?: AbortSignal): Promise<AppStatus> {
    return this.withSession(target, 'health', signal, async (socket) => {
      const reply = await socket.request(URIS.foregroundApp, {}, { timeoutMs: this.requestTimeoutMs, signal });
      if (reply.returnValue === false) return 'unknown';
      return stringField(reply, 'appId') === appId ? 'running' : 'stopped';
    });
  }

  async openLogStream(
    target: DeviceTarget,
    options: { cursor?: number; signal?: AbortSignal } = {},
  ): Promise<LogConnection> {
    const { signal, cursor } = options;
    const socket = await this.open(target, signal);
    try {
      await this.register(socket, target, 'logs', signal);
    } catch (err) {
      socket.close();
      throw err;
    }

    let closed = false;
    const close = (): void => {
      if (closed) return;
      closed = true;
      signal?.removeEventListener('abort', close);
      socket.close();
      stream.done();
    };
    const stream = fromCallback<LogLine>(close);

    const id = socket.messageId('logs');
    socket.listen(id, (reply) => {
      if (reply.type === 'error') {
        closed = true;
        socket.close();
        stream.error(new Error(`Log subscription refused: ${reply.error ?? 'unknown error'}`));
        return;
      }
      const batch = LogBatchSchema.safeParse(reply.payload);
      if (!batch.success) return;
      for (const line of batch.data.lines) stream.push(line);
    });
    socket.onClose((err) => {
      if (closed) return;
      closed = true;
      stream.error(err);
    });
    signal?.addEventListener('abort', close, { once: true });

    try {
      socket.send({ type: 'subscribe', id, uri: URIS.logs, payload: cursor === undefined ? {} : { cursor } });
    } catch (err) {
      close();
      throw err;
    }

    return {
      [Symbol.asyncIterator]: () => stream.iterable[Symbol.asyncIterator](),
      close,
    };
  }

  // ─────────────────────────────────────────────────────────
  // INTERNAL
  // ─────────────────────────────────────────────────────────

  private open(endpoint: DeviceEndpoint, signal?: AbortSignal): Promise<SsapSocket> {
    return SsapSocket.open(endpoint, { timeoutMs: this.requestTimeoutMs, securePorts: this.securePorts, signal });
  }

  private async withSession<T>(
    target: DeviceTarget,
    stage: Stage,
    signal: AbortSignal | undefined,
    fn: (socket: SsapSocket) => Promise<T>,
  ): Promise<T> {
    const socket = await this.open(target, signal);
    try {
      await this.register(socket, target, stage, signal);
      return await fn(socket);
    } finally {
      socket.close();
    }
  }

  /**
   * Re-register with the stored key. A device that prompts again or refuses
   * the key has forgotten the pairing.
   */
  private async register(socket: SsapSocket, target: DeviceTarget, stage: Stage, signal?: AbortSignal): Promise<void> {
    await socket.exchange(
      {
        type: 'register',
        id: socket.messageId('register'),
        payload: { forcePairing: false, pairingType: 'PROMPT', manifest: CLIENT_MANIFEST, 'client-key': target.pairingToken },
      },
      { timeoutMs: this.requestTimeoutMs, signal },
      (reply) => {
        if (isPromptReply(reply)) {
          throw new DeviceNotPairedError(target.alias, 'Paired', stage, 'device asked for confirmation again');
        }
        const outcome = interpretRegistration(reply);
        if (outcome?.status === 'rejected') {
          throw new DeviceNotPairedError(target.alias, 'Paired', stage, outcome.reason);
        }
        return outcome ? true : undefined;
      },
    );
  }
}

function isPromptReply(reply: Reply): boolean {
  return reply.type === 'response' && reply.payload?.pairingType === 'PROMPT';
}

function interpretRegistration(reply: Reply): PairingOutcome | undefined {
  if (reply.type === 'registered') {
    const token = reply.payload ? stringField(reply.payload, 'client-key') : undefined;
    return token
      ? { status: 'accepted', token }
      : { status: 'rejected', reason: 'device registered without issuing a client key' };
  }
  if (reply.type === 'error') {
    return { status: 'rejected', reason: reply.error ?? 'denied' };
  }
  return undefined;
}

function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}
