/**
 * DeviceDiscovery — finds TVs on the local network over SSDP.
 *
 * Multicasts one M-SEARCH for the configured search target and collects
 * the unicast answers until the window closes. Answers are deduplicated by
 * USN (or LOCATION when a device sends none). Uses Node's dgram module.
 */

import { createSocket, type RemoteInfo } from 'node:dgram';
import { EventEmitter } from 'node:events';
import { CancelledError, NetworkUnreachableError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export const SSDP_ADDRESS = '239.255.255.250';
export const SSDP_PORT = 1900;

export interface DiscoveredDevice {
  /** Address the answer came from */
  host: string;
  /** URL of the device description */
  location: string;
  searchTarget?: string;
  usn?: string;
  server?: string;
  /** Name the TV shows for itself, when it sends one */
  friendlyName?: string;
}

export interface DiscoverOptions {
  searchTarget: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface DeviceDiscoveryOptions {
  /** Where the M-SEARCH is sent (the SSDP multicast group by default) */
  target?: { address: string; port: number };
}

// ═══════════════════════════════════════════════════════════════
// MESSAGES
// ═══════════════════════════════════════════════════════════════

export function searchRequest(searchTarget: string, maxWaitSeconds: number): string {
  return [
    'M-SEARCH * HTTP/1.1',
    `HOST: ${SSDP_ADDRESS}:${SSDP_PORT}`,
    'MAN: "ssdp:discover"',
    `MX: ${maxWaitSeconds}`,
    `ST: ${searchTarget}`,
    '',
    '',
  ].join('\r\n');
}

/**
 * Parse an M-SEARCH answer. Anything that is not a `200` with a LOCATION
 * header yields undefined.
 */
export function parseSearchResponse(text: string, sender: string): DiscoveredDevice | undefined {
  const [status, ...lines] = text.split(/\r?\n/);
  if (!status || !/^HTTP\/1\.[01] 200\b/i.test(status)) return undefined;

  const headers = new Map<string, string>();
  for (const line of lines) {
    const colon = line.indexOf(':');
    if (colon <= 0) continue;
    headers.set(line.slice(0, colon).trim().toLowerCase(), line.slice(colon + 1).trim());
  }

  const location = headers.get('location');
  if (!location) return undefined;

  return {
    host: sender,
    location,
    searchTarget: headers.get('st') || undefined,
    usn: headers.get('usn') || undefined,
    server: headers.get('server') || undefined,
    friendlyName: decodeName(headers.get('dlnadevicename.lge.com')),
  };
}

function decodeName(value: string | undefined): string | undefined {
  if (!value) return undefined;
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

// ═══════════════════════════════════════════════════════════════
// DISCOVERY
// ═══════════════════════════════════════════════════════════════

export class DeviceDiscovery extends EventEmitter {
  private readonly target: { address: string; port: number };

  constructor(options: DeviceDiscoveryOptions = {}) {
    super();
    this.target = options.target ?? { address: SSDP_ADDRESS, port: SSDP_PORT };
  }

  /**
   * Search for `timeoutMs` and return every device that answered, in the
   * order the answers arrived.
   */
  discover(options: DiscoverOptions): Promise<DiscoveredDevice[]> {
    const { searchTarget, timeoutMs, signal } = options;
    const { address, port } = this.target;
    const logger = getLogger();

    return new Promise<DiscoveredDevice[]>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new CancelledError('discovery'));
        return;
      }

      const socket = createSocket({ type: 'udp4', reuseAddr: true });
      const found = new Map<string, DiscoveredDevice>();
      let timer: NodeJS.Timeout | undefined;
      let settled = false;

      const finish = (error?: Error): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        socket.close();
        if (error) {
          reject(error);
          return;
        }
        const devices = [...found.values()];
        logger.debug({ searchTarget, count: devices.length }, 'SSDP search finished');
        this.emit('discovery:complete', { timestamp: Date.now(), count: devices.length });
        resolve(devices);
      };
      const onAbort = (): void => finish(new CancelledError('discovery'));
      const fail = (err: Error): void =>
        finish(new NetworkUnreachableError(address, port, { diagnostic: err.message, cause: err }));

      signal?.addEventListener('abort', onAbort, { once: true });

      socket.on('message', (message: Buffer, remote: RemoteInfo) => {
        const device = parseSearchResponse(message.toString('utf-8'), remote.address);
        if (!device) return;
        const key = device.usn ?? device.location;
        if (found.has(key)) return;
        found.set(key, device);
        this.emit('discovery:device:found', { timestamp: Date.now(), device });
      });
      socket.on('error', fail);

      socket.bind(0, () => {
        const maxWait = Math.max(1, Math.floor(timeoutMs / 1000));
        const request = Buffer.from(searchRequest(searchTarget, maxWait), 'utf-8');
        this.emit('discovery:started', { timestamp: Date.now(), searchTarget });
        socket.send(request, port, address, (err) => {
          if (err) fail(err);
        });
        timer = setTimeout(() => finish(), timeoutMs);
      });
    });
  }
}
