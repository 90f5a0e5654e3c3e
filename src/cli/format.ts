/**
 * Argument parsers and plain-text rendering for CLI output.
 */

import { InvalidArgumentError } from 'commander';
import { TvshipError } from '../core/errors.js';
import type { Deployment, DeploymentRecord } from '../deploy/types.js';
import type { LogLine } from '../device/types.js';
import type { DiscoveredDevice } from '../discovery/ssdp.js';
import type { Device } from '../registry/types.js';
import { formatDuration } from '../utils/timer.js';

export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
  }
  return port;
}

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

export function parseCursor(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Cursor must be a non-negative integer.');
  }
  return n;
}

/**
 * `<Kind>: <message>` plus the device or tool diagnostic when there is one.
 */
export function formatError(error: Error): string {
  const kind = error instanceof TvshipError ? error.code : 'Error';
  const lines = [`${kind}: ${error.message}`];
  if (error instanceof TvshipError && error.diagnostic && !error.message.includes(error.diagnostic)) {
    lines.push(indent(error.diagnostic));
  }
  return lines.join('\n');
}

/**
 * Left-aligned columns separated by two spaces.
 */
export function table(rows: string[][]): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length);
    });
  }
  return rows.map((row) =>
    row
      .map((cell, i) => (i === row.length - 1 ? cell : cell.padEnd(widths[i] ?? 0)))
      .join('  ')
      .trimEnd(),
  );
}

export function formatDevices(devices: Device[]): string[] {
  if (devices.length === 0) return ['No devices registered. Run `tvship pair <host> <port> <alias>`.'];
  return table([
    ['ALIAS', 'ENDPOINT', 'STATE', 'MODEL', 'FIRMWARE', 'LAST SEEN'],
    ...devices.map((d) => [
      d.alias,
      `${d.host}:${d.port}`,
      d.state,
      d.modelName ?? '-',
      d.firmware ?? '-',
      d.lastSeenAt ?? '-',
    ]),
  ]);
}

export function formatDiscovered(devices: DiscoveredDevice[]): string[] {
  if (devices.length === 0) return ['No devices answered.'];
  return [
    ...table([
      ['HOST', 'NAME', 'SERVER'],
      ...devices.map((d) => [d.host, d.friendlyName ?? '-', d.server ?? '-']),
    ]),
    '',
    'Pair with: tvship pair <host> 3000 <alias>  (3001 for wss://)',
  ];
}

export function formatDeployment(deployment: Deployment): string[] {
  const { artifact } = deployment;
  const lines = [
    `Deployment ${deployment.id}: ${deployment.status}`,
    `  app      ${artifact.packageId}@${artifact.version}`,
    `  device   ${deployment.alias}`,
    `  attempts ${deployment.attempts}`,
  ];
  if (deployment.durationMs !== undefined) {
    lines.push(`  took     ${formatDuration(deployment.durationMs)}`);
  }
  if (deployment.status === 'Failed') {
    lines.push(`  reason   ${deployment.reason ?? 'Unexpected'} (${deployment.stage ?? 'unknown stage'})`);
    if (deployment.error) lines.push(`  error    ${deployment.error}`);
  }
  return lines;
}

export function formatHistory(records: DeploymentRecord[]): string[] {
  if (records.length === 0) return ['No deployments recorded.'];
  return table([
    ['ID', 'DEVICE', 'APP', 'STATUS', 'STARTED'],
    ...records.map((r) => [
      r.id,
      r.alias,
      `${r.artifact.packageId}@${r.artifact.version}`,
      r.status === 'Failed' && r.reason ? `Failed (${r.reason})` : r.status,
      r.startedAt,
    ]),
  ]);
}

export function formatLogLine(line: LogLine): string {
  const source = line.source ? ` [${line.source}]` : '';
  return `${line.timestamp} ${line.level.toUpperCase().padEnd(5)}${source} ${line.text}`;
}

function indent(text: string): string {
  return text
    .split('\n')
    .map((line) => `  ${line}`)
    .join('\n');
}
