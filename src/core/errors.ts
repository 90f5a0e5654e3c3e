export type ErrorKind =
  | 'NetworkUnreachable'
  | 'PairingTimeout'
  | 'PairingRejected'
  | 'DuplicateAlias'
  | 'InvalidManifest'
  | 'PackagingFailed'
  | 'DeviceNotPaired'
  | 'InstallFailed'
  | 'LaunchFailed'
  | 'LaunchTimeout'
  | 'NotFound'
  | 'ChecksumMismatch'
  | 'Cancelled'
  | 'ConfigError';

export type Stage =
  | 'config'
  | 'registry'
  | 'discovery'
  | 'probe'
  | 'pairing'
  | 'package'
  | 'verify'
  | 'install'
  | 'launch'
  | 'health'
  | 'logs';

export interface ErrorContext {
  stage?: Stage;
  alias?: string;
  /** Raw text from the device or external tool */
  diagnostic?: string;
  cause?: Error;
}

export class TvshipError extends Error {
  public readonly stage?: Stage;
  public readonly alias?: string;
  public readonly diagnostic?: string;
  public readonly cause?: Error;

  constructor(
    message: string,
    public readonly code: ErrorKind,
    context: ErrorContext = {},
  ) {
    super(message);
    this.name = 'TvshipError';
    this.stage = context.stage;
    this.alias = context.alias;
    this.diagnostic = context.diagnostic;
    this.cause = context.cause;
  }
}

export class ConfigError extends TvshipError {
  constructor(message: string, cause?: Error) {
    super(message, 'ConfigError', { stage: 'config', cause });
    this.name = 'ConfigError';
  }
}

export class NotFoundError extends TvshipError {
  constructor(public readonly subject: string, stage: Stage = 'registry') {
    super(`Not found: ${subject}`, 'NotFound', { stage, alias: subject });
    this.name = 'NotFoundError';
  }
}

export class DuplicateAliasError extends TvshipError {
  constructor(
    alias: string,
    public readonly existing: { host: string; port: number },
  ) {
    super(
      `Alias "${alias}" is already registered for ${existing.host}:${existing.port}; remove it first`,
      'DuplicateAlias',
      { stage: 'registry', alias },
    );
    this.name = 'DuplicateAliasError';
  }
}

export class NetworkUnreachableError extends TvshipError {
  constructor(
    public readonly host: string,
    public readonly port: number,
    context: Omit<ErrorContext, 'stage'> = {},
  ) {
    super(`Cannot reach ${host}:${port}`, 'NetworkUnreachable', { ...context, stage: 'probe' });
    this.name = 'NetworkUnreachableError';
  }
}

export class PairingTimeoutError extends TvshipError {
  constructor(alias: string, public readonly timeoutMs: number) {
    super(
      `Pairing with "${alias}" was not confirmed within ${timeoutMs}ms`,
      'PairingTimeout',
      { stage: 'pairing', alias },
    );
    this.name = 'PairingTimeoutError';
  }
}

export class PairingRejectedError extends TvshipError {
  constructor(alias: string, diagnostic?: string) {
    super(`Device "${alias}" rejected the pairing request`, 'PairingRejected', {
      stage: 'pairing',
      alias,
      diagnostic,
    });
    this.name = 'PairingRejectedError';
  }
}

export class InvalidManifestError extends TvshipError {
  constructor(public readonly problems: ManifestProblem[]) {
    super(
      `Invalid manifest: ${problems.map((p) => `${p.field} (${p.message})`).join(', ')}`,
      'InvalidManifest',
      { stage: 'package' },
    );
    this.name = 'InvalidManifestError';
  }

  get fields(): string[] {
    return [...new Set(this.problems.map((p) => p.field))];
  }
}

export interface ManifestProblem {
  field: string;
  message: string;
}

export class PackagingFailedError extends TvshipError {
  constructor(message: string, diagnostic?: string, cause?: Error) {
    super(message, 'PackagingFailed', { stage: 'package', diagnostic, cause });
    this.name = 'PackagingFailedError';
  }
}

/**
 * Raised for a device whose registry state is not Paired, and for a Paired
 * device that no longer honours its stored token (`diagnostic` says why).
 */
export class DeviceNotPairedError extends TvshipError {
  constructor(alias: string, public readonly state: string, stage: Stage = 'install', diagnostic?: string) {
    super(
      diagnostic
        ? `Device "${alias}" rejected its pairing token; run \`tvship pair\` again`
        : `Device "${alias}" is not paired (state: ${state})`,
      'DeviceNotPaired',
      { stage, alias, diagnostic },
    );
    this.name = 'DeviceNotPairedError';
  }
}

export class ChecksumMismatchError extends TvshipError {
  constructor(
    public readonly path: string,
    public readonly expected: string,
    public readonly actual: string,
  ) {
    super(
      `Artifact ${path} changed since packaging (expected ${expected.slice(0, 12)}, got ${actual.slice(0, 12)})`,
      'ChecksumMismatch',
      { stage: 'verify' },
    );
    this.name = 'ChecksumMismatchError';
  }
}

export class InstallFailedError extends TvshipError {
  constructor(
    alias: string,
    public readonly attempts: number,
    public readonly connectivity: boolean,
    diagnostic?: string,
    cause?: Error,
  ) {
    super(
      `Install on "${alias}" failed after ${attempts} attempt(s)${diagnostic ? `: ${diagnostic}` : ''}`,
      'InstallFailed',
      { stage: 'install', alias, diagnostic, cause },
    );
    this.name = 'InstallFailedError';
  }
}

export class LaunchFailedError extends TvshipError {
  constructor(alias: string, diagnostic?: string, cause?: Error) {
    super(
      `App did not start on "${alias}"${diagnostic ? `: ${diagnostic}` : ''}`,
      'LaunchFailed',
      { stage: 'launch', alias, diagnostic, cause },
    );
    this.name = 'LaunchFailedError';
  }
}

export class LaunchTimeoutError extends TvshipError {
  constructor(alias: string, public readonly gracePeriodMs: number) {
    super(
      `App on "${alias}" was not observed running within ${gracePeriodMs}ms`,
      'LaunchTimeout',
      { stage: 'health', alias },
    );
    this.name = 'LaunchTimeoutError';
  }
}

export class CancelledError extends TvshipError {
  constructor(stage?: Stage, alias?: string) {
    super(stage ? `Cancelled during ${stage}` : 'Cancelled', 'Cancelled', { stage, alias });
    this.name = 'CancelledError';
  }
}

/**
 * Transient transport failure (socket refused, closed, timed out).
 * Components retry it locally and translate it before it reaches a caller.
 */
export class DeviceConnectionError extends Error {
  constructor(message: string, public readonly cause?: Error) {
    super(message);
    this.name = 'DeviceConnectionError';
  }
}

export function isTransient(err: unknown): err is DeviceConnectionError {
  return err instanceof DeviceConnectionError;
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

const EXIT_CODES: Record<ErrorKind, number> = {
  DeviceNotPaired: 2,
  PackagingFailed: 3,
  InstallFailed: 4,
  LaunchFailed: 5,
  InvalidManifest: 6,
  PairingTimeout: 7,
  PairingRejected: 8,
  NetworkUnreachable: 9,
  NotFound: 10,
  DuplicateAlias: 11,
  LaunchTimeout: 12,
  ChecksumMismatch: 13,
  ConfigError: 78,
  Cancelled: 130,
};

export function exitCodeFor(err: unknown): number {
  if (err instanceof TvshipError) return EXIT_CODES[err.code];
  return 1;
}

export function isErrorKind(value: string): value is ErrorKind {
  return Object.prototype.hasOwnProperty.call(EXIT_CODES, value);
}

/**
 * Exit code for a failure kind recorded on a Deployment.
 */
export function exitCodeForKind(kind: string | undefined): number {
  return kind !== undefined && isErrorKind(kind) ? EXIT_CODES[kind] : 1;
}
