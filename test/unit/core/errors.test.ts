import { describe, it, expect } from 'vitest';
import {
  CancelledError,
  DeviceConnectionError,
  DeviceNotPairedError,
  InstallFailedError,
  InvalidManifestError,
  LaunchFailedError,
  NotFoundError,
  PackagingFailedError,
  TvshipError,
  exitCodeFor,
  exitCodeForKind,
  isTransient,
  toError,
} from '../../../src/core/errors.js';

describe('errors', () => {
  describe('exitCodeFor()', () => {
    it('should map failure kinds to distinct exit codes', () => {
      expect(exitCodeFor(new DeviceNotPairedError('tv', 'Unpaired'))).toBe(2);
      expect(exitCodeFor(new PackagingFailedError('boom'))).toBe(3);
      expect(exitCodeFor(new InstallFailedError('tv', 4, true))).toBe(4);
      expect(exitCodeFor(new LaunchFailedError('tv'))).toBe(5);
      expect(exitCodeFor(new NotFoundError('tv'))).toBe(10);
      expect(exitCodeFor(new CancelledError())).toBe(130);
    });

    it('should return 1 for errors outside the taxonomy', () => {
      expect(exitCodeFor(new Error('unexpected'))).toBe(1);
      expect(exitCodeFor('a string')).toBe(1);
    });
  });

  describe('exitCodeForKind()', () => {
    it('should resolve recorded deployment reasons', () => {
      expect(exitCodeForKind('LaunchFailed')).toBe(5);
      expect(exitCodeForKind('LaunchTimeout')).toBe(12);
      expect(exitCodeForKind('Unexpected')).toBe(1);
      expect(exitCodeForKind(undefined)).toBe(1);
      expect(exitCodeForKind('toString')).toBe(1);
    });
  });

  it('should carry stage, alias and diagnostic context', () => {
    const err = new InstallFailedError('livingroom', 4, true, 'connection refused');

    expect(err).toBeInstanceOf(TvshipError);
    expect(err.code).toBe('InstallFailed');
    expect(err.stage).toBe('install');
    expect(err.alias).toBe('livingroom');
    expect(err.diagnostic).toBe('connection refused');
    expect(err.connectivity).toBe(true);
    expect(err.message).toBe('Install on "livingroom" failed after 4 attempt(s): connection refused');
  });

  it('should list each invalid manifest field once', () => {
    const err = new InvalidManifestError([
      { field: 'id', message: 'required' },
      { field: 'icon', message: 'required' },
      { field: 'id', message: 'must be a reverse-DNS identifier' },
    ]);

    expect(err.fields).toEqual(['id', 'icon']);
    expect(exitCodeFor(err)).toBe(6);
  });

  it('should treat only DeviceConnectionError as transient', () => {
    expect(isTransient(new DeviceConnectionError('reset'))).toBe(true);
    expect(isTransient(new LaunchFailedError('tv'))).toBe(false);
    expect(isTransient(new Error('reset'))).toBe(false);
  });

  it('should coerce non-Error values', () => {
    expect(toError('plain').message).toBe('plain');
    const original = new Error('kept');
    expect(toError(original)).toBe(original);
  });
});
