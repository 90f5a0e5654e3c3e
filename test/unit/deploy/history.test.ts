import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { appendFile } from 'node:fs/promises';
import { join } from 'node:path';
import { DeploymentHistory } from '../../../src/deploy/history.js';
import type { Deployment } from '../../../src/deploy/types.js';
import { tempDir, type TempDir } from '../../helpers/fixtures.js';

function deployment(id: string, alias = 'livingroom', overrides: Partial<Deployment> = {}): Deployment {
  return {
    id,
    alias,
    artifact: {
      packageId: 'com.example.foo',
      version: '1.0.0',
      path: '/tmp/foo.ipk',
      checksum: 'a'.repeat(64),
      size: 9,
      createdAt: '2026-01-01T00:00:00.000Z',
    },
    status: 'Running',
    attempts: 1,
    transitions: [{ status: 'Pending', at: '2026-01-01T00:00:00.000Z' }],
    startedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('DeploymentHistory', () => {
  let dir: TempDir;
  let history: DeploymentHistory;

  beforeEach(async () => {
    dir = await tempDir();
    history = new DeploymentHistory(join(dir.path, 'nested', 'history.jsonl'));
  });

  afterEach(async () => {
    await dir.cleanup();
  });

  it('should be empty before anything is recorded', async () => {
    await expect(history.list()).resolves.toEqual([]);
  });

  it('should list newest first', async () => {
    await history.append(deployment('dep_1'));
    await history.append(deployment('dep_2', 'bedroom'));
    await history.append(deployment('dep_3', 'livingroom', { status: 'Failed', reason: 'LaunchFailed' }));

    const records = await history.list();
    expect(records.map(r => r.id)).toEqual(['dep_3', 'dep_2', 'dep_1']);
    expect(records[0]?.reason).toBe('LaunchFailed');
  });

  it('should filter by alias and limit', async () => {
    await history.append(deployment('dep_1'));
    await history.append(deployment('dep_2', 'bedroom'));
    await history.append(deployment('dep_3'));

    const records = await history.list({ alias: 'livingroom', limit: 1 });
    expect(records.map(r => r.id)).toEqual(['dep_3']);
  });

  it('should skip lines it cannot read', async () => {
    await history.append(deployment('dep_1'));
    await appendFile(history.path, 'not json\n{"id":"dep_x"}\n');
    await history.append(deployment('dep_2'));

    const records = await history.list();
    expect(records.map(r => r.id)).toEqual(['dep_2', 'dep_1']);
  });
});
