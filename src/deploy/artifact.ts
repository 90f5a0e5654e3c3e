/**
 * Artifact metadata on disk.
 *
 * Every cached artifact has an `artifact.json` sidecar next to it. An
 * artifact handed to the CLI without one is described from the file itself,
 * using the `<id>_<version>_<arch>.ipk` naming convention.
 */

import type { Stats } from 'node:fs';
import { readFile, rename, stat, writeFile } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';
import { InvalidManifestError, NotFoundError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { sha256File } from '../utils/crypto.js';
import { ArtifactSchema, type Artifact } from './types.js';

export const SIDECAR_NAME = 'artifact.json';

const IPK_NAME = /^(.+)_(\d+\.\d+\.\d+)_([A-Za-z0-9]+)\.ipk$/;

export function freezeArtifact(artifact: Artifact): Artifact {
  return Object.freeze({ ...artifact });
}

/**
 * Write the sidecar beside the artifact, or into `dir` when given.
 * The file is replaced atomically so a reader never sees half a record.
 */
export async function writeSidecar(artifact: Artifact, dir = dirname(artifact.path)): Promise<void> {
  const file = join(dir, SIDECAR_NAME);
  const temp = `${file}.${process.pid}.tmp`;
  await writeFile(temp, JSON.stringify(artifact, null, 2) + '\n', 'utf-8');
  await rename(temp, file);
}

/**
 * Read the sidecar in `dir`. Missing or unreadable sidecars yield undefined.
 */
export async function readSidecar(dir: string): Promise<Artifact | undefined> {
  let raw: string;
  try {
    raw = await readFile(join(dir, SIDECAR_NAME), 'utf-8');
  } catch (err) {
    if (isMissing(err)) return undefined;
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    getLogger().warn({ dir }, 'Ignoring artifact sidecar that is not valid JSON');
    return undefined;
  }

  const parsed = ArtifactSchema.safeParse(json);
  if (!parsed.success) {
    getLogger().warn({ dir, issues: parsed.error.issues.length }, 'Ignoring malformed artifact sidecar');
    return undefined;
  }
  return freezeArtifact(parsed.data);
}

/**
 * Describe the artifact at `path` for deployment.
 */
export async function loadArtifact(path: string): Promise<Artifact> {
  const absolute = resolve(path);
  let info: Stats;
  try {
    info = await stat(absolute);
  } catch (err) {
    if (isMissing(err)) throw new NotFoundError(absolute, 'verify');
    throw err;
  }
  if (!info.isFile()) throw new NotFoundError(absolute, 'verify');

  const sidecar = await readSidecar(dirname(absolute));
  if (sidecar && basename(sidecar.path) === basename(absolute)) {
    return freezeArtifact({ ...sidecar, path: absolute });
  }

  const match = IPK_NAME.exec(basename(absolute));
  if (!match) {
    throw new InvalidManifestError([
      { field: 'artifact', message: `expected <id>_<version>_<arch>.ipk or an ${SIDECAR_NAME} beside ${basename(absolute)}` },
    ]);
  }

  return freezeArtifact({
    packageId: match[1] ?? '',
    version: match[2] ?? '',
    path: absolute,
    checksum: await sha256File(absolute),
    size: info.size,
    createdAt: info.mtime.toISOString(),
  });
}

export function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
