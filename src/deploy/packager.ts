/**
 * Packager — turns a source directory + app manifest into an Artifact.
 *
 * The manifest is validated before anything runs; the external tool is
 * never invoked on invalid input. Each build lands in its own
 * `<cacheDir>/<key>/<buildId>/` directory and is never rewritten or removed
 * afterwards. The key covers the manifest and the content hash of the source
 * tree; `<key>/artifact.json` points at the latest build, so packaging
 * identical input twice returns the same file.
 */

import { EventEmitter } from 'node:events';
import { mkdir, mkdtemp, readdir, rename, rm, stat, writeFile } from 'node:fs/promises';
import { nanoid } from 'nanoid';
import { isAbsolute, join, relative, resolve } from 'node:path';
import {
  CancelledError,
  InvalidManifestError,
  PackagingFailedError,
  toError,
  type ManifestProblem,
} from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { KeyedMutex } from '../core/mutex.js';
import { cacheKey, canonicalJson, hashDirectory, sha256File } from '../utils/crypto.js';
import { freezeArtifact, isMissing, readSidecar, writeSidecar } from './artifact.js';
import { AppManifestSchema, type AppManifest, type Artifact, type PackageTool, type PackageToolResult } from './types.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface PackagerOptions {
  /** Root of the artifact cache */
  cacheDir: string;
  tool: PackageTool;
  /** Reuse a cached artifact for identical input (default true) */
  cache?: boolean;
}

export const MANIFEST_FILE = 'appinfo.json';

// ═══════════════════════════════════════════════════════════════
// PACKAGER
// ═══════════════════════════════════════════════════════════════

export class Packager extends EventEmitter {
  private readonly cacheDir: string;
  private readonly tool: PackageTool;
  private readonly useCache: boolean;
  private readonly keyLocks = new KeyedMutex();

  constructor(options: PackagerOptions) {
    super();
    this.cacheDir = options.cacheDir;
    this.tool = options.tool;
    this.useCache = options.cache ?? true;
  }

  // ─────────────────────────────────────────────────────────
  // CORE OPERATIONS
  // ─────────────────────────────────────────────────────────

  /**
   * Validate, package and checksum. Throws InvalidManifestError before the
   * tool runs and PackagingFailedError when it fails or leaves no artifact.
   */
  async package(sourceDir: string, manifest: unknown, options: { signal?: AbortSignal } = {}): Promise<Artifact> {
    const { signal } = options;
    const root = resolve(sourceDir);
    await this.assertDirectory(root);

    const valid = await this.validateManifest(root, manifest);
    const contentHash = await hashDirectory(root);
    const key = cacheKey(canonicalJson(valid), contentHash);
    const logger = getLogger();

    this.emit('deploy:package:start', { timestamp: Date.now(), packageId: valid.id, version: valid.version, key });

    return this.keyLocks.withLock(
      key,
      async () => {
        const entryDir = join(this.cacheDir, key);

        if (this.useCache) {
          const cached = await this.cachedArtifact(entryDir);
          if (cached) {
            logger.debug({ packageId: cached.packageId, path: cached.path }, 'Reusing cached artifact');
            this.emit('deploy:package:cached', { timestamp: Date.now(), artifact: cached });
            return cached;
          }
        }

        const artifact = await this.build(root, valid, entryDir, signal);
        logger.info(
          { packageId: artifact.packageId, version: artifact.version, path: artifact.path, size: artifact.size },
          'Artifact packaged',
        );
        this.emit('deploy:package:complete', { timestamp: Date.now(), artifact });
        return artifact;
      },
      signal,
    );
  }

  /**
   * Check manifest fields and that `main`/`icon` exist inside `sourceDir`.
   * Every problem is collected before failing.
   */
  async validateManifest(sourceDir: string, manifest: unknown): Promise<AppManifest> {
    const parsed = AppManifestSchema.safeParse(manifest);
    if (!parsed.success) {
      const problems: ManifestProblem[] = parsed.error.issues.map((issue) => ({
        field: issue.path.length > 0 ? issue.path.join('.') : 'manifest',
        message: issue.message,
      }));
      throw new InvalidManifestError(problems);
    }

    const problems: ManifestProblem[] = [];
    for (const field of ['main', 'icon'] as const) {
      const problem = await this.checkFile(sourceDir, parsed.data[field]);
      if (problem) problems.push({ field, message: problem });
    }
    if (problems.length > 0) throw new InvalidManifestError(problems);

    return parsed.data;
  }

  // ─────────────────────────────────────────────────────────
  // INTERNAL
  // ─────────────────────────────────────────────────────────

  private async build(root: string, manifest: AppManifest, entryDir: string, signal?: AbortSignal): Promise<Artifact> {
    await mkdir(this.cacheDir, { recursive: true });
    const staging = await mkdtemp(join(this.cacheDir, '.staging-'));

    try {
      const manifestPath = join(staging, MANIFEST_FILE);
      const outDir = join(staging, 'out');
      await writeFile(manifestPath, JSON.stringify(manifest, null, 2) + '\n', 'utf-8');
      await mkdir(outDir);

      let result: PackageToolResult;
      try {
        result = await this.tool.run({ sourceDir: root, manifestPath, outDir, signal });
      } catch (err) {
        if (err instanceof CancelledError || err instanceof PackagingFailedError) throw err;
        const error = toError(err);
        throw new PackagingFailedError('Packaging tool could not run', error.message, error);
      }
      if (signal?.aborted) throw new CancelledError('package');

      if (result.exitCode !== 0) {
        throw new PackagingFailedError(`Packaging tool exited with code ${result.exitCode}`, result.output.trim());
      }

      const candidates = await this.listFiles(outDir);
      const [chosen] = candidates;
      if (chosen === undefined) {
        throw new PackagingFailedError('Packaging tool produced no artifact', result.output.trim());
      }
      if (candidates.length > 1) {
        getLogger().warn({ candidates, chosen }, 'Packaging produced several artifacts; using the first');
        this.emit('deploy:package:ambiguous', { timestamp: Date.now(), candidates, chosen });
      }

      const buildDir = join(entryDir, `b_${nanoid(10)}`);
      await mkdir(buildDir, { recursive: true });
      const finalPath = join(buildDir, chosen);
      await rename(join(outDir, chosen), finalPath);

      const info = await stat(finalPath);
      const artifact = freezeArtifact({
        packageId: manifest.id,
        version: manifest.version,
        path: finalPath,
        checksum: await sha256File(finalPath),
        size: info.size,
        createdAt: new Date().toISOString(),
      });
      await writeSidecar(artifact);
      await writeSidecar(artifact, entryDir);
      return artifact;
    } finally {
      await rm(staging, { recursive: true, force: true });
    }
  }

  /**
   * A cached artifact counts only if its file still matches the recorded checksum.
   */
  private async cachedArtifact(entryDir: string): Promise<Artifact | undefined> {
    const sidecar = await readSidecar(entryDir);
    if (!sidecar) return undefined;

    try {
      const checksum = await sha256File(sidecar.path);
      if (checksum === sidecar.checksum) return sidecar;
      getLogger().warn({ path: sidecar.path }, 'Cached artifact changed on disk; repackaging');
    } catch (err) {
      if (!isMissing(err)) throw err;
    }
    return undefined;
  }

  private async listFiles(dir: string): Promise<string[]> {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  }

  private async checkFile(sourceDir: string, file: string): Promise<string | undefined> {
    const full = resolve(sourceDir, file);
    const rel = relative(sourceDir, full);
    if (rel.startsWith('..') || isAbsolute(rel)) {
      return `"${file}" is outside the source directory`;
    }
    try {
      const info = await stat(full);
      return info.isFile() ? undefined : `"${file}" is not a file`;
    } catch (err) {
      if (isMissing(err)) return `"${file}" not found in source directory`;
      throw err;
    }
  }

  private async assertDirectory(dir: string): Promise<void> {
    try {
      const info = await stat(dir);
      if (info.isDirectory()) return;
    } catch (err) {
      if (!isMissing(err)) throw err;
    }
    throw new PackagingFailedError(`Source directory not found: ${dir}`);
  }
}
