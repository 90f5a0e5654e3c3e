import { createHash, type Hash } from 'crypto';
import { createReadStream } from 'fs';
import { readdir, readFile } from 'fs/promises';
import { join, relative, sep } from 'path';

/**
 * Generate a SHA-256 hash of a string
 */
export function sha256(input: string | Buffer): string {
  return createHash('sha256').update(input).digest('hex');
}

/**
 * Create a deterministic cache key from a set of inputs
 */
export function cacheKey(...parts: string[]): string {
  return sha256(parts.join('::'));
}

/**
 * Stream a file through SHA-256.
 */
export function sha256File(path: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hasher = createHash('sha256');
    const stream = createReadStream(path);
    stream.on('data', (chunk) => hasher.update(chunk));
    stream.on('error', reject);
    stream.on('end', () => resolve(hasher.digest('hex')));
  });
}

const IGNORED_NAMES = new Set(['node_modules', '.git', '.DS_Store', 'Thumbs.db']);

/**
 * Content hash of a directory tree: every file's relative path (with `/`
 * separators) and bytes, visited in sorted order.
 */
export async function hashDirectory(root: string): Promise<string> {
  const hasher = createHash('sha256');
  await hashInto(hasher, root, root);
  return hasher.digest('hex');
}

async function hashInto(hasher: Hash, root: string, dir: string): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    if (IGNORED_NAMES.has(entry.name)) continue;
    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      await hashInto(hasher, root, fullPath);
    } else if (entry.isFile()) {
      hasher.update(relative(root, fullPath).split(sep).join('/'));
      hasher.update('\0');
      hasher.update(await readFile(fullPath));
      hasher.update('\0');
    }
  }
}

/**
 * Canonical JSON: object keys sorted recursively so equal values hash equally.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    const entries: Array<[string, unknown]> = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, inner] of entries) {
      sorted[key] = sortKeys(inner);
    }
    return sorted;
  }
  return value;
}
