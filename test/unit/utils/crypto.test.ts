import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { cacheKey, canonicalJson, hashDirectory, sha256, sha256File } from '../../../src/utils/crypto.js';
import { tempDir, writeFiles, type TempDir } from '../../helpers/fixtures.js';

describe('crypto helpers', () => {
  let dir: TempDir;

  beforeEach(async () => {
    dir = await tempDir();
  });

  afterEach(async () => {
    await dir.cleanup();
  });

  it('should hash the empty string to the well-known digest', () => {
    expect(sha256('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });

  it('should hash a file the same as its contents', async () => {
    const file = join(dir.path, 'foo.ipk');
    await writeFile(file, 'ipk-bytes');

    await expect(sha256File(file)).resolves.toBe(sha256('ipk-bytes'));
  });

  it('should sort keys in canonical JSON', () => {
    expect(canonicalJson({ b: 1, a: { d: [2, { f: 3, e: 4 }], c: null } })).toBe(
      '{"a":{"c":null,"d":[2,{"e":4,"f":3}]},"b":1}',
    );
  });

  it('should derive the cache key from joined parts', () => {
    expect(cacheKey('a', 'b')).toBe(sha256('a::b'));
  });

  describe('hashDirectory()', () => {
    it('should ignore VCS metadata and depend on file contents', async () => {
      await writeFiles(dir.path, { 'index.html': 'one', 'js/app.js': 'two' });
      const before = await hashDirectory(dir.path);

      await writeFiles(dir.path, { '.git/HEAD': 'ref: refs/heads/main' });
      expect(await hashDirectory(dir.path)).toBe(before);

      await writeFiles(dir.path, { 'js/app.js': 'changed' });
      expect(await hashDirectory(dir.path)).not.toBe(before);
    });

    it('should distinguish a renamed file', async () => {
      await writeFiles(dir.path, { 'a.js': 'same' });
      const first = await hashDirectory(dir.path);

      const other = await tempDir();
      try {
        await writeFiles(other.path, { 'b.js': 'same' });
        expect(await hashDirectory(other.path)).not.toBe(first);
      } finally {
        await other.cleanup();
      }
    });
  });
});
