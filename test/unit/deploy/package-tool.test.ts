import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { CommandPackageTool, TIMEOUT_EXIT_CODE } from '../../../src/deploy/package-tool.js';
import { CancelledError, PackagingFailedError } from '../../../src/core/errors.js';
import { tempDir, type TempDir } from '../../helpers/fixtures.js';

// The child is the current Node binary running an inline script
function scriptTool(script: string, timeoutMs = 5000): CommandPackageTool {
  return new CommandPackageTool({ command: process.execPath, args: ['-e', script, '{outDir}'], timeoutMs });
}

describe('CommandPackageTool', () => {
  let dir: TempDir;

  beforeEach(async () => {
    dir = await tempDir();
  });

  afterEach(async () => {
    await dir.cleanup();
  });

  function request(signal?: AbortSignal) {
    return { sourceDir: dir.path, manifestPath: join(dir.path, 'appinfo.json'), outDir: dir.path, signal };
  }

  it('should substitute placeholders in the argument template', () => {
    const tool = new CommandPackageTool({
      command: 'ares-package',
      args: ['{sourceDir}', '--outdir', '{outDir}', '--manifest={manifest}'],
      timeoutMs: 1000,
    });

    expect(tool.argsFor({ sourceDir: '/src/app', manifestPath: '/tmp/appinfo.json', outDir: '/tmp/out' })).toEqual([
      '/src/app',
      '--outdir',
      '/tmp/out',
      '--manifest=/tmp/appinfo.json',
    ]);
  });

  it('should run the command and collect its output', async () => {
    const tool = scriptTool(
      "require('fs').writeFileSync(require('path').join(process.argv[1], 'foo.ipk'), 'ipk-bytes'); console.log('packed')",
    );

    const result = await tool.run(request());

    expect(result).toEqual({ exitCode: 0, output: 'packed\n' });
    expect(await readFile(join(dir.path, 'foo.ipk'), 'utf-8')).toBe('ipk-bytes');
  });

  it('should report a non-zero exit with stderr', async () => {
    const result = await scriptTool("console.error('bad icon'); process.exit(3)").run(request());

    expect(result).toEqual({ exitCode: 3, output: 'bad icon\n' });
  });

  it('should kill a tool that runs too long', async () => {
    const result = await scriptTool('setTimeout(() => {}, 10000)', 100).run(request());

    expect(result).toEqual({ exitCode: TIMEOUT_EXIT_CODE, output: 'packaging tool timed out after 100ms' });
  });

  it('should stop the tool on cancellation', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 50);

    await expect(scriptTool('setTimeout(() => {}, 10000)').run(request(controller.signal))).rejects.toBeInstanceOf(
      CancelledError,
    );
  });

  it('should fail when the command does not exist', async () => {
    const tool = new CommandPackageTool({ command: join(dir.path, 'no-such-tool'), args: [], timeoutMs: 1000 });

    await expect(tool.run(request())).rejects.toBeInstanceOf(PackagingFailedError);
  });
});
