/**
 * CommandPackageTool — runs the platform packaging CLI (ares-package by
 * default) as a child process.
 *
 * `{sourceDir}`, `{manifest}` and `{outDir}` in the argument list are
 * replaced per run. The child is killed on timeout or cancellation.
 */

import { spawn } from 'node:child_process';
import { CancelledError, PackagingFailedError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import type { PackageTool, PackageToolRequest, PackageToolResult } from './types.js';

export interface CommandPackageToolOptions {
  command: string;
  args: string[];
  timeoutMs: number;
}

/** Exit code reported when the tool is killed for running too long */
export const TIMEOUT_EXIT_CODE = 124;

export class CommandPackageTool implements PackageTool {
  constructor(private readonly options: CommandPackageToolOptions) {}

  /**
   * Expand the argument template for one run.
   */
  argsFor(request: PackageToolRequest): string[] {
    const vars: Record<string, string> = {
      sourceDir: request.sourceDir,
      manifest: request.manifestPath,
      outDir: request.outDir,
    };
    return this.options.args.map((arg) =>
      arg.replace(/\{(sourceDir|manifest|outDir)\}/g, (_match, name: string) => vars[name] ?? ''),
    );
  }

  run(request: PackageToolRequest): Promise<PackageToolResult> {
    const { command, timeoutMs } = this.options;
    const { signal } = request;
    const args = this.argsFor(request);

    return new Promise<PackageToolResult>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new CancelledError('package'));
        return;
      }

      getLogger().debug({ command, args }, 'Running packaging tool');
      const child = spawn(command, args, { cwd: request.sourceDir, stdio: ['ignore', 'pipe', 'pipe'] });
      const chunks: Buffer[] = [];
      let timedOut = false;
      let cancelled = false;

      child.stdout.on('data', (chunk: Buffer) => chunks.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => chunks.push(chunk));

      const timer = setTimeout(() => {
        timedOut = true;
        child.kill('SIGTERM');
      }, timeoutMs);
      const onAbort = (): void => {
        cancelled = true;
        child.kill('SIGTERM');
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      const cleanup = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };

      child.once('error', (err) => {
        cleanup();
        reject(new PackagingFailedError(`Cannot run packaging tool "${command}"`, err.message, err));
      });

      child.once('close', (code) => {
        cleanup();
        const output = Buffer.concat(chunks).toString('utf-8');
        if (cancelled) {
          reject(new CancelledError('package'));
        } else if (timedOut) {
          resolve({
            exitCode: TIMEOUT_EXIT_CODE,
            output: `${output}\npackaging tool timed out after ${timeoutMs}ms`.trim(),
          });
        } else {
          resolve({ exitCode: code ?? 1, output });
        }
      });
    });
  }
}
