/**
 * In-process PackageTool that writes files into the requested output
 * directory instead of running the platform CLI.
 */

import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { PackageTool, PackageToolRequest, PackageToolResult } from '../../src/deploy/types.js';

export type PackageBehavior = (request: PackageToolRequest) => Promise<PackageToolResult> | PackageToolResult;

/** Writes each `name → content` file and exits 0 */
export function writesFiles(files: Record<string, string>, output = ''): PackageBehavior {
  return async (request) => {
    for (const [name, content] of Object.entries(files)) {
      await writeFile(join(request.outDir, name), content);
    }
    return { exitCode: 0, output };
  };
}

export function exitsWith(exitCode: number, output: string): PackageBehavior {
  return () => ({ exitCode, output });
}

export class FakePackageTool implements PackageTool {
  readonly calls: PackageToolRequest[] = [];

  constructor(private behavior: PackageBehavior = writesFiles({ 'foo.ipk': 'ipk-bytes' })) {}

  setBehavior(behavior: PackageBehavior): void {
    this.behavior = behavior;
  }

  async run(request: PackageToolRequest): Promise<PackageToolResult> {
    this.calls.push(request);
    return this.behavior(request);
  }
}
