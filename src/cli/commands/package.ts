/**
 * `tvship package <sourceDir>` — validate the app manifest and build an artifact.
 */

import { Command } from 'commander';
import { readFile } from 'fs/promises';
import { join, resolve } from 'path';
import { InvalidManifestError } from '../../core/errors.js';
import { isMissing } from '../../deploy/artifact.js';
import { MANIFEST_FILE } from '../../deploy/packager.js';
import type { CliContext } from '../context.js';

interface PackageOptions {
  manifest?: string;
  json?: boolean;
}

export function createPackageCommand(ctx: CliContext): Command {
  const cmd = new Command('package');

  cmd
    .description('Package a web app directory into an installable artifact')
    .argument('<sourceDir>', 'App source directory')
    .option('-m, --manifest <file>', `App manifest (default: <sourceDir>/${MANIFEST_FILE})`)
    .option('--json', 'Output the artifact as JSON')
    .action(async (sourceDir: string, options: PackageOptions) => {
      const manifestPath = resolve(options.manifest ?? join(sourceDir, MANIFEST_FILE));
      const manifest = await readManifest(manifestPath);
      const artifact = await ctx.runtime().packager.package(sourceDir, manifest, { signal: ctx.signal });

      if (options.json) {
        ctx.io.out(JSON.stringify(artifact, null, 2));
        return;
      }
      ctx.io.out(`Packaged ${artifact.packageId}@${artifact.version}`);
      ctx.io.out(`  path     ${artifact.path}`);
      ctx.io.out(`  sha256   ${artifact.checksum}`);
      ctx.io.out(`  size     ${artifact.size} bytes`);
    });

  return cmd;
}

export async function readManifest(path: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    if (isMissing(err)) {
      throw new InvalidManifestError([{ field: 'manifest', message: `${path} not found` }]);
    }
    throw err;
  }

  try {
    return JSON.parse(raw);
  } catch {
    throw new InvalidManifestError([{ field: 'manifest', message: `${path} is not valid JSON` }]);
  }
}
