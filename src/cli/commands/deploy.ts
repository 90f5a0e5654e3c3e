/**
 * `tvship deploy <alias> <artifact>` — install, launch and health-check an app.
 */

import { Command } from 'commander';
import { exitCodeForKind } from '../../core/errors.js';
import { loadArtifact } from '../../deploy/artifact.js';
import type { CliContext } from '../context.js';
import { formatDeployment } from '../format.js';

interface DeployOptions {
  json?: boolean;
}

export function createDeployCommand(ctx: CliContext): Command {
  const cmd = new Command('deploy');

  cmd
    .description('Install and launch an artifact on a paired device')
    .argument('<alias>', 'Registered device alias')
    .argument('<artifact>', 'Path to the packaged artifact (.ipk)')
    .option('--json', 'Output the deployment record as JSON')
    .action(async (alias: string, artifactPath: string, options: DeployOptions) => {
      const artifact = await loadArtifact(artifactPath);
      const deployment = await ctx.runtime().deployer.deploy(alias, artifact, { signal: ctx.signal });

      if (options.json) {
        ctx.io.out(JSON.stringify(deployment, null, 2));
      } else {
        for (const line of formatDeployment(deployment)) ctx.io.out(line);
      }

      if (deployment.status === 'Failed') {
        ctx.io.err(`${deployment.reason ?? 'Error'}: ${deployment.error ?? 'deployment failed'}`);
        if (deployment.diagnostic) ctx.io.err(`  ${deployment.diagnostic}`);
        ctx.exitCode = exitCodeForKind(deployment.reason);
      }
    });

  return cmd;
}
