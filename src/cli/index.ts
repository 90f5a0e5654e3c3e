/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command, CommanderError } from 'commander';
import { exitCodeFor, toError } from '../core/errors.js';
import { VERSION, NAME } from '../version.js';
import { bootstrap, type CliContext, type CliIO, type GlobalOptions, type Runtime } from './context.js';
import { formatError } from './format.js';
import { createDeployCommand } from './commands/deploy.js';
import { createDevicesCommand } from './commands/devices.js';
import { createDiscoverCommand } from './commands/discover.js';
import { createHistoryCommand } from './commands/history.js';
import { createInitCommand } from './commands/init.js';
import { createLogsCommand } from './commands/logs.js';
import { createPackageCommand } from './commands/package.js';
import { createPairCommand } from './commands/pair.js';
import { createRemoveCommand } from './commands/remove.js';

export interface RunOptions {
  io?: CliIO;
  signal?: AbortSignal;
  /** Builds the runtime from the global options (defaults to config + real device transport) */
  createRuntime?: (globals: GlobalOptions) => Runtime;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export function createCLI(ctx: CliContext): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Pair smart TVs, package web apps, deploy them and stream their logs')
    .option('-v, --verbose', 'Log debug output to stderr')
    .option('--data-dir <dir>', 'Directory for the device registry, artifacts and history');

  program.addCommand(createDiscoverCommand(ctx));
  program.addCommand(createPairCommand(ctx));
  program.addCommand(createPackageCommand(ctx));
  program.addCommand(createDeployCommand(ctx));
  program.addCommand(createLogsCommand(ctx));
  program.addCommand(createRemoveCommand(ctx));
  program.addCommand(createDevicesCommand(ctx));
  program.addCommand(createHistoryCommand(ctx));
  program.addCommand(createInitCommand(ctx));

  return program;
}

/**
 * Parse `argv`, run the command and return the process exit code.
 */
export async function run(argv: string[], options: RunOptions = {}): Promise<number> {
  const io = options.io ?? consoleIO;
  const factory = options.createRuntime ?? bootstrap;
  let runtime: Runtime | undefined;

  const ctx: CliContext = {
    io,
    signal: options.signal ?? new AbortController().signal,
    exitCode: 0,
    globals: () => program.opts<GlobalOptions>(),
    runtime: () => {
      runtime ??= factory(ctx.globals());
      return runtime;
    },
  };

  const program = createCLI(ctx);
  program.exitOverride();
  program.configureOutput({
    writeOut: (text) => io.out(text.trimEnd()),
    writeErr: (text) => io.err(text.trimEnd()),
  });

  let code: number;
  try {
    await program.parseAsync(argv);
    code = ctx.exitCode;
  } catch (err) {
    if (err instanceof CommanderError) {
      code = err.exitCode;
    } else {
      const error = toError(err);
      io.err(formatError(error));
      code = exitCodeFor(error);
    }
  }

  if (runtime) {
    try {
      await runtime.close();
    } catch (err) {
      io.err(formatError(toError(err)));
      if (code === 0) code = 1;
    }
  }
  return code;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const controller = new AbortController();
  const onSigint = (): void => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    controller.abort();
  };
  process.on('SIGINT', onSigint);

  try {
    process.exitCode = await run(argv, { signal: controller.signal });
  } finally {
    process.off('SIGINT', onSigint);
  }
}
