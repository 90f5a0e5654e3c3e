/**
 * `tvship logs <alias>` — stream an app's logs until Ctrl-C.
 */

import { Command } from 'commander';
import { parseLogFilter, parseLogLevel } from '../../logs/filter.js';
import { formatDuration } from '../../utils/timer.js';
import type { CliContext } from '../context.js';
import { formatLogLine, parseCursor } from '../format.js';

interface LogsOptions {
  filter?: string;
  level?: string;
  cursor?: number;
  json?: boolean;
}

interface ReconnectEvent {
  delay: number;
  reason: string;
}

export function createLogsCommand(ctx: CliContext): Command {
  const cmd = new Command('logs');

  cmd
    .description('Stream runtime logs from a paired device')
    .argument('<alias>', 'Registered device alias')
    .option('-f, --filter <text>', 'Only lines containing text, or matching /regex/flags')
    .option('-l, --level <level>', 'Minimum level: debug, info, warn, error')
    .option('--cursor <seq>', 'Resume after this sequence number', parseCursor)
    .option('--json', 'Print each line as JSON')
    .action(async (alias: string, options: LogsOptions) => {
      const filter = parseLogFilter(options.filter, options.level ? parseLogLevel(options.level) : undefined);
      const session = await ctx.runtime().relay.openLogs(alias, filter, {
        cursor: options.cursor,
        signal: ctx.signal,
      });

      session.on('logs:session:reconnecting', (event: ReconnectEvent) => {
        ctx.io.err(`-- connection lost (${event.reason}); reconnecting in ${formatDuration(event.delay)}`);
      });

      for await (const line of session) {
        ctx.io.out(options.json ? JSON.stringify(line) : formatLogLine(line));
      }

      if (session.cursor !== undefined) {
        ctx.io.err(`-- stopped at cursor ${session.cursor}`);
      }
    });

  return cmd;
}
