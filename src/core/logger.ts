import pino from 'pino';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';

const DEFAULT_LOG_DIR = join(homedir(), '.tvship', 'logs');

export type Logger = pino.Logger;

export interface LoggerOptions {
  verbose?: boolean;
  level?: pino.LevelWithSilent;
  /** Directory for the JSON log file (ignored when verbose) */
  logDir?: string;
}

function ensureLogDir(dir: string): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

export function createLogger(name: string = 'tvship', options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'debug';

  if (options.verbose) {
    return pino({
      name,
      level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 },
      },
    });
  }

  const logDir = options.logDir ?? DEFAULT_LOG_DIR;
  ensureLogDir(logDir);

  return pino({
    name,
    level,
    transport: {
      target: 'pino/file',
      options: { destination: join(logDir, 'tvship.log'), mkdir: true },
    },
  });
}

let _logger: Logger | null = null;

export function getLogger(): Logger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}

export function setLogger(logger: Logger): void {
  _logger = logger;
}
