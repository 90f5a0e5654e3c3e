/**
 * Log line filters.
 *
 * `text` is either `/pattern/flags` (regular expression) or a plain
 * case-insensitive substring. `level` drops lines below that severity.
 */

import type { LogLevel, LogLine } from '../device/types.js';

export type LogFilter = (line: LogLine) => boolean;

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const REGEX_LITERAL = /^\/(.+)\/([imsu]*)$/;

export const acceptAll: LogFilter = () => true;

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

export function parseLogLevel(value: string): LogLevel {
  const level = value.toLowerCase();
  if (!isLogLevel(level)) {
    throw new Error(`Unknown log level "${value}" (expected one of ${LOG_LEVELS.join(', ')})`);
  }
  return level;
}

export function parseLogFilter(text?: string, level?: LogLevel): LogFilter {
  const matchers: LogFilter[] = [];

  if (level) {
    const min = LEVEL_RANK[level];
    matchers.push((line) => LEVEL_RANK[line.level] >= min);
  }

  if (text) {
    const literal = REGEX_LITERAL.exec(text);
    if (literal) {
      let pattern: RegExp;
      try {
        pattern = new RegExp(literal[1] ?? '', literal[2]);
      } catch (err) {
        throw new Error(`Invalid filter pattern ${text}: ${err instanceof Error ? err.message : String(err)}`);
      }
      matchers.push((line) => pattern.test(line.text));
    } else {
      const needle = text.toLowerCase();
      matchers.push((line) => line.text.toLowerCase().includes(needle));
    }
  }

  if (matchers.length === 0) return acceptAll;
  return (line) => matchers.every((match) => match(line));
}
