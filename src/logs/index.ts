export { LogRelay, LogSession } from './log-relay.js';
export type { LogRelayConfig, LogRelayDeps, LogSessionStats, OpenLogsOptions } from './log-relay.js';
export { LOG_LEVELS, acceptAll, isLogLevel, parseLogFilter, parseLogLevel } from './filter.js';
export type { LogFilter } from './filter.js';
