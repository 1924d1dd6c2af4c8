/**
 * lazymc
 *
 * Configuration resolution for a proxy that wakes a game server on demand
 * and puts it to sleep when idle.
 *
 * @packageDocumentation
 */

export * from './config/index.js';
export { Logger } from './utils/logger.js';
export type { LogEntry, LogLevel, LoggerOptions, LogSink } from './utils/logger.js';
