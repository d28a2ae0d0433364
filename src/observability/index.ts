// Structured logging
export type { LogContext, LogLevel } from './types.js';

export type { Logger, LoggerOptions } from './logger.js';
export { createLogger, createSilentLogger } from './logger.js';
