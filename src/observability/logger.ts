import pino from 'pino';
import type { LogContext } from './types.js';

/** Structured logger interface for envkeep. */
export interface Logger {
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(bindings: Record<string, unknown>): Logger;
}

export interface LoggerOptions {
  level?: string;
  name?: string;
}

/** Fields that may hold key material or passphrases. */
const REDACT_PATHS = [
  'passphrase',
  'password',
  'secret',
  'secretMaterial',
  'value',
  '*.passphrase',
  '*.password',
  '*.secretMaterial',
  '*.value',
];

function wrap(instance: pino.Logger): Logger {
  return {
    debug: (msg, context) => instance.debug(context ?? {}, msg),
    info: (msg, context) => instance.info(context ?? {}, msg),
    warn: (msg, context) => instance.warn(context ?? {}, msg),
    error: (msg, context) => instance.error(context ?? {}, msg),
    fatal: (msg, context) => instance.fatal(context ?? {}, msg),
    child: (bindings) => wrap(instance.child(bindings)),
  };
}

/**
 * Create a structured pino logger writing to stderr.
 * stdout is reserved for command output (`envkeep load`, `envkeep decrypt`).
 */
export function createLogger(options?: LoggerOptions): Logger {
  const baseOptions: pino.LoggerOptions = {
    name: options?.name ?? 'envkeep',
    level: options?.level ?? process.env['ENVKEEP_LOG_LEVEL'] ?? 'warn',
    serializers: {
      err: pino.stdSerializers.err,
    },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
  };

  if (process.env['NODE_ENV'] === 'development') {
    return wrap(
      pino({
        ...baseOptions,
        transport: { target: 'pino-pretty', options: { colorize: true, destination: 2 } },
      }),
    );
  }

  return wrap(pino(baseOptions, pino.destination(2)));
}

/** Logger that drops everything; used by tests and library callers that bring none. */
export function createSilentLogger(): Logger {
  return wrap(pino({ level: 'silent' }));
}
