import pino from 'pino';
import type { LogContext } from './types.js';

/** Structured logger interface used across the bridge. */
export interface Logger {
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(bindings: Record<string, unknown>): Logger;
}

type PinoLogFn = (obj: object, msg?: string) => void;

/**
 * Adapt pino's `(obj, msg)` call order to the `(msg, context)` order the
 * rest of the codebase uses.
 */
function wrap(instance: pino.Logger): Logger {
  const at = (fn: PinoLogFn) => (msg: string, context?: LogContext): void => {
    fn(context ?? {}, msg);
  };
  return {
    debug: at(instance.debug.bind(instance)),
    info: at(instance.info.bind(instance)),
    warn: at(instance.warn.bind(instance)),
    error: at(instance.error.bind(instance)),
    fatal: at(instance.fatal.bind(instance)),
    child: (bindings) => wrap(instance.child(bindings)),
  };
}

/** Create a structured pino logger instance. */
export function createLogger(options?: { level?: string; name?: string }): Logger {
  const pinoInstance = pino({
    name: options?.name ?? 'research-stream-bridge',
    level: options?.level ?? process.env['LOG_LEVEL'] ?? 'info',
    transport:
      process.env['NODE_ENV'] === 'development'
        ? { target: 'pino-pretty', options: { colorize: true } }
        : undefined,
    serializers: {
      err: pino.stdSerializers.err,
    },
    redact: {
      paths: [
        'apiKey',
        'authorization',
        'password',
        'secret',
        '*.apiKey',
        '*.password',
        '*.authorization',
      ],
      censor: '[REDACTED]',
    },
  });

  return wrap(pinoInstance);
}
