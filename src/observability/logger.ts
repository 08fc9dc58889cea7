import pino from 'pino';
import type { LogContext, LogLevel } from './types.js';

/** Structured logger interface for the admission webhook. */
export interface Logger {
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(bindings: Record<string, unknown>): Logger;
}

/** Adapt pino's `(obj, msg)` call order to the `(msg, context)` interface. */
function wrap(instance: pino.Logger): Logger {
  const log =
    (level: LogLevel) =>
    (msg: string, context?: LogContext): void => {
      if (context) {
        instance[level](context, msg);
      } else {
        instance[level](msg);
      }
    };

  return {
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
    fatal: log('fatal'),
    child: (bindings) => wrap(instance.child(bindings)),
  };
}

/** Create a structured pino logger instance. */
export function createLogger(options?: { level?: string; name?: string }): Logger {
  const pinoInstance = pino({
    name: options?.name ?? 'approvaltask-admission',
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
        'authorization',
        'token',
        'password',
        'secret',
        '*.authorization',
        '*.token',
        '*.password',
      ],
      censor: '[REDACTED]',
    },
  });

  return wrap(pinoInstance);
}
