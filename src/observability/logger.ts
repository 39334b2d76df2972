import { pino, stdSerializers } from 'pino';
import type { Logger as PinoLogger } from 'pino';
import type { LogContext, LogLevel } from './types.js';

/** Structured logger interface for the Engage adapter. */
export interface Logger {
  trace(msg: string, context?: LogContext): void;
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(bindings: Record<string, unknown>): Logger;
}

/**
 * Adapt a pino instance to the `(msg, context)` call shape used across the codebase.
 * pino itself expects the merge object first.
 */
function wrapPino(instance: PinoLogger): Logger {
  const write = (level: LogLevel) => (msg: string, context?: LogContext): void => {
    if (context) {
      instance[level](context, msg);
    } else {
      instance[level](msg);
    }
  };

  return {
    trace: write('trace'),
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    fatal: write('fatal'),
    child(bindings: Record<string, unknown>): Logger {
      return wrapPino(instance.child(bindings));
    },
  };
}

/** Create a structured pino logger instance. */
export function createLogger(options?: { level?: string; name?: string }): Logger {
  const pinoInstance = pino({
    name: options?.name ?? 'engage-bot-adapter',
    level: options?.level ?? process.env['LOG_LEVEL'] ?? 'info',
    transport:
      process.env['NODE_ENV'] === 'development'
        ? { target: 'pino-pretty', options: { colorize: true } }
        : undefined,
    serializers: {
      err: stdSerializers.err,
    },
    redact: {
      paths: [
        'accessToken',
        'authorization',
        'verifyToken',
        'secret',
        '*.accessToken',
        '*.authorization',
        '*.verifyToken',
        '*.secret',
      ],
      censor: '[REDACTED]',
    },
  });

  return wrapPino(pinoInstance);
}
