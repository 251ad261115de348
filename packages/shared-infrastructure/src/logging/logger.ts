// Pino-based JSON logger with a minimal typed wrapper.
// - stdout JSON by default, pretty printing when NODE_ENV=development.
// - Child loggers carry taskId/runId bindings.

import pino from 'pino';

export interface LogFields {
  taskId?: string;
  runId?: string;
  [key: string]: unknown;
}

export interface Logger {
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string | Error, fields?: LogFields): void;
  debug(msg: string, fields?: LogFields): void;
  child(bindings: LogFields): Logger;
}

export interface CreateLoggerOptions {
  level?: string;
  name?: string;
  pretty?: boolean;
  /** Write target other than stdout; pretty printing is skipped when set. */
  destination?: pino.DestinationStream;
}

function wrap(instance: pino.Logger): Logger {
  return {
    info(msg, fields) {
      instance.info(fields ?? {}, msg);
    },
    warn(msg, fields) {
      instance.warn(fields ?? {}, msg);
    },
    error(msg, fields) {
      if (msg instanceof Error) {
        instance.error(
          {
            ...(fields ?? {}),
            err: {
              message: msg.message,
              stack: msg.stack,
              name: msg.name,
            },
          },
          msg.message,
        );
      } else {
        instance.error(fields ?? {}, msg);
      }
    },
    debug(msg, fields) {
      instance.debug(fields ?? {}, msg);
    },
    child(bindings) {
      return wrap(instance.child(bindings));
    },
  };
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const level = options.level ?? process.env.LOG_LEVEL ?? 'info';
  if (options.destination) {
    return wrap(pino({ name: options.name, level }, options.destination));
  }
  const pretty = options.pretty ?? process.env.NODE_ENV === 'development';
  return wrap(
    pino({
      name: options.name,
      level,
      transport: pretty
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
            },
          }
        : undefined,
    }),
  );
}

export const logger: Logger = createLogger({ name: 'tunecast' });

