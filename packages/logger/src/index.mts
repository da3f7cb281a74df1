import { pino } from "pino";

import type { DestinationStream, LoggerOptions } from "pino";

export type LoggerLevels =
  | "info"
  | "trace"
  | "debug"
  | "warn"
  | "error"
  | "fatal";
export type LoggerMessage = string | Error;
export type LoggerMeta = Record<string, unknown>;

export type BaseLogger = Record<
  LoggerLevels,
  (message: LoggerMessage, meta?: LoggerMeta) => void
>;

export type LoggerFactoryOptions = LoggerOptions;

/**
 * Level used when neither the options nor LOG_LEVEL name one
 */
export const DEFAULT_LOG_LEVEL = "info";

/**
 * Creates a structured logger backed by pino.
 * Errors are recorded under `err` so pino's error serializer applies.
 */
export const loggerFactory = (
  options: LoggerFactoryOptions = {},
  destination?: DestinationStream,
) => {
  const resolved: LoggerOptions = {
    ...options,
    level: options.level ?? process.env.LOG_LEVEL ?? DEFAULT_LOG_LEVEL,
  };
  const pinoLogger =
    destination === undefined ? pino(resolved) : pino(resolved, destination);

  const logger: BaseLogger & {
    logMessage: (
      level: LoggerLevels,
      message: LoggerMessage,
      meta?: LoggerMeta,
    ) => void;
  } = {
    logMessage(level, message, meta) {
      if (message instanceof Error) {
        pinoLogger[level]({ ...meta, err: message }, message.message);
        return;
      }
      pinoLogger[level](meta ?? {}, message);
    },
    trace: function (message, meta?) {
      this.logMessage("trace", message, meta);
    },
    debug: function (message, meta?) {
      this.logMessage("debug", message, meta);
    },
    info: function (message, meta?) {
      this.logMessage("info", message, meta);
    },
    warn: function (message, meta?) {
      this.logMessage("warn", message, meta);
    },
    error: function (message, meta?) {
      this.logMessage("error", message, meta);
    },
    fatal: function (message, meta?) {
      this.logMessage("fatal", message, meta);
    },
  };

  return { logger, pinoLogger };
};

export default loggerFactory;
