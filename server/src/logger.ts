/**
 * Structured logging via pino, wrapped so call sites pass the message first
 * and an Error (or a data object) second.
 */

import pino, { type Logger as PinoLogger, type LoggerOptions } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerConfig {
  level?: LogLevel;
  /** pino-pretty transport; development only */
  pretty?: boolean;
  base?: Record<string, unknown>;
}

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, error?: Error | Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): Logger;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: "info",
  pretty: false,
  base: { service: "relay-chat" },
};

export function createPinoLogger(config?: LoggerConfig): PinoLogger {
  const merged = { ...DEFAULT_CONFIG, ...config };

  const options: LoggerOptions = {
    level: merged.level,
    base: merged.base,
  };

  if (merged.pretty && merged.level !== "silent") {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }

  return pino(options);
}

export function createLogger(config?: LoggerConfig & { module?: string }): Logger {
  const base = createPinoLogger(config);
  return wrapLogger(config?.module ? base.child({ module: config.module }) : base);
}

function wrapLogger(logger: PinoLogger): Logger {
  return {
    debug: (msg, data) => (data ? logger.debug(data, msg) : logger.debug(msg)),
    info: (msg, data) => (data ? logger.info(data, msg) : logger.info(msg)),
    warn: (msg, data) => (data ? logger.warn(data, msg) : logger.warn(msg)),
    error: (msg, err) => {
      if (err instanceof Error) {
        logger.error({ err }, msg);
      } else if (err) {
        logger.error(err, msg);
      } else {
        logger.error(msg);
      }
    },
    child: (bindings) => wrapLogger(logger.child(bindings)),
  };
}
