import Axe from "axe";

export type LoggerLevels =
  | "trace"
  | "debug"
  | "info"
  | "warn"
  | "error"
  | "fatal";
export type LoggerMessage = string | Error;
export type LoggerMeta = Record<string, unknown>;

export type BaseLogger = Record<
  LoggerLevels,
  (message: LoggerMessage, meta?: LoggerMeta) => void
>;

export const LOGGER_LEVELS: readonly LoggerLevels[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
];

export const isLoggerLevel = (value: unknown): value is LoggerLevels =>
  typeof value === "string" && LOGGER_LEVELS.some((level) => level === value);

export interface LoggerFactoryOptions {
  /** Lowest level that reaches the output; defaults to "info" */
  level?: LoggerLevels;
  /** Prefix used by loggers that support names */
  name?: string;
  /** Console-like target; defaults to `console` */
  logger?: Axe.Logger;
  /** Pass whole Error objects (with stack) to the target */
  showStack?: boolean;
}

/**
 * Structured logger backed by axe.
 *
 * Every level is registered with axe so that `trace` and `debug` are not
 * dropped before the level threshold is applied.
 */
export const loggerFactory = (options: LoggerFactoryOptions = {}) => {
  const axeLogger = new Axe({
    level: options.level ?? "info",
    levels: [...LOGGER_LEVELS],
    name: options.name ?? false,
    showStack: options.showStack ?? true,
    appInfo: false,
    ...(options.logger ? { logger: options.logger } : {}),
  });

  const logger: BaseLogger & {
    logMessage: (
      level: LoggerLevels,
      message: LoggerMessage,
      meta?: LoggerMeta,
    ) => void;
  } = {
    logMessage(level, message, meta) {
      void axeLogger[level](message, meta);
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

  return { logger, axeLogger };
};

const discard = (): void => undefined;

/** Logger that drops everything */
export const noopLogger: BaseLogger = {
  trace: discard,
  debug: discard,
  info: discard,
  warn: discard,
  error: discard,
  fatal: discard,
};

export default loggerFactory;
