import Axe from "axe";

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
  /** @default "warn" */
  level?: LoggerLevels;
  silent?: boolean;
  name?: string;
}

/**
 * Builds the toolkit logger on top of axe, with app info parsing off.
 */
export const loggerFactory = (options: LoggerFactoryOptions = {}) => {
  const axeLogger = new Axe({
    level: options.level ?? "warn",
    silent: options.silent ?? false,
    name: options.name ?? false,
    appInfo: false,
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

export default loggerFactory;
