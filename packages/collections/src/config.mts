/**
 * Process-wide settings for the collection helpers.
 * The only knob today is where diagnostics go: the helpers themselves stay
 * pure, they just report lossy reductions and rejected arguments.
 */

import { ArgumentError } from "./errors.mjs";
import { isLoggerLevel, loggerFactory } from "./logger.mjs";

import type { BaseLogger, LoggerLevels } from "./logger.mjs";

export interface CollectionsConfig {
  /** Replaces the axe-backed default; takes precedence over `logLevel`. */
  logger?: BaseLogger;
  /** Level for a freshly built axe-backed logger. */
  logLevel?: LoggerLevels;
}

let activeLogger: BaseLogger | undefined;

export const configureCollections = (options: CollectionsConfig): void => {
  if (options.logLevel !== undefined && !isLoggerLevel(options.logLevel)) {
    throw new ArgumentError(
      `Unknown log level: ${String(options.logLevel)}`,
      "INVALID_LOG_LEVEL",
      { logLevel: options.logLevel },
    );
  }

  if (options.logger) {
    activeLogger = options.logger;
    return;
  }
  if (options.logLevel) {
    activeLogger = loggerFactory({ level: options.logLevel }).logger;
  }
};

export const getCollectionsLogger = (): BaseLogger => {
  activeLogger ??= loggerFactory().logger;
  return activeLogger;
};

export const resetCollectionsConfig = (): void => {
  activeLogger = undefined;
};
