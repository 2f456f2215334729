import { DK_CONSTANTS } from "./constants";

/**
 * Sink for diagnostic messages. Only sizes, versions and counts are ever
 * passed in `data`; never passwords, seeds or key bytes.
 */
export interface KeyLogger {
  debug(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
}

export const silentLogger: KeyLogger = {
  debug() {},
  warn() {}
};

export const consoleLogger: KeyLogger = {
  debug(message, data) {
    if (data) console.debug(`${DK_CONSTANTS.LOG_PREFIX} ${message}`, data);
    else console.debug(`${DK_CONSTANTS.LOG_PREFIX} ${message}`);
  },
  warn(message, data) {
    if (data) console.warn(`${DK_CONSTANTS.LOG_PREFIX} ${message}`, data);
    else console.warn(`${DK_CONSTANTS.LOG_PREFIX} ${message}`);
  }
};
