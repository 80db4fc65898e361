/**
 * Scoped console logger.
 *
 * Debug output is gated on `config.get("debug")`, read at each call so that
 * `config.set({ debug: true })` takes effect immediately. The config is
 * loaded when the logger is created, so logging from inside a pull only
 * reads memory.
 */

import { config } from "./config.js";

export interface Logger {
  /** Printed only when the `debug` config flag is on */
  debug(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[iterum:${scope}]`;
  config.load();
  return {
    debug(message, ...details) {
      if (config.get("debug") === true) {
        console.debug(`${prefix} ${message}`, ...details);
      }
    },
    warn(message, ...details) {
      console.warn(`${prefix} ${message}`, ...details);
    },
  };
}
