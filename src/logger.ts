/**
 * Console logger
 *
 * Diagnostics go to stderr so stdout carries only the agent's answers.
 * debug() is silent unless enabled (config `debug` or LOOPWRIGHT_DEBUG).
 */

import { color } from "./colors.js";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createLogger(scope: string, opts?: { debug?: boolean }): Logger {
  const debugEnabled = opts?.debug ?? false;
  const tag = `[${scope}]`;
  return {
    debug(message) {
      if (debugEnabled) console.error(color(`${tag} ${message}`, "dim"));
    },
    info(message) {
      console.error(`${color(tag, "cyan")} ${message}`);
    },
    warn(message) {
      console.warn(color(`${tag} ${message}`, "yellow"));
    },
    error(message) {
      console.error(color(`${tag} ${message}`, "red"));
    },
  };
}

/**
 * Logger that discards everything (tests, embedding)
 */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
