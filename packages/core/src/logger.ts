/**
 * Scoped debug logging.
 *
 * Lines are written through a replaceable writer (default: console.log).
 * Debug lines are only emitted while `config.get("debug")` is true; the flag
 * is read on every call so tests and CLIs can toggle it at runtime.
 *
 * @example
 * ```typescript
 * const log = createLogger("reduction");
 * log.debug("swapped rows 1 and 3");
 * // [decimatrix:reduction] swapped rows 1 and 3
 * ```
 */

import { config } from "./config.js";

export interface Logger {
  readonly scope: string;
  debug(message: string): void;
  warn(message: string): void;
}

export interface LoggerOptions {
  /** Custom writer function (default: console.log) */
  writer?: (line: string) => void;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const writer = options.writer ?? ((line: string) => console.log(line));
  const prefix = `[decimatrix:${scope}]`;

  return {
    scope,
    debug(message) {
      if (config.get("debug")) {
        writer(`${prefix} ${message}`);
      }
    },
    warn(message) {
      writer(`${prefix} warning: ${message}`);
    },
  };
}
