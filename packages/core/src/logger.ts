/**
 * Scoped console logging.
 *
 * Every line is prefixed with `[weft:<scope>]`. Debug lines are only written
 * when `config.isDebug()` is true, so call sites can log freely on hot paths
 * that run once per assembly.
 *
 * @example
 * ```typescript
 * const log = createLogger("compile");
 * log.debug(`assembled ${parser.name}`); // [weft:compile] assembled OneOf
 * ```
 */

import { config } from "./config.js";
import { unreachable } from "./safety.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Destination for formatted log lines (default: the console). */
export type LogSink = (level: LogLevel, line: string, details: readonly unknown[]) => void;

export interface Logger {
  readonly scope: string;
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export const consoleSink: LogSink = (level, line, details) => {
  switch (level) {
    case "debug":
      console.debug(line, ...details);
      break;
    case "info":
      console.info(line, ...details);
      break;
    case "warn":
      console.warn(line, ...details);
      break;
    case "error":
      console.error(line, ...details);
      break;
    default:
      unreachable(level);
  }
};

export function createLogger(scope: string, sink: LogSink = consoleSink): Logger {
  const prefix = `[weft:${scope}]`;
  const write = (level: LogLevel, message: string, details: unknown[]): void => {
    sink(level, `${prefix} ${message}`, details);
  };

  return {
    scope,
    debug(message, ...details) {
      if (!config.isDebug()) return;
      write("debug", message, details);
    },
    info(message, ...details) {
      write("info", message, details);
    },
    warn(message, ...details) {
      write("warn", message, details);
    },
    error(message, ...details) {
      write("error", message, details);
    },
  };
}
