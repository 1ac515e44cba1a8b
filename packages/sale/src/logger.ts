/**
 * Logger factory.
 *
 * Pretty output through pino-pretty when asked for (development),
 * plain JSON lines otherwise.
 */

import pino from "pino";
import type { Logger } from "pino";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export interface LoggerOptions {
  readonly level?: LogLevel;
  readonly pretty?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    level: options.level ?? "info",
    ...(options.pretty === true ? { transport: { target: "pino-pretty" } } : {}),
  });
}

/** A logger that drops everything. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
