import pino, { type Logger } from "pino";
import type { LoggingConfig } from "../schemas/server-config.js";

export type { Logger } from "pino";

/** The slice of a logger the listener lifecycle writes to. */
export type LifecycleLogger = Pick<Logger, "info" | "debug">;

export function createLogger(config: LoggingConfig, name = "gatehouse"): Logger {
  const usePretty = config.pretty || process.env.NODE_ENV !== "production";

  return pino({
    name,
    level: config.level,
    ...(usePretty ? { transport: { target: "pino-pretty" } } : {}),
  });
}
