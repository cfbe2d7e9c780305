import { type Logger, pino } from "pino";
import type { Config } from "./config.js";

export const SERVICE_NAME = "hawk-header-guard";

export function createLogger(options: { level?: Config["logLevel"] } = {}): Logger {
  return pino({
    name: SERVICE_NAME,
    level: options.level ?? "info",
    base: { service: SERVICE_NAME },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
