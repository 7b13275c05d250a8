import { pino, type Logger } from "pino";
import { LogLevelSchema, type LogLevel } from "./config.js";

export type { Logger } from "pino";

/**
 * Creates the engine's structured logger.
 */
export function createLogger(level: LogLevel = "info"): Logger {
  return pino({ name: "rota-engine", level });
}

/**
 * Fallback for components constructed without a logger. Quiet unless
 * `ROTA_LOG_LEVEL` asks otherwise.
 */
export const defaultLogger: Logger = pino({
  name: "rota-engine",
  level: LogLevelSchema.catch("warn").parse(process.env.ROTA_LOG_LEVEL),
});
