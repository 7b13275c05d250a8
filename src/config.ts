import * as z from "zod";
import { EngineConfigError } from "./errors.js";

export const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EngineEnvSchema = z.object({
  ROTA_LOG_LEVEL: LogLevelSchema.default("info"),
  ROTA_MAX_ATTEMPTS: positiveInt(25),
  ROTA_DEADLINE_MS: positiveInt(30_000),
  ROTA_ORACLE_URL: z.string().url().optional(),
  ROTA_ORACLE_TIMEOUT_MS: positiveInt(10_000),
});

export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Runtime settings read from the environment.
 *
 * - `logLevel`: pino level (`ROTA_LOG_LEVEL`, default `info`)
 * - `maxAttempts`: retries per month before the generator falls back to
 *   round-robin (`ROTA_MAX_ATTEMPTS`, default 25)
 * - `deadlineMs`: budget for a validate or repair call (`ROTA_DEADLINE_MS`)
 * - `oracle`: advisory rule oracle, only when `ROTA_ORACLE_URL` is set
 */
export interface EngineConfig {
  logLevel: LogLevel;
  maxAttempts: number;
  deadlineMs: number;
  oracle: { baseUrl: string; timeoutMs: number } | null;
}

/**
 * Parses engine settings from an environment map.
 * Unset variables take their defaults; set but malformed ones throw
 * {@link EngineConfigError} naming every offending variable.
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  // Empty strings count as unset.
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith("ROTA_") && value !== ""),
  );

  const parsed = EngineEnvSchema.safeParse(present);
  if (!parsed.success) {
    const variables = [...new Set(parsed.error.issues.map((issue) => String(issue.path[0])))];
    throw new EngineConfigError(
      `Invalid engine configuration: ${variables.join(", ")}`,
      variables,
    );
  }

  const values = parsed.data;
  return {
    logLevel: values.ROTA_LOG_LEVEL,
    maxAttempts: values.ROTA_MAX_ATTEMPTS,
    deadlineMs: values.ROTA_DEADLINE_MS,
    oracle: values.ROTA_ORACLE_URL
      ? { baseUrl: values.ROTA_ORACLE_URL, timeoutMs: values.ROTA_ORACLE_TIMEOUT_MS }
      : null,
  };
}
