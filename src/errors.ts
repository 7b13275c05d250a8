/**
 * Why a team cannot be scheduled as configured.
 */
export type ConfigurationErrorCode =
  | "empty-roster"
  | "duplicate-employee"
  | "invalid-template"
  | "insufficient-headcount"
  | "invalid-input";

/**
 * Thrown when a team's configuration cannot produce a schedule.
 *
 * Generation aborts before any month is built, so callers must not persist
 * anything when they catch this.
 *
 * @category Errors
 */
export class ScheduleConfigurationError extends Error {
  public readonly code: ConfigurationErrorCode;
  public readonly details: Record<string, unknown> | undefined;

  constructor(code: ConfigurationErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "ScheduleConfigurationError";
    this.code = code;
    this.details = details;
  }
}

/**
 * Thrown when a team has no persisted schedule to act on.
 *
 * @category Errors
 */
export class ScheduleNotFoundError extends Error {
  public readonly teamId: string;

  constructor(teamId: string) {
    super(`No schedule found for team '${teamId}'`);
    this.name = "ScheduleNotFoundError";
    this.teamId = teamId;
  }
}

/**
 * Thrown when generating for a team that already has a schedule.
 * Delete the existing schedule first to regenerate.
 *
 * @category Errors
 */
export class ScheduleConflictError extends Error {
  public readonly teamId: string;

  constructor(teamId: string) {
    super(`A schedule for team '${teamId}' already exists`);
    this.name = "ScheduleConflictError";
    this.teamId = teamId;
  }
}

/**
 * Error thrown when the rule oracle service cannot be reached or replies
 * with something unusable.
 *
 * Contains the HTTP status code and raw response data for debugging.
 *
 * @category Oracle
 */
export class RuleOracleError extends Error {
  public readonly status: number;
  public readonly data: unknown;

  constructor(message: string, status: number, data: unknown) {
    super(message);
    this.name = "RuleOracleError";
    this.status = status;
    this.data = data;
  }
}

/**
 * Thrown when environment configuration is present but invalid.
 *
 * @category Errors
 */
export class EngineConfigError extends Error {
  public readonly variables: string[];

  constructor(message: string, variables: string[]) {
    super(message);
    this.name = "EngineConfigError";
    this.variables = variables;
  }
}
