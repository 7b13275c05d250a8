import { loadEngineConfig, type EngineConfig } from "./config.js";
import type { DeadlineOptions } from "./deadline.js";
import { runGeneration, type GenerateOptions, type MonthReport } from "./engine/generator.js";
import { ScheduleConfigurationError, ScheduleConflictError, ScheduleNotFoundError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { HttpRuleOracle } from "./oracle/client.js";
import type { OracleReport, RuleOracle } from "./oracle/oracle.types.js";
import { repairSchedule } from "./repair/repairer.js";
import type { RepairReport } from "./repair/repair.types.js";
import type { ScheduleRecord, ScheduleStore } from "./store/schedule-store.js";
import { TeamWriteLock } from "./store/team-lock.js";
import { InMemoryViolationCache, type ViolationCache } from "./store/violation-cache.js";
import type { Employee, TeamConfiguration } from "./types.js";
import { describeRules } from "./validation/rules/registry.js";
import { validateSchedule } from "./validation/validator.js";
import type { ValidationReport } from "./validation/violation.types.js";

const DEFAULT_ORACLE_TIMEOUT_MS = 10_000;

export interface RotaServiceOptions {
  store: ScheduleStore;
  /** Defaults to {@link loadEngineConfig} over `process.env`. */
  config?: EngineConfig;
  logger?: Logger;
  /**
   * Advisory reviewer. Defaults to an {@link HttpRuleOracle} when the config
   * names an oracle URL; pass `null` to disable.
   */
  oracle?: RuleOracle | null;
  cache?: ViolationCache;
  lock?: TeamWriteLock;
  /** Clock for `generatedOn`, cache timestamps and deadlines. */
  now?: () => Date;
}

export interface GenerationResult {
  record: ScheduleRecord;
  months: MonthReport[];
}

export interface ServiceValidationResult {
  report: ValidationReport;
  /** The oracle's verdict, or null when no oracle ran or it failed. */
  oracle: OracleReport | null;
}

/**
 * Team-facing operations over a schedule store.
 *
 * Writes for one team (generate, repair, delete) are serialized through a
 * {@link TeamWriteLock}; validation reads without locking. Validation and
 * repair each get `config.deadlineMs` on the service clock; when it expires
 * validation reports the last known violations and repair leaves the schedule
 * as stored.
 *
 * @example
 * ```typescript
 * const service = new RotaService({ store: new InMemoryScheduleStore() });
 * await service.generate("noc", team, 6);
 * const { report } = await service.validate("noc", team.roster);
 * if (!report.isValid) await service.repair("noc", team.roster);
 * ```
 */
export class RotaService {
  #store: ScheduleStore;
  #config: EngineConfig;
  #logger: Logger;
  #oracle: RuleOracle | null;
  #cache: ViolationCache;
  #lock: TeamWriteLock;
  #now: () => Date;

  constructor(options: RotaServiceOptions) {
    this.#store = options.store;
    this.#config = options.config ?? loadEngineConfig();
    this.#logger = options.logger ?? createLogger(this.#config.logLevel);
    this.#cache = options.cache ?? new InMemoryViolationCache();
    this.#lock = options.lock ?? new TeamWriteLock();
    this.#now = options.now ?? (() => new Date());

    if (options.oracle !== undefined) {
      this.#oracle = options.oracle;
    } else if (this.#config.oracle) {
      this.#oracle = new HttpRuleOracle(fetch, this.#config.oracle.baseUrl);
    } else {
      this.#oracle = null;
    }
  }

  /**
   * Generates and stores a schedule for a team that has none.
   *
   * @throws {ScheduleConflictError} when the team already has a schedule
   * @throws {ScheduleConfigurationError} when the team cannot be scheduled; nothing is stored
   */
  async generate(
    teamId: string,
    team: TeamConfiguration,
    months: number,
    options: Omit<GenerateOptions, "logger" | "maxAttempts"> = {},
  ): Promise<GenerationResult> {
    const log = this.#logger.child({ teamId });

    return this.#lock.runExclusive(teamId, async () => {
      if (await this.#store.get(teamId)) {
        throw new ScheduleConflictError(teamId);
      }

      try {
        const run = runGeneration(team, months, {
          ...options,
          maxAttempts: this.#config.maxAttempts,
          logger: log,
        });
        const record: ScheduleRecord = { teamId, schedule: run.schedule, generatedOn: this.#now() };
        await this.#store.put(record);
        this.#cache.clear(teamId);
        log.info({ months, seed: run.seed }, "schedule generated");
        return { record, months: run.months };
      } catch (error) {
        if (error instanceof ScheduleConfigurationError) {
          log.warn({ code: error.code, details: error.details }, error.message);
        }
        throw error;
      }
    });
  }

  #deadline(): DeadlineOptions {
    const clock = () => this.#now().getTime();
    return { deadline: clock() + this.#config.deadlineMs, clock };
  }

  /** @throws {ScheduleNotFoundError} */
  async getSchedule(teamId: string): Promise<ScheduleRecord> {
    const record = await this.#store.get(teamId);
    if (!record) throw new ScheduleNotFoundError(teamId);
    return record;
  }

  /** @throws {ScheduleNotFoundError} */
  async deleteSchedule(teamId: string): Promise<void> {
    await this.#lock.runExclusive(teamId, async () => {
      const deleted = await this.#store.delete(teamId);
      if (!deleted) throw new ScheduleNotFoundError(teamId);
      this.#cache.clear(teamId);
      this.#logger.info({ teamId }, "schedule deleted");
    });
  }

  /**
   * Validates the team's stored schedule, then asks the oracle (if any) for
   * a second opinion. The oracle only ever adds notes.
   *
   * @throws {ScheduleNotFoundError}
   */
  async validate(
    teamId: string,
    roster: readonly Employee[],
    options: { peoplePerShift?: number; useOracle?: boolean } = {},
  ): Promise<ServiceValidationResult> {
    const log = this.#logger.child({ teamId });
    const record = await this.getSchedule(teamId);

    const report = validateSchedule(record.schedule, roster, {
      ...this.#deadline(),
      peoplePerShift: options.peoplePerShift,
      lastKnown: this.#cache.get(teamId)?.violations,
    });
    if (report.completed) {
      this.#cache.set(teamId, report.violations, this.#now());
    } else {
      log.warn({ deadlineMs: this.#config.deadlineMs }, "validation deadline expired");
    }

    if (!this.#oracle || options.useOracle === false) {
      return { report, oracle: null };
    }

    const timeoutMs = this.#config.oracle?.timeoutMs ?? DEFAULT_ORACLE_TIMEOUT_MS;
    try {
      const verdict = await this.#oracle.check(record.schedule, describeRules(), {
        signal: AbortSignal.timeout(timeoutMs),
      });
      const notes = verdict.is_valid
        ? [...report.notes]
        : [...report.notes, `Rule oracle (advisory) reported ${verdict.violations.length} violation(s)`];
      log.info({ oracleValid: verdict.is_valid }, "rule oracle consulted");
      return { report: { ...report, notes }, oracle: verdict };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.warn({ err: error }, "rule oracle unavailable");
      return {
        report: { ...report, notes: [...report.notes, `Rule oracle unavailable: ${message}`] },
        oracle: null,
      };
    }
  }

  /**
   * Repairs the team's stored schedule and stores the result when any change
   * was accepted. A valid schedule is left alone.
   *
   * @throws {ScheduleNotFoundError}
   */
  async repair(
    teamId: string,
    roster: readonly Employee[],
    options: { peoplePerShift?: number } = {},
  ): Promise<RepairReport> {
    const log = this.#logger.child({ teamId });

    return this.#lock.runExclusive(teamId, async () => {
      const record = await this.getSchedule(teamId);
      const deadline = this.#deadline();
      const validation = validateSchedule(record.schedule, roster, {
        ...deadline,
        peoplePerShift: options.peoplePerShift,
        lastKnown: this.#cache.get(teamId)?.violations,
      });

      if (validation.completed && validation.isValid) {
        return {
          schedule: record.schedule,
          changes: [],
          fixed: [],
          remaining: [],
          success: true,
          message: "Schedule has no violations; nothing to repair",
          aborted: false,
        };
      }

      const result = repairSchedule(record.schedule, validation.violations, roster, {
        ...deadline,
        peoplePerShift: options.peoplePerShift,
        logger: log,
      });

      if (result.aborted) {
        log.warn({ deadlineMs: this.#config.deadlineMs }, "repair deadline expired");
        return result;
      }

      if (result.changes.length > 0) {
        await this.#store.put({ ...record, schedule: result.schedule });
        const after = validateSchedule(result.schedule, roster, { peoplePerShift: options.peoplePerShift });
        this.#cache.set(teamId, after.violations, this.#now());
        log.info(
          { changes: result.changes.length, fixed: result.fixed.length, remaining: result.remaining.length },
          "schedule repaired",
        );
      }
      return result;
    });
  }
}
