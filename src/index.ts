/**
 * Monthly shift rotas for hierarchical teams.
 *
 * Generates a schedule month by month from a team's roster, checks any
 * schedule against the rotation rules, and repairs the violations it can.
 *
 * @remarks
 * ## Core Concepts
 *
 * **Ranks**: Seniority levels are re-ranked per team. Rank 1 is the most
 * senior level present in the team, whatever its company-wide number.
 *
 * **Rules**: Rank 1 may keep a shift for 3 months, rank 2 for 2, everyone
 * else rotates monthly. Rank 1 never floats. Nobody floats two months
 * running. Every shift gets exactly people-per-shift assigned staff, and a
 * multi-person shift mixes ranks when the team has more than one.
 *
 * **Floaters**: People beyond the fixed headcount are attached to shifts as
 * backup for the month.
 *
 * **Validation and repair**: {@link validateSchedule} is pure and reports
 * structured violations. {@link repairSchedule} tries swaps and moves for the
 * stability and floater rules and keeps only those that help.
 *
 * @example Generate and check a schedule
 * ```typescript
 * import { generateSchedule, validateSchedule } from "rota-engine";
 *
 * const schedule = generateSchedule(team, 6, { seed: 42, start: { year: 2025, month: 1 } });
 * const report = validateSchedule(schedule, team.roster, { peoplePerShift: team.peoplePerShift });
 * report.isValid;
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Team & shifts
// ============================================================================

export type { Employee, TeamConfiguration, ShiftName, ShiftTemplate, CalendarMonth } from "./types.js";

export {
  SHIFT_CATALOG,
  SHIFT_TEMPLATES,
  shiftsForTemplate,
  EmployeeSchema,
  TeamConfigurationSchema,
  ShiftNameSchema,
  ShiftTemplateSchema,
} from "./types.js";

export {
  MONTH_NAMES,
  addMonths,
  compareMonths,
  dateToCalendarMonth,
  formatMonthLabel,
  monthSequence,
  parseMonthLabel,
} from "./months.js";

// ============================================================================
// Schedule document
// ============================================================================

export type { Schedule, MonthAssignments, ShiftRecord, StaffRef, StaffRole } from "./schedule/schedule.types.js";

export { ScheduleSchema, MonthAssignmentsSchema, ShiftRecordSchema, StaffRefSchema } from "./schedule/schedule.schemas.js";

export { parseSchedule, cloneSchedule } from "./schedule/document.js";

// ============================================================================
// Errors
// ============================================================================

export {
  ScheduleConfigurationError,
  ScheduleNotFoundError,
  ScheduleConflictError,
  RuleOracleError,
  EngineConfigError,
} from "./errors.js";

export type { ConfigurationErrorCode } from "./errors.js";

// ============================================================================
// Roster & policy
// ============================================================================

export { buildRosterModel } from "./engine/roster.js";

export type { RosterModel, RosterModelResult } from "./engine/roster.js";

export {
  FLOATER_EXEMPT_RANK,
  SCORE_WEIGHTS,
  stabilityLimitForRank,
  isFloaterEligible,
  floaterCount,
  requiredFixedCount,
} from "./engine/policy.js";

// ============================================================================
// Generation
// ============================================================================

export { AssignmentGenerator, generateSchedule, runGeneration, DEFAULT_MAX_ATTEMPTS } from "./engine/generator.js";

export type { GenerateOptions, GenerationRun, MonthReport } from "./engine/generator.js";

// ============================================================================
// Validation
// ============================================================================

export { validateSchedule, toValidationDocument } from "./validation/validator.js";

export type { DeadlineOptions } from "./deadline.js";

export type { ValidateOptions } from "./validation/validator.js";

export { summarizeViolations } from "./validation/reporter.js";

export { describeRules, RULE_ORDER } from "./validation/rules/registry.js";

export { RULE_LABELS, CORE_RULES, isCoreViolation, isCoreViolationMessage } from "./validation/violation.types.js";

export type {
  RuleName,
  ViolationKind,
  Violation,
  ValidationReport,
  ValidationDocument,
  ViolationSummary,
} from "./validation/violation.types.js";

// ============================================================================
// Repair
// ============================================================================

export { repairSchedule, toRepairDocument, describeChange } from "./repair/repairer.js";

export type { RepairChange, RepairDocument, RepairOptions, RepairReport, SlotRef } from "./repair/repair.types.js";

// ============================================================================
// Rule oracle
// ============================================================================

export { HttpRuleOracle } from "./oracle/client.js";

export type { RuleOracle, OracleReport, OracleRequest, FetcherLike } from "./oracle/oracle.types.js";

export { OracleRequestSchema, OracleResponseSchema } from "./oracle/oracle.schemas.js";

// ============================================================================
// Storage & service
// ============================================================================

export { InMemoryScheduleStore } from "./store/schedule-store.js";

export type { ScheduleStore, ScheduleRecord } from "./store/schedule-store.js";

export { InMemoryViolationCache } from "./store/violation-cache.js";

export type { ViolationCache, CachedViolations } from "./store/violation-cache.js";

export { TeamWriteLock } from "./store/team-lock.js";

export { RotaService } from "./service.js";

export type { RotaServiceOptions, GenerationResult, ServiceValidationResult } from "./service.js";

// ============================================================================
// Export
// ============================================================================

export { toAssignmentRows, summarizeAssignments } from "./export.js";

export type { AssignmentRow, EmployeeAssignmentSummary } from "./export.js";

// ============================================================================
// Configuration & logging
// ============================================================================

export { loadEngineConfig, LogLevelSchema } from "./config.js";

export type { EngineConfig, LogLevel } from "./config.js";

export { createLogger } from "./logger.js";

export type { Logger } from "./logger.js";
