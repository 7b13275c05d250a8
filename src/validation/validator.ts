import { deadlinePassed, type DeadlineOptions } from "../deadline.js";
import { buildRosterModel } from "../engine/roster.js";
import { parseSchedule } from "../schedule/document.js";
import type { Employee } from "../types.js";
import { ViolationReporter } from "./reporter.js";
import { resolveRules, RULE_ORDER } from "./rules/registry.js";
import type { RuleCheckContext } from "./rules/rules.types.js";
import { buildTimeline } from "./timeline.js";
import type {
  RuleName,
  ValidationDocument,
  ValidationReport,
  Violation,
} from "./violation.types.js";

/**
 * Options for {@link validateSchedule}.
 */
export interface ValidateOptions extends DeadlineOptions {
  /**
   * Rules to check.
   *
   * @default all rules
   */
  rules?: readonly RuleName[];
  /** Coverage target. When omitted it is inferred from the first non-empty shift. */
  peoplePerShift?: number;
  /**
   * Violations to report if the run is cut short. The deadline is checked
   * before each rule.
   */
  lastKnown?: readonly Violation[];
}

function formatFailure(detail: string): ValidationReport {
  const reporter = new ViolationReporter();
  reporter.report({
    rule: "format",
    detail,
    employees: [],
    months: [],
    shifts: [],
    evidence: {},
  });
  return { isValid: false, violations: reporter.getViolations(), notes: [], completed: true };
}

/**
 * Replays a schedule against the rules and lists every violation.
 *
 * Pure: neither argument is modified. Never throws for bad input; an
 * unreadable document or an empty roster yields a single `format` violation.
 *
 * @param schedule - Schedule document, typically straight from storage
 * @param roster - The team's employees; ranks are derived from it
 *
 * @example
 * ```typescript
 * const report = validateSchedule(saved, team.roster);
 * if (!report.isValid) {
 *   for (const v of report.violations) console.log(v.message);
 * }
 * ```
 */
export function validateSchedule(
  schedule: unknown,
  roster: readonly Employee[],
  options: ValidateOptions = {},
): ValidationReport {
  const parsed = parseSchedule(schedule);
  if (!parsed.success) {
    return formatFailure(`schedule could not be read (${parsed.error})`);
  }

  const rosterResult = buildRosterModel(roster);
  if (!rosterResult.ok) {
    return formatFailure(`no hierarchy context: ${rosterResult.message}`);
  }

  const timeline = buildTimeline(parsed.schedule);
  const context: RuleCheckContext = {
    schedule: parsed.schedule,
    timeline,
    roster: rosterResult.model,
    peoplePerShift: options.peoplePerShift,
  };

  const reporter = new ViolationReporter();
  timeline.notes.forEach((note) => reporter.note(note));
  const unknown = [...timeline.entries.keys()].filter(
    (name) => rosterResult.model.employeeNamed(name) === undefined,
  );
  if (unknown.length > 0) {
    reporter.note(`Not on the roster, rank-based rules skipped: ${unknown.join(", ")}`);
  }

  for (const rule of resolveRules(options.rules ?? RULE_ORDER)) {
    if (deadlinePassed(options)) {
      const lastKnown = options.lastKnown ?? [];
      return {
        isValid: false,
        violations: [...lastKnown],
        notes: [
          ...reporter.getNotes(),
          `Validation deadline expired before the ${rule.name} check; reporting the last known violations`,
        ],
        completed: false,
      };
    }
    try {
      rule.check(context, reporter);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return formatFailure(`the ${rule.name} check could not run (${message})`);
    }
  }

  const violations = reporter.getViolations();
  return {
    isValid: violations.length === 0,
    violations,
    notes: reporter.getNotes(),
    completed: true,
  };
}

/**
 * Converts a report to the interchange shape: violation messages as strings,
 * notes joined into one line.
 */
export function toValidationDocument(report: ValidationReport): ValidationDocument {
  return {
    is_valid: report.isValid,
    violations: report.violations.map((v) => v.message),
    validation_notes: report.notes.join(" "),
  };
}
