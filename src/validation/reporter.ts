import {
  RULE_LABELS,
  type Violation,
  type ViolationKind,
  type ViolationSummary,
} from "./violation.types.js";

/**
 * Generates a deterministic ID for a violation.
 * Format: {rule}:{months}:{employees}:{shifts}
 */
export function violationId(
  rule: ViolationKind,
  months: readonly string[],
  employees: readonly string[],
  shifts: readonly string[],
): string {
  const parts = [
    rule,
    months.length > 0 ? months.join(",") : "_",
    employees.length > 0 ? [...employees].toSorted().join(",") : "_",
    shifts.length > 0 ? shifts.join(",") : "_",
  ];
  return parts.join(":");
}

/**
 * Collects violations while rules run. Reporting the same violation twice
 * keeps the first.
 */
export class ViolationReporter {
  #violations = new Map<string, Violation>();
  #notes: string[] = [];

  report(violation: Omit<Violation, "id" | "message"> & { detail: string }): void {
    const { detail, ...rest } = violation;
    const id = violationId(rest.rule, rest.months, rest.employees, rest.shifts);
    if (this.#violations.has(id)) return;
    this.#violations.set(id, { id, message: `${RULE_LABELS[rest.rule]}: ${detail}`, ...rest });
  }

  note(message: string): void {
    if (!this.#notes.includes(message)) this.#notes.push(message);
  }

  hasViolations(): boolean {
    return this.#violations.size > 0;
  }

  getViolations(): Violation[] {
    return [...this.#violations.values()];
  }

  getNotes(): string[] {
    return [...this.#notes];
  }
}

// =============================================================================
// Violation Summary - pure function for aggregation
// =============================================================================

/**
 * Aggregates violations by rule, in the order rules first appear.
 * This is a pure function that doesn't modify the input.
 *
 * @example
 * ```typescript
 * const summaries = summarizeViolations(report.violations);
 * // summaries[0] = {
 * //   rule: "stability",
 * //   label: "Rule 1 (stability)",
 * //   count: 2,
 * //   employees: ["Bruno", "Chen"],
 * //   months: ["February 2025", "March 2025"],
 * // }
 * ```
 */
export function summarizeViolations(violations: readonly Violation[]): readonly ViolationSummary[] {
  const groups = new Map<
    ViolationKind,
    { count: number; employees: Set<string>; months: Set<string> }
  >();

  for (const violation of violations) {
    const group = groups.get(violation.rule) ?? { count: 0, employees: new Set(), months: new Set() };
    group.count++;
    violation.employees.forEach((e) => group.employees.add(e));
    violation.months.forEach((m) => group.months.add(m));
    groups.set(violation.rule, group);
  }

  return [...groups].map(([rule, group]) => ({
    rule,
    label: RULE_LABELS[rule],
    count: group.count,
    employees: [...group.employees].toSorted(),
    months: [...group.months],
  }));
}
