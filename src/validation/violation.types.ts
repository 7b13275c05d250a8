import type { ShiftName } from "../types.js";

// =============================================================================
// Rules
// =============================================================================

/** Rules the validator can check. */
export type RuleName = "stability" | "floater-exemption" | "floater-fairness" | "coverage" | "diversity";

/** Rule names plus the pseudo-rule used for unreadable input. */
export type ViolationKind = RuleName | "format";

/**
 * Prefix every violation message starts with. Rule numbers match the rules
 * text the oracle is given.
 */
export const RULE_LABELS = {
  stability: "Rule 1 (stability)",
  "floater-exemption": "Rule 2 (floater exemption)",
  "floater-fairness": "Rule 3 (floater fairness)",
  diversity: "Rule 5 (diversity)",
  coverage: "Coverage",
  format: "Format",
} as const satisfies Record<ViolationKind, string>;

/**
 * Rules the repairer acts on. Coverage and diversity are reported but not
 * repaired.
 */
export const CORE_RULES: readonly RuleName[] = ["stability", "floater-exemption", "floater-fairness"];

export function isCoreViolation(violation: Pick<Violation, "rule">): boolean {
  return violation.rule !== "format" && CORE_RULES.includes(violation.rule);
}

/**
 * True when a plain violation string carries a core rule prefix. Useful for
 * reports read back from JSON, where only the messages survive.
 */
export function isCoreViolationMessage(message: string): boolean {
  return CORE_RULES.some((rule) => message.startsWith(RULE_LABELS[rule]));
}

// =============================================================================
// Violations
// =============================================================================

/**
 * One broken rule, with enough evidence to act on it without rebuilding the
 * timeline.
 *
 * The `id` is deterministic (`{rule}:{months}:{employees}:{shifts}`), so the
 * same problem in the same schedule always has the same id.
 */
export interface Violation {
  readonly id: string;
  readonly rule: ViolationKind;
  /** Human-readable description, prefixed with the rule's label. */
  readonly message: string;
  readonly employees: readonly string[];
  readonly months: readonly string[];
  readonly shifts: readonly ShiftName[];
  /** Measured values such as `runLength`, `limit`, `expected`, `actual`. */
  readonly evidence: Readonly<Record<string, number>>;
}

// =============================================================================
// Reports
// =============================================================================

/** @category Validation */
export interface ValidationReport {
  readonly isValid: boolean;
  readonly violations: readonly Violation[];
  readonly notes: readonly string[];
  /** False when a deadline cut the run short; `violations` are then the last known set. */
  readonly completed: boolean;
}

/**
 * Validation report in the interchange shape callers persist or return.
 */
export interface ValidationDocument {
  is_valid: boolean;
  violations: string[];
  validation_notes: string;
}

/**
 * Violations aggregated per rule.
 * Use `summarizeViolations()` to create these from a list of violations.
 *
 * @category Validation
 */
export interface ViolationSummary {
  readonly rule: ViolationKind;
  readonly label: string;
  readonly count: number;
  readonly employees: readonly string[];
  readonly months: readonly string[];
}
