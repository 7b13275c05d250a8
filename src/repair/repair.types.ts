import type { DeadlineOptions } from "../deadline.js";
import type { Logger } from "../logger.js";
import type { Schedule, StaffRole } from "../schedule/schedule.types.js";
import type { ShiftName } from "../types.js";
import type { Violation } from "../validation/violation.types.js";

/** A position inside one month: a shift and the role held on it. */
export interface SlotRef {
  role: StaffRole;
  shift: ShiftName;
}

/**
 * One reassignment the repairer made.
 *
 * - `swap`: two people in the same month exchange positions; `partner` took
 *   `from` and gave up `to`
 * - `move`: one person changes shift, keeping their role
 */
export interface RepairChange {
  kind: "swap" | "move";
  employee: string;
  month: string;
  from: SlotRef;
  to: SlotRef;
  partner?: string;
  partnerFrom?: SlotRef;
  partnerTo?: SlotRef;
}

/**
 * The deadline is checked before each targeted violation and each trial
 * change; once it passes the input schedule is returned untouched.
 */
export interface RepairOptions extends DeadlineOptions {
  /** Coverage target used when re-validating. Inferred from the input schedule when omitted. */
  peoplePerShift?: number;
  logger?: Logger;
}

/**
 * Outcome of a repair.
 *
 * `success` is true for every completed run, including a rejected one that
 * left the schedule untouched; it is false only when aborted.
 */
export interface RepairReport {
  readonly schedule: Schedule;
  readonly changes: readonly RepairChange[];
  /** Input core violations that the final validation no longer reports. */
  readonly fixed: readonly Violation[];
  /** Core violations the final validation still reports. */
  readonly remaining: readonly Violation[];
  readonly success: boolean;
  readonly message: string;
  readonly aborted: boolean;
}

/** Repair report in the interchange shape callers persist or return. */
export interface RepairDocument {
  schedule: Schedule;
  changes_made: string[];
  violations_fixed: string[];
  violations_remaining: string[];
  message: string;
}
