import { SHIFT_CATALOG, type ShiftName } from "../types.js";
import { ScheduleSchema } from "./schedule.schemas.js";
import type { MonthAssignments, Schedule, ShiftRecord } from "./schedule.types.js";

export type ParseScheduleResult =
  | { success: true; schedule: Schedule }
  | { success: false; error: string };

/**
 * Validates an untyped document (typically fresh from JSON storage) against
 * the schedule schema.
 *
 * Never throws; the first few schema issues are folded into `error`.
 */
export function parseSchedule(input: unknown): ParseScheduleResult {
  const parsed = ScheduleSchema.safeParse(input);
  if (parsed.success) {
    return { success: true, schedule: parsed.data };
  }
  const details = parsed.error.issues
    .slice(0, 3)
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(" > ") : "(root)";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
  return { success: false, error: details };
}

/** Iterates `[shift, record]` pairs of a month in catalog order. */
export function shiftEntries(month: MonthAssignments): Array<[ShiftName, ShiftRecord]> {
  const entries: Array<[ShiftName, ShiftRecord]> = [];
  for (const shift of SHIFT_CATALOG) {
    const record = month[shift];
    if (record) entries.push([shift, record]);
  }
  return entries;
}

/** Deep copy of a schedule; edits to the copy never reach the original. */
export function cloneSchedule(schedule: Schedule): Schedule {
  const copy: Schedule = {};
  for (const [label, month] of Object.entries(schedule)) {
    const monthCopy: MonthAssignments = {};
    for (const [shift, record] of shiftEntries(month)) {
      monthCopy[shift] = {
        assigned_staff: record.assigned_staff.map((ref) => ({ ...ref })),
        floaters: record.floaters.map((ref) => ({ ...ref })),
      };
    }
    copy[label] = monthCopy;
  }
  return copy;
}
