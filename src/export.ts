import { shiftEntries } from "./schedule/document.js";
import type { Schedule, StaffRole } from "./schedule/schedule.types.js";
import type { ShiftName } from "./types.js";

/** One person in one shift for one month, flattened for spreadsheets. */
export interface AssignmentRow {
  team: string;
  month: string;
  shift: ShiftName;
  employee: string;
  designation: string;
  role: StaffRole;
}

export interface EmployeeAssignmentSummary {
  employee: string;
  assignedMonths: number;
  floaterMonths: number;
  /** Months spent assigned to each shift. */
  byShift: Partial<Record<ShiftName, number>>;
}

/**
 * Flattens a schedule into rows in month, catalog-shift order; assigned
 * staff come before floaters within a shift.
 */
export function toAssignmentRows(teamName: string, schedule: Schedule): AssignmentRow[] {
  const rows: AssignmentRow[] = [];
  for (const [month, assignments] of Object.entries(schedule)) {
    for (const [shift, record] of shiftEntries(assignments)) {
      for (const ref of record.assigned_staff) {
        rows.push({ team: teamName, month, shift, employee: ref.name, designation: ref.designation, role: "assigned" });
      }
      for (const ref of record.floaters) {
        rows.push({ team: teamName, month, shift, employee: ref.name, designation: ref.designation, role: "floater" });
      }
    }
  }
  return rows;
}

/**
 * Per-employee counts, sorted by name.
 */
export function summarizeAssignments(schedule: Schedule): EmployeeAssignmentSummary[] {
  const summaries = new Map<string, EmployeeAssignmentSummary>();

  for (const row of toAssignmentRows("", schedule)) {
    const summary = summaries.get(row.employee) ?? {
      employee: row.employee,
      assignedMonths: 0,
      floaterMonths: 0,
      byShift: {},
    };
    if (row.role === "floater") {
      summary.floaterMonths++;
    } else {
      summary.assignedMonths++;
      summary.byShift[row.shift] = (summary.byShift[row.shift] ?? 0) + 1;
    }
    summaries.set(row.employee, summary);
  }

  return [...summaries.values()].toSorted((a, b) => a.employee.localeCompare(b.employee));
}
