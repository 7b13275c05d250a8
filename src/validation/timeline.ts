import { shiftEntries } from "../schedule/document.js";
import type { Schedule, StaffRole } from "../schedule/schedule.types.js";
import type { ShiftName } from "../types.js";

/** Where one person was in one month. */
export interface TimelineEntry {
  role: StaffRole;
  shift: ShiftName;
}

/**
 * Month-by-month positions of everyone named in a schedule.
 *
 * `entries.get(name)[i]` is the person's position in `months[i]`, or
 * undefined when they do not appear that month.
 */
export interface Timeline {
  readonly months: readonly string[];
  readonly entries: ReadonlyMap<string, ReadonlyArray<TimelineEntry | undefined>>;
  /** Problems noticed while building, such as someone listed twice in a month. */
  readonly notes: readonly string[];
}

export function buildTimeline(schedule: Schedule): Timeline {
  const months = Object.keys(schedule);
  const entries = new Map<string, Array<TimelineEntry | undefined>>();
  const notes: string[] = [];

  const place = (name: string, index: number, entry: TimelineEntry) => {
    let row = entries.get(name);
    if (!row) {
      row = Array.from({ length: months.length }, () => undefined);
      entries.set(name, row);
    }
    const existing = row[index];
    if (existing) {
      // First position wins; the duplicate is only noted.
      notes.push(
        `${name} appears more than once in ${months[index]} ` +
          `(${existing.role} on ${existing.shift}, ${entry.role} on ${entry.shift})`,
      );
      return;
    }
    row[index] = entry;
  };

  months.forEach((label, index) => {
    const month = schedule[label];
    if (!month) return;
    for (const [shift, record] of shiftEntries(month)) {
      record.assigned_staff.forEach((ref) => place(ref.name, index, { role: "assigned", shift }));
      record.floaters.forEach((ref) => place(ref.name, index, { role: "floater", shift }));
    }
  });

  return { months, entries, notes };
}
