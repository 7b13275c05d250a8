import { shiftEntries } from "../../schedule/document.js";
import type { Schedule } from "../../schedule/schedule.types.js";
import type { ValidationRule } from "./rules.types.js";

/**
 * People-per-shift as implied by the schedule itself: the assigned headcount
 * of the first non-empty shift, in month then catalog order.
 */
export function inferPeoplePerShift(schedule: Schedule): number | undefined {
  for (const month of Object.values(schedule)) {
    for (const [, record] of shiftEntries(month)) {
      if (record.assigned_staff.length > 0) return record.assigned_staff.length;
    }
  }
  return undefined;
}

/**
 * Every shift in every month has exactly people-per-shift assigned staff.
 */
export const coverageRule: ValidationRule = {
  name: "coverage",
  description:
    "Coverage: every shift in every month has exactly the team's people-per-shift as assigned " +
    "(fixed) staff; floaters do not count towards coverage.",

  check({ schedule, peoplePerShift }, reporter) {
    const expected = peoplePerShift ?? inferPeoplePerShift(schedule);
    if (expected === undefined) {
      reporter.note("Coverage not checked: no shift has any assigned staff");
      return;
    }

    for (const [month, assignments] of Object.entries(schedule)) {
      for (const [shift, record] of shiftEntries(assignments)) {
        const actual = record.assigned_staff.length;
        if (actual === expected) continue;
        reporter.report({
          rule: "coverage",
          detail: `${shift} in ${month} has ${actual} assigned staff; expected ${expected}`,
          employees: [],
          months: [month],
          shifts: [shift],
          evidence: { expected, actual },
        });
      }
    }
  },
};
