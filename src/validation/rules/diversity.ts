import { shiftEntries } from "../../schedule/document.js";
import type { ValidationRule } from "./rules.types.js";

/**
 * A shift with more than one assigned member must mix ranks, provided the
 * team has more than one rank at all. Members missing from the roster are
 * ignored, and a shift with any unknown member is not judged.
 */
export const diversityRule: ValidationRule = {
  name: "diversity",
  description:
    "Mixed-hierarchy composition: when a team has more than one rank, no shift with more than " +
    "one assigned member may be made up of a single rank.",

  check({ schedule, roster }, reporter) {
    if (roster.distinctRanks < 2) return;

    for (const [month, assignments] of Object.entries(schedule)) {
      for (const [shift, record] of shiftEntries(assignments)) {
        if (record.assigned_staff.length < 2) continue;
        const ranks = record.assigned_staff.map((ref) => roster.rankOfEmployee(ref.name));
        if (ranks.some((rank) => rank === undefined)) continue;

        const distinct = new Set(ranks);
        const [only] = distinct;
        if (distinct.size !== 1 || only === undefined) continue;

        reporter.report({
          rule: "diversity",
          detail: `every assigned member of ${shift} in ${month} is rank ${only}`,
          employees: record.assigned_staff.map((ref) => ref.name),
          months: [month],
          shifts: [shift],
          evidence: { rank: only, members: record.assigned_staff.length },
        });
      }
    }
  },
};
