import type { ValidationRule } from "./rules.types.js";

/**
 * The most senior rank never floats. One violation per month it happens.
 */
export const floaterExemptionRule: ValidationRule = {
  name: "floater-exemption",
  description:
    "Floater exemption: employees of the most senior rank in a team are never assigned as " +
    "floaters; only the second rank and below may float.",

  check({ timeline, roster }, reporter) {
    for (const [name, row] of timeline.entries) {
      if (roster.rankOfEmployee(name) !== roster.floaterExemptRank) continue;

      row.forEach((entry, index) => {
        if (entry?.role !== "floater") return;
        const month = timeline.months[index] ?? "";
        reporter.report({
          rule: "floater-exemption",
          detail: `${name} (rank ${roster.floaterExemptRank}) is a floater on ${entry.shift} in ${month}`,
          employees: [name],
          months: [month],
          shifts: [entry.shift],
          evidence: { rank: roster.floaterExemptRank },
        });
      });
    }
  },
};
