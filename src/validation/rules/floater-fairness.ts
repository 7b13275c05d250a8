import type { ValidationRule } from "./rules.types.js";

/**
 * Nobody floats two months running. Adjacency is by position in the
 * schedule, not by calendar distance, and only the first such pair per
 * employee is reported.
 */
export const floaterFairnessRule: ValidationRule = {
  name: "floater-fairness",
  description:
    "Fair floater rotation: no employee may be a floater in two consecutive months; floater " +
    "duty rotates among eligible employees.",

  check({ timeline }, reporter) {
    for (const [name, row] of timeline.entries) {
      for (let i = 1; i < row.length; i++) {
        const previous = row[i - 1];
        const current = row[i];
        if (previous?.role !== "floater" || current?.role !== "floater") continue;

        const first = timeline.months[i - 1] ?? "";
        const second = timeline.months[i] ?? "";
        reporter.report({
          rule: "floater-fairness",
          detail: `${name} is a floater in consecutive months ${first} and ${second}`,
          employees: [name],
          months: [first, second],
          shifts: [previous.shift, current.shift],
          evidence: { consecutiveMonths: 2 },
        });
        break;
      }
    }
  },
};
