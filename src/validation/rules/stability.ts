import { stabilityLimitForRank } from "../../engine/policy.js";
import type { ShiftName } from "../../types.js";
import type { ValidationRule } from "./rules.types.js";

interface Run {
  shift: ShiftName;
  start: number;
  length: number;
}

/**
 * Flags every maximal run of months an employee spends assigned to the same
 * shift that is longer than their rank allows. One violation per run, however
 * far past the limit it goes. Floating or missing a month ends a run.
 *
 * Juniors (limit 1) are covered here too: any repeat of last month's shift is
 * a run of 2.
 */
export const stabilityRule: ValidationRule = {
  name: "stability",
  description:
    "Tiered shift stability: the most senior rank in a team may stay on the same shift for up " +
    "to 3 consecutive months, the second rank for up to 2, and every other rank must change " +
    "shift every month.",

  check({ timeline, roster }, reporter) {
    for (const [name, row] of timeline.entries) {
      const rank = roster.rankOfEmployee(name);
      if (rank === undefined) continue;
      const limit = stabilityLimitForRank(rank);

      const flush = (run: Run | undefined) => {
        if (!run || run.length <= limit) return;
        const runMonths = timeline.months.slice(run.start, run.start + run.length);
        const first = runMonths[0] ?? "";
        const last = runMonths[runMonths.length - 1] ?? "";
        reporter.report({
          rule: "stability",
          detail:
            `${name} (rank ${rank}) stayed on ${run.shift} for ${run.length} consecutive months ` +
            `from ${first} to ${last}; limit is ${limit}`,
          employees: [name],
          months: runMonths,
          shifts: [run.shift],
          evidence: { runLength: run.length, limit, rank },
        });
      };

      let run: Run | undefined;
      row.forEach((entry, index) => {
        if (entry?.role !== "assigned") {
          flush(run);
          run = undefined;
          return;
        }
        if (run && run.shift === entry.shift) {
          run.length++;
          return;
        }
        flush(run);
        run = { shift: entry.shift, start: index, length: 1 };
      });
      flush(run);
    }
  },
};
