import type { Employee } from "../types.js";
import { FLOATER_EXEMPT_RANK, stabilityLimitForRank } from "./policy.js";

/**
 * A roster re-ranked relative to the team it belongs to.
 *
 * Rank 1 is the most senior level present in this team, rank 2 the next, and
 * so on. Absolute seniority levels only matter through their ordering.
 */
export interface RosterModel {
  /** Employees sorted by seniority level, most senior first. Equal levels keep roster order. */
  readonly employees: readonly Employee[];
  /** Distinct seniority levels present, ascending. */
  readonly levels: readonly number[];
  /** Number of distinct ranks in the team. */
  readonly distinctRanks: number;
  /** Stability duration (months) keyed by rank. */
  readonly stabilityByRank: ReadonlyMap<number, number>;
  /** Rank whose members never float. */
  readonly floaterExemptRank: number;
  /** Rank for an absolute seniority level, if that level is present. */
  rankOf(level: number): number | undefined;
  /** Rank for an employee, looked up by the name schedules use. */
  rankOfEmployee(name: string): number | undefined;
  /** Employee for a name, if on the roster. */
  employeeNamed(name: string): Employee | undefined;
}

export type RosterModelResult =
  | { ok: true; model: RosterModel }
  | { ok: false; reason: "empty-roster" | "duplicate-employee"; message: string };

/**
 * Normalizes a team's membership into a seniority-ranked model.
 *
 * Rosters that cannot be ranked (empty, or reusing an id or a name) are
 * reported rather than thrown. The model is built fresh per call and never
 * mutated afterwards.
 *
 * @example
 * ```typescript
 * const result = buildRosterModel(team.roster);
 * if (result.ok) {
 *   result.model.rankOf(4); // 2, when level 4 is the second most senior present
 * }
 * ```
 */
export function buildRosterModel(roster: readonly Employee[]): RosterModelResult {
  if (roster.length === 0) {
    return { ok: false, reason: "empty-roster", message: "The team has no employees" };
  }

  const ids = new Set<string>();
  const byName = new Map<string, Employee>();
  for (const employee of roster) {
    if (ids.has(employee.id)) {
      return {
        ok: false,
        reason: "duplicate-employee",
        message: `Employee id "${employee.id}" appears more than once in the roster`,
      };
    }
    if (byName.has(employee.name)) {
      return {
        ok: false,
        reason: "duplicate-employee",
        message: `Employee name "${employee.name}" appears more than once in the roster`,
      };
    }
    ids.add(employee.id);
    byName.set(employee.name, employee);
  }

  const employees = roster.toSorted((a, b) => a.seniorityLevel - b.seniorityLevel);
  const levels = [...new Set(employees.map((e) => e.seniorityLevel))];
  const rankByLevel = new Map(levels.map((level, index) => [level, index + 1]));
  const stabilityByRank = new Map(
    levels.map((_, index) => [index + 1, stabilityLimitForRank(index + 1)]),
  );

  const rankOf = (level: number) => rankByLevel.get(level);

  return {
    ok: true,
    model: {
      employees,
      levels,
      distinctRanks: levels.length,
      stabilityByRank,
      floaterExemptRank: FLOATER_EXEMPT_RANK,
      rankOf,
      rankOfEmployee(name) {
        const employee = byName.get(name);
        return employee ? rankOf(employee.seniorityLevel) : undefined;
      },
      employeeNamed(name) {
        return byName.get(name);
      },
    },
  };
}
