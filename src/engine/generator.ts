import { ScheduleConfigurationError } from "../errors.js";
import { defaultLogger, type Logger } from "../logger.js";
import { addMonths, dateToCalendarMonth, formatMonthLabel } from "../months.js";
import { createRandom, shuffle, type RandomSource } from "../random.js";
import type { MonthAssignments, Schedule } from "../schedule/schedule.types.js";
import {
  shiftsForTemplate,
  TeamConfigurationSchema,
  type CalendarMonth,
  type Employee,
  type ShiftName,
  type TeamConfiguration,
} from "../types.js";
import {
  floaterCount,
  isFloaterEligible,
  requiredFixedCount,
  SCORE_WEIGHTS,
  wouldBreakStability,
  type ShiftHistory,
} from "./policy.js";
import { buildRosterModel, type RosterModel } from "./roster.js";

export const DEFAULT_MAX_ATTEMPTS = 25;

/**
 * Options for {@link generateSchedule} and {@link AssignmentGenerator}.
 */
export interface GenerateOptions {
  /** First month to schedule. Defaults to the month `now()` falls in. */
  start?: CalendarMonth;
  /** Clock used when `start` or `seed` is omitted. */
  now?: () => Date;
  /**
   * Seed for the shuffles that vary team composition between months.
   * The same seed and inputs always produce the same schedule.
   */
  seed?: number;
  /**
   * How many shuffled attempts each month gets before falling back to
   * round-robin placement.
   *
   * @default 25
   */
  maxAttempts?: number;
  logger?: Logger;
}

/**
 * What happened while building one month.
 */
export interface MonthReport {
  month: string;
  /** Floaters the headcount called for. */
  floaterCount: number;
  /** Names of the floaters chosen, in selection order. */
  floaters: string[];
  /**
   * Floaters chosen although they floated the month before, because too few
   * other candidates were eligible.
   */
  backfilledFloaters: string[];
  /** Shuffled attempts used for fixed placement. */
  attempts: number;
  /** `"fallback"` when no scored attempt passed the diversity check. */
  strategy: "scored" | "fallback";
  /** Placements in the final result that break a stability limit. */
  stabilityConflicts: number;
}

export interface GenerationRun {
  schedule: Schedule;
  months: MonthReport[];
  seed: number;
}

/**
 * Per-employee history carried from one simulated month to the next.
 */
interface EmployeeMonthlyState extends ShiftHistory {
  rank: number;
  monthsSinceFloater: number;
  lastShift: ShiftName | null;
  wasFloaterLastMonth: boolean;
}

type ShiftTeams = Map<ShiftName, Employee[]>;

interface Placement {
  teams: ShiftTeams;
  conflicts: number;
}

/** Descending comparison that tolerates Infinity on both sides. */
const descending = (a: number, b: number) => (a === b ? 0 : a > b ? -1 : 1);

/**
 * Simulates a team's rota month by month.
 *
 * Each month: pick floaters (never rank 1, preferring people who did not float
 * last month and have gone longest without floating), spread them round-robin
 * across shifts, place everyone else so each shift gets exactly its
 * people-per-shift, then advance each employee's history.
 *
 * Configuration problems throw {@link ScheduleConfigurationError} from the
 * constructor, before any month is built.
 *
 * @example
 * ```typescript
 * const generator = new AssignmentGenerator(team, { seed: 7, start: { year: 2025, month: 1 } });
 * const { schedule, months } = generator.run(6);
 * ```
 */
export class AssignmentGenerator {
  readonly team: TeamConfiguration;
  readonly roster: RosterModel;
  readonly shifts: readonly ShiftName[];
  readonly seed: number;
  readonly start: CalendarMonth;
  readonly maxAttempts: number;

  #random: RandomSource;
  #states = new Map<string, EmployeeMonthlyState>();
  #logger: Logger;

  constructor(team: TeamConfiguration, options: GenerateOptions = {}) {
    const shifts = shiftsForTemplate(team.shiftTemplate);
    if (shifts.length === 0) {
      throw new ScheduleConfigurationError(
        "invalid-template",
        `Team '${team.name}' has an invalid shift template configured: "${team.shiftTemplate}"`,
        { shiftTemplate: team.shiftTemplate },
      );
    }

    const parsed = TeamConfigurationSchema.safeParse(team);
    if (!parsed.success) {
      throw new ScheduleConfigurationError(
        "invalid-input",
        `Team '${team.name}' is misconfigured: ${parsed.error.issues.map((i) => i.message).join("; ")}`,
      );
    }

    const rosterResult = buildRosterModel(team.roster);
    if (!rosterResult.ok) {
      throw new ScheduleConfigurationError(rosterResult.reason, rosterResult.message);
    }

    const required = requiredFixedCount(shifts.length, team.peoplePerShift);
    if (team.roster.length < required) {
      throw new ScheduleConfigurationError(
        "insufficient-headcount",
        `Team '${team.name}' needs ${required} people to cover ${shifts.length} shifts ` +
          `with ${team.peoplePerShift} each, but has ${team.roster.length}`,
        { required, available: team.roster.length },
      );
    }

    const now = options.now ?? (() => new Date());
    this.team = team;
    this.roster = rosterResult.model;
    this.shifts = shifts;
    this.start = options.start ?? dateToCalendarMonth(now());
    this.seed = options.seed ?? now().getTime() >>> 0;
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.#random = createRandom(this.seed);
    this.#logger = (options.logger ?? defaultLogger).child({ team: team.name });

    for (const employee of this.roster.employees) {
      this.#states.set(employee.id, {
        rank: this.#rank(employee),
        // Never floated: everyone starts equally eligible.
        monthsSinceFloater: Number.POSITIVE_INFINITY,
        currentShift: null,
        lastShift: null,
        monthsOnCurrentShift: 0,
        wasFloaterLastMonth: false,
      });
    }
  }

  /**
   * Builds `months` consecutive months starting at {@link start}.
   * A generator simulates one run; create a new one to start over.
   */
  run(months: number): GenerationRun {
    if (!Number.isInteger(months) || months < 1) {
      throw new ScheduleConfigurationError(
        "invalid-input",
        `Number of months must be a positive integer, got ${months}`,
      );
    }

    const schedule: Schedule = {};
    const reports: MonthReport[] = [];

    for (let index = 0; index < months; index++) {
      const label = formatMonthLabel(addMonths(this.start, index));
      const { assignments, report } = this.#buildMonth(label);
      schedule[label] = assignments;
      reports.push(report);
      this.#logger.debug(report, "month generated");
      if (report.strategy === "fallback") {
        this.#logger.warn(
          { month: label, attempts: report.attempts },
          "no diverse placement found, used round-robin fallback",
        );
      }
    }

    return { schedule, months: reports, seed: this.seed };
  }

  #buildMonth(label: string): { assignments: MonthAssignments; report: MonthReport } {
    const needed = floaterCount(this.roster.employees.length, this.shifts.length, this.team.peoplePerShift);
    const { floaters, backfilled } = this.#selectFloaters(needed);
    this.#recordFloaters(floaters);

    const floaterMap = new Map<ShiftName, Employee[]>(this.shifts.map((s) => [s, []]));
    floaters.forEach((floater, i) => {
      const shift = this.shifts[i % this.shifts.length];
      if (shift) floaterMap.get(shift)?.push(floater);
    });

    const floaterIds = new Set(floaters.map((f) => f.id));
    const pool = this.roster.employees.filter((e) => !floaterIds.has(e.id));
    const { placement, attempts, strategy } = this.#placeFixedStaff(pool);
    this.#recordPlacement(placement.teams);

    const assignments: MonthAssignments = {};
    for (const shift of this.shifts) {
      assignments[shift] = {
        assigned_staff: (placement.teams.get(shift) ?? []).map(toStaffRef),
        floaters: (floaterMap.get(shift) ?? []).map(toStaffRef),
      };
    }

    return {
      assignments,
      report: {
        month: label,
        floaterCount: needed,
        floaters: floaters.map((f) => f.name),
        backfilledFloaters: backfilled.map((f) => f.name),
        attempts,
        strategy,
        stabilityConflicts: placement.conflicts,
      },
    };
  }

  // --------------------------------------------------------------------------
  // Floaters
  // --------------------------------------------------------------------------

  #selectFloaters(needed: number): { floaters: Employee[]; backfilled: Employee[] } {
    if (needed === 0) return { floaters: [], backfilled: [] };

    const byFairness = (a: Employee, b: Employee) => {
      const sa = this.#state(a);
      const sb = this.#state(b);
      return descending(sa.monthsSinceFloater, sb.monthsSinceFloater) || sa.rank - sb.rank;
    };

    const candidates = this.roster.employees.filter((e) => isFloaterEligible(this.#state(e).rank));
    const preferred = candidates
      .filter((e) => !this.#state(e).wasFloaterLastMonth)
      .toSorted(byFairness)
      .slice(0, needed);
    const backfilled = candidates
      .filter((e) => this.#state(e).wasFloaterLastMonth)
      .toSorted(byFairness)
      .slice(0, Math.max(0, needed - preferred.length));

    return { floaters: [...preferred, ...backfilled], backfilled };
  }

  #recordFloaters(floaters: readonly Employee[]): void {
    const ids = new Set(floaters.map((f) => f.id));
    for (const employee of this.roster.employees) {
      const state = this.#state(employee);
      if (ids.has(employee.id)) {
        state.monthsSinceFloater = 0;
        state.wasFloaterLastMonth = true;
        // Floating ends the current run on a fixed shift.
        state.lastShift = state.currentShift ?? state.lastShift;
        state.currentShift = null;
        state.monthsOnCurrentShift = 0;
      } else {
        state.monthsSinceFloater += 1;
        state.wasFloaterLastMonth = false;
      }
    }
  }

  // --------------------------------------------------------------------------
  // Fixed staff
  // --------------------------------------------------------------------------

  /**
   * Scored attempts until one is diverse with no stability conflicts, keeping
   * the diverse attempt with fewest conflicts; round-robin only when no
   * attempt was diverse. Where the pool cannot supply mixed ranks every
   * attempt counts as diverse, so the best scored one is kept.
   */
  #placeFixedStaff(pool: readonly Employee[]): {
    placement: Placement;
    attempts: number;
    strategy: MonthReport["strategy"];
  } {
    const capacities = this.#capacities(pool.length);
    const diversityRequired = this.#diversityAchievable(pool);
    let best: Placement | undefined;
    let attempts = 0;

    while (attempts < this.maxAttempts) {
      attempts++;
      const placement = this.#scoredPlacement(this.#candidateOrder(pool), capacities);
      const diverse = !diversityRequired || this.#isDiverse(placement.teams);
      if (!diverse) continue;
      if (placement.conflicts === 0) {
        return { placement, attempts, strategy: "scored" };
      }
      if (!best || placement.conflicts < best.conflicts) best = placement;
    }

    if (best) return { placement: best, attempts, strategy: "scored" };
    return { placement: this.#roundRobinPlacement(pool, capacities), attempts, strategy: "fallback" };
  }

  /**
   * Seats per shift. Exactly people-per-shift, unless too few floater
   * candidates left extra people in the pool; those spread one per shift.
   */
  #capacities(poolSize: number): Map<ShiftName, number> {
    const base = this.team.peoplePerShift;
    const surplus = Math.max(0, poolSize - requiredFixedCount(this.shifts.length, base));
    const n = this.shifts.length;
    return new Map(
      this.shifts.map((shift, i) => [
        shift,
        base + Math.floor(surplus / n) + (i < surplus % n ? 1 : 0),
      ]),
    );
  }

  /** Candidates grouped by rank, shuffled within each rank. */
  #candidateOrder(pool: readonly Employee[]): Employee[] {
    const byRank = new Map<number, Employee[]>();
    for (const employee of pool) {
      const rank = this.#state(employee).rank;
      const group = byRank.get(rank) ?? [];
      group.push(employee);
      byRank.set(rank, group);
    }
    return [...byRank.keys()]
      .toSorted((a, b) => a - b)
      .flatMap((rank) => shuffle(byRank.get(rank) ?? [], this.#random));
  }

  #score(employee: Employee, shift: ShiftName, members: readonly Employee[]): { score: number; conflict: boolean } {
    const state = this.#state(employee);
    const conflict = wouldBreakStability(state, shift, state.rank);
    const rankPresent = members.some((m) => this.#state(m).rank === state.rank);
    const score =
      (conflict ? SCORE_WEIGHTS.STABILITY_PENALTY : 0) +
      (rankPresent ? 0 : SCORE_WEIGHTS.DIVERSITY_BONUS) -
      SCORE_WEIGHTS.LOAD_PENALTY * members.length;
    return { score, conflict };
  }

  /**
   * Greedy placement: repeatedly seat the (candidate, open shift) pair with
   * the highest score. Ties go to the earlier candidate, then the earlier shift.
   */
  #scoredPlacement(order: readonly Employee[], capacities: ReadonlyMap<ShiftName, number>): Placement {
    const teams: ShiftTeams = new Map(this.shifts.map((s) => [s, []]));
    const remaining = [...order];
    let conflicts = 0;

    while (remaining.length > 0) {
      let best: { index: number; shift: ShiftName; score: number; conflict: boolean } | undefined;

      for (const [index, employee] of remaining.entries()) {
        for (const shift of this.shifts) {
          const members = teams.get(shift) ?? [];
          if (members.length >= (capacities.get(shift) ?? 0)) continue;
          const { score, conflict } = this.#score(employee, shift, members);
          if (!best || score > best.score) best = { index, shift, score, conflict };
        }
      }

      if (!best) break;
      const [employee] = remaining.splice(best.index, 1);
      if (!employee) break;
      teams.get(best.shift)?.push(employee);
      if (best.conflict) conflicts++;
    }

    return { teams, conflicts };
  }

  /** Deterministic degradation: seniority order, cycling through open shifts. */
  #roundRobinPlacement(pool: readonly Employee[], capacities: ReadonlyMap<ShiftName, number>): Placement {
    const teams: ShiftTeams = new Map(this.shifts.map((s) => [s, []]));
    let cursor = 0;
    let conflicts = 0;

    for (const employee of pool) {
      for (let step = 0; step < this.shifts.length; step++) {
        const shift = this.shifts[(cursor + step) % this.shifts.length];
        if (!shift) continue;
        const members = teams.get(shift) ?? [];
        if (members.length >= (capacities.get(shift) ?? 0)) continue;
        const state = this.#state(employee);
        if (wouldBreakStability(state, shift, state.rank)) conflicts++;
        members.push(employee);
        cursor = (cursor + step + 1) % this.shifts.length;
        break;
      }
    }

    return { teams, conflicts };
  }

  /**
   * Mixed-rank shifts are only demanded when the pool can supply them: at
   * least two ranks, and enough people outside the largest rank to give every
   * multi-person shift one.
   */
  #diversityAchievable(pool: readonly Employee[]): boolean {
    if (this.roster.distinctRanks < 2) return false;
    const counts = new Map<number, number>();
    for (const employee of pool) {
      const rank = this.#state(employee).rank;
      counts.set(rank, (counts.get(rank) ?? 0) + 1);
    }
    if (counts.size < 2) return false;
    const largest = Math.max(...counts.values());
    const multiPersonShifts = [...this.#capacities(pool.length).values()].filter((c) => c > 1).length;
    return pool.length - largest >= multiPersonShifts;
  }

  #isDiverse(teams: ShiftTeams): boolean {
    for (const members of teams.values()) {
      if (members.length <= 1) continue;
      const ranks = new Set(members.map((m) => this.#state(m).rank));
      if (ranks.size === 1) return false;
    }
    return true;
  }

  #recordPlacement(teams: ShiftTeams): void {
    for (const [shift, members] of teams) {
      for (const employee of members) {
        const state = this.#state(employee);
        if (state.currentShift === shift) {
          state.monthsOnCurrentShift += 1;
        } else {
          state.lastShift = state.currentShift ?? state.lastShift;
          state.currentShift = shift;
          state.monthsOnCurrentShift = 1;
        }
      }
    }
  }

  // --------------------------------------------------------------------------
  // Lookups
  // --------------------------------------------------------------------------

  #rank(employee: Employee): number {
    const rank = this.roster.rankOf(employee.seniorityLevel);
    if (rank === undefined) {
      throw new Error(`Seniority level ${employee.seniorityLevel} missing from roster model`);
    }
    return rank;
  }

  #state(employee: Employee): EmployeeMonthlyState {
    const state = this.#states.get(employee.id);
    if (!state) {
      throw new Error(`No monthly state for employee "${employee.id}"`);
    }
    return state;
  }
}

function toStaffRef(employee: Employee) {
  return { name: employee.name, designation: employee.designation };
}

/**
 * Runs the generator and returns the schedule together with per-month
 * diagnostics.
 */
export function runGeneration(
  team: TeamConfiguration,
  months: number,
  options: GenerateOptions = {},
): GenerationRun {
  return new AssignmentGenerator(team, options).run(months);
}

/**
 * Generates a schedule of `months` consecutive months for a team.
 *
 * @throws {ScheduleConfigurationError} when the roster is empty, the template
 * is unknown, headcount cannot cover every shift, or `months` is not a
 * positive integer. No schedule is produced in that case.
 *
 * @example
 * ```typescript
 * const schedule = generateSchedule(team, 3, { seed: 42, start: { year: 2025, month: 3 } });
 * Object.keys(schedule); // ["March 2025", "April 2025", "May 2025"]
 * ```
 */
export function generateSchedule(
  team: TeamConfiguration,
  months: number,
  options: GenerateOptions = {},
): Schedule {
  return runGeneration(team, months, options).schedule;
}
