import { describe, expect, it } from "vitest";
import { AssignmentGenerator, generateSchedule, runGeneration } from "../src/engine/generator.js";
import { ScheduleConfigurationError } from "../src/errors.js";
import { parseSchedule } from "../src/schedule/document.js";
import { SHIFT_CATALOG } from "../src/types.js";
import { validateSchedule } from "../src/validation/validator.js";
import { employee, makeTeam, namesOf, silentLogger, twelvePersonRoster } from "./helpers.js";

const start = { year: 2025, month: 1 };

function configurationError(fn: () => unknown): ScheduleConfigurationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ScheduleConfigurationError) return error;
    throw error;
  }
  throw new Error("expected a ScheduleConfigurationError");
}

describe("generateSchedule", () => {
  it("emits one entry per month in calendar order", () => {
    const schedule = generateSchedule(makeTeam(twelvePersonRoster()), 3, {
      start: { year: 2024, month: 11 },
      seed: 1,
      logger: silentLogger,
    });
    expect(Object.keys(schedule)).toEqual(["November 2024", "December 2024", "January 2025"]);
  });

  it("starts at the current month when no start is given", () => {
    const now = () => new Date(2025, 10, 20);
    const run = runGeneration(makeTeam(twelvePersonRoster()), 3, { now, logger: silentLogger });
    expect(Object.keys(run.schedule)).toEqual(["November 2025", "December 2025", "January 2026"]);
    expect(run.seed).toBe(new Date(2025, 10, 20).getTime() >>> 0);
  });

  it("lists every template shift in catalog order", () => {
    const schedule = generateSchedule(makeTeam(twelvePersonRoster()), 1, { start, seed: 5, logger: silentLogger });
    expect(Object.keys(schedule["January 2025"] ?? {})).toEqual(["Morning", "Afternoon", "Night"]);
  });

  it("produces a document that passes the schedule schema", () => {
    const schedule = generateSchedule(makeTeam(twelvePersonRoster()), 4, { start, seed: 11, logger: silentLogger });
    expect(parseSchedule(JSON.parse(JSON.stringify(schedule))).success).toBe(true);
  });

  it("is reproducible for a seed", () => {
    const team = makeTeam(twelvePersonRoster());
    const a = generateSchedule(team, 6, { start, seed: 99, logger: silentLogger });
    const b = generateSchedule(team, 6, { start, seed: 99, logger: silentLogger });
    expect(a).toEqual(b);
  });
});

describe("floater selection", () => {
  it("picks the most senior eligible employees first when nobody has floated", () => {
    const run = runGeneration(makeTeam(twelvePersonRoster()), 1, { start, seed: 3, logger: silentLogger });
    const [first] = run.months;

    expect(first?.floaterCount).toBe(6);
    expect(first?.floaters).toEqual(["B1", "B2", "B3", "C1", "C2", "C3"]);
    expect(first?.backfilledFloaters).toEqual([]);

    const january = run.schedule["January 2025"];
    expect(namesOf(january?.Morning?.floaters)).toEqual(["B1", "C1"]);
    expect(namesOf(january?.Afternoon?.floaters)).toEqual(["B2", "C2"]);
    expect(namesOf(january?.Night?.floaters)).toEqual(["B3", "C3"]);
  });

  it("backfills with last month's floaters when too few others are eligible", () => {
    const run = runGeneration(makeTeam(twelvePersonRoster()), 2, { start, seed: 3, logger: silentLogger });
    const second = run.months[1];

    expect(second?.floaters).toEqual(["C4", "C5", "C6", "B1", "B2", "B3"]);
    expect(second?.backfilledFloaters).toEqual(["B1", "B2", "B3"]);
  });

  it("repeats a floater only when that month backfilled them", () => {
    const team = makeTeam(twelvePersonRoster());
    let repeats = 0;
    for (let seed = 1; seed <= 20; seed++) {
      const run = runGeneration(team, 8, { start, seed, logger: silentLogger });
      const report = validateSchedule(run.schedule, team.roster, { peoplePerShift: team.peoplePerShift });
      for (const violation of report.violations.filter((v) => v.rule === "floater-fairness")) {
        const monthReport = run.months.find((m) => m.month === violation.months[1]);
        expect(monthReport?.backfilledFloaters).toContain(violation.employees[0]);
        repeats++;
      }
    }
    expect(repeats).toBeGreaterThan(0);
  });

  it("never uses rank 1 as floaters", () => {
    const schedule = generateSchedule(makeTeam(twelvePersonRoster()), 6, { start, seed: 21, logger: silentLogger });
    const leads = new Set(["A1", "A2", "A3"]);
    for (const assignments of Object.values(schedule)) {
      for (const shift of SHIFT_CATALOG) {
        for (const floater of assignments[shift]?.floaters ?? []) {
          expect(leads.has(floater.name)).toBe(false);
        }
      }
    }
  });
});

describe("fixed staff placement", () => {
  it("fills every shift with exactly people-per-shift", () => {
    const schedule = generateSchedule(makeTeam(twelvePersonRoster()), 6, { start, seed: 8, logger: silentLogger });
    for (const assignments of Object.values(schedule)) {
      expect(assignments.Morning?.assigned_staff).toHaveLength(2);
      expect(assignments.Afternoon?.assigned_staff).toHaveLength(2);
      expect(assignments.Night?.assigned_staff).toHaveLength(2);
    }
  });

  it("mixes ranks in the first month", () => {
    const run = runGeneration(makeTeam(twelvePersonRoster()), 1, { start, seed: 4, logger: silentLogger });
    const january = run.schedule["January 2025"];
    const leads = new Set(["A1", "A2", "A3"]);

    for (const shift of ["Morning", "Afternoon", "Night"] as const) {
      const names = namesOf(january?.[shift]?.assigned_staff);
      expect(names.filter((name) => leads.has(name))).toHaveLength(1);
    }
    expect(run.months[0]).toMatchObject({ attempts: 1, strategy: "scored", stabilityConflicts: 0 });
  });

  it("spreads surplus people when nobody can float", () => {
    const roster = ["P1", "P2", "P3", "P4", "P5", "P6", "P7", "P8"].map((name) => employee(name, 1));
    const run = runGeneration(makeTeam(roster), 1, { start, seed: 2, logger: silentLogger });
    const january = run.schedule["January 2025"];

    expect(run.months[0]).toMatchObject({ floaterCount: 2, floaters: [] });
    expect(january?.Morning?.assigned_staff).toHaveLength(3);
    expect(january?.Afternoon?.assigned_staff).toHaveLength(3);
    expect(january?.Night?.assigned_staff).toHaveLength(2);
  });

  it("passes coverage and floater exemption when validated", () => {
    const team = makeTeam(twelvePersonRoster());
    const schedule = generateSchedule(team, 6, { start, seed: 17, logger: silentLogger });
    const report = validateSchedule(schedule, team.roster, { peoplePerShift: team.peoplePerShift });

    expect(report.violations.filter((v) => v.rule === "coverage")).toEqual([]);
    expect(report.violations.filter((v) => v.rule === "floater-exemption")).toEqual([]);
  });
});

describe("configuration errors", () => {
  it("rejects an empty roster", () => {
    const error = configurationError(() => new AssignmentGenerator(makeTeam([])));
    expect(error.code).toBe("empty-roster");
  });

  it("rejects a roster that reuses a name", () => {
    const roster = [employee("Asha", 1), { ...employee("Asha", 2), id: "other" }];
    const error = configurationError(() => new AssignmentGenerator(makeTeam(roster, { peoplePerShift: 1 })));
    expect(error.code).toBe("duplicate-employee");
  });

  it("rejects a team too small to cover its shifts", () => {
    const roster = twelvePersonRoster().slice(0, 5);
    const error = configurationError(() => new AssignmentGenerator(makeTeam(roster)));
    expect(error.code).toBe("insufficient-headcount");
    expect(error.message).toBe("Team 'Network Operations' needs 6 people to cover 3 shifts with 2 each, but has 5");
    expect(error.details).toEqual({ required: 6, available: 5 });
  });

  it("rejects a non-positive number of months", () => {
    const generator = new AssignmentGenerator(makeTeam(twelvePersonRoster()), { start, seed: 1, logger: silentLogger });
    expect(configurationError(() => generator.run(0)).code).toBe("invalid-input");
  });
});
