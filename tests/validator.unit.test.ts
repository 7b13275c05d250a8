import { describe, expect, it } from "vitest";
import { summarizeViolations } from "../src/validation/reporter.js";
import { describeRules } from "../src/validation/rules/registry.js";
import { toValidationDocument, validateSchedule } from "../src/validation/validator.js";
import { isCoreViolationMessage } from "../src/validation/violation.types.js";
import { chenRepeatsMorning, month, schedule, smallRoster } from "./helpers.js";

describe("validateSchedule", () => {
  it("reports a junior kept on the same shift two months running", () => {
    const report = validateSchedule(chenRepeatsMorning(), smallRoster());

    expect(report.isValid).toBe(false);
    expect(report.completed).toBe(true);
    expect(report.notes).toEqual([]);
    expect(report.violations).toEqual([
      {
        id: "stability:January 2025,February 2025:Chen:Morning",
        rule: "stability",
        message:
          "Rule 1 (stability): Chen (rank 3) stayed on Morning for 2 consecutive months " +
          "from January 2025 to February 2025; limit is 1",
        employees: ["Chen"],
        months: ["January 2025", "February 2025"],
        shifts: ["Morning"],
        evidence: { runLength: 2, limit: 1, rank: 3 },
      },
    ]);
  });

  it("lets rank 1 keep a shift for three months but not four", () => {
    const fixture = schedule({
      "January 2025": month({ Morning: { assigned: ["Asha"] } }),
      "February 2025": month({ Morning: { assigned: ["Asha"] } }),
      "March 2025": month({ Morning: { assigned: ["Asha"] } }),
    });
    expect(validateSchedule(fixture, smallRoster()).isValid).toBe(true);

    const longer = { ...fixture, "April 2025": month({ Morning: { assigned: ["Asha"] } }) };
    const report = validateSchedule(longer, smallRoster());
    expect(report.violations.map((v) => v.evidence)).toEqual([{ runLength: 4, limit: 3, rank: 1 }]);
  });

  it("treats floating as the end of a run", () => {
    const fixture = schedule({
      "January 2025": month({ Morning: { assigned: ["Chen"] } }),
      "February 2025": month({ Morning: { assigned: ["Asha"], floaters: ["Chen"] } }),
      "March 2025": month({ Morning: { assigned: ["Chen"] } }),
    });
    const report = validateSchedule(fixture, smallRoster(), { rules: ["stability"] });
    expect(report.violations).toEqual([]);
  });

  it("reports rank 1 used as a floater", () => {
    const fixture = schedule({
      "January 2025": month({
        Morning: { assigned: ["Farah", "Chen"], floaters: ["Asha"] },
        Afternoon: { assigned: ["Bruno", "Dara"], floaters: ["Eli"] },
      }),
    });
    const report = validateSchedule(fixture, smallRoster());
    expect(report.violations.map((v) => v.message)).toEqual([
      "Rule 2 (floater exemption): Asha (rank 1) is a floater on Morning in January 2025",
    ]);
  });

  it("reports a floater in consecutive months once", () => {
    const fixture = schedule({
      "January 2025": month({ Morning: { assigned: ["Asha"], floaters: ["Eli"] } }),
      "February 2025": month({ Afternoon: { assigned: ["Farah"], floaters: ["Eli"] } }),
      "March 2025": month({ Night: { assigned: ["Asha"], floaters: ["Eli"] } }),
    });
    const report = validateSchedule(fixture, smallRoster(), { rules: ["floater-fairness"] });

    expect(report.violations).toHaveLength(1);
    expect(report.violations[0]?.message).toBe(
      "Rule 3 (floater fairness): Eli is a floater in consecutive months January 2025 and February 2025",
    );
    expect(report.violations[0]?.shifts).toEqual(["Morning", "Afternoon"]);
  });

  it("checks coverage against the given people-per-shift", () => {
    const fixture = schedule({
      "January 2025": month({
        Morning: { assigned: ["Asha", "Chen"] },
        Afternoon: { assigned: ["Bruno"] },
      }),
    });
    const report = validateSchedule(fixture, smallRoster(), { rules: ["coverage"], peoplePerShift: 2 });
    expect(report.violations.map((v) => v.message)).toEqual([
      "Coverage: Afternoon in January 2025 has 1 assigned staff; expected 2",
    ]);
    expect(report.violations[0]?.evidence).toEqual({ expected: 2, actual: 1 });
  });

  it("infers people-per-shift from the first non-empty shift", () => {
    const fixture = schedule({
      "January 2025": month({
        Morning: { assigned: ["Asha"] },
        Afternoon: { assigned: ["Bruno", "Chen"] },
      }),
    });
    const report = validateSchedule(fixture, smallRoster(), { rules: ["coverage"] });
    expect(report.violations.map((v) => v.message)).toEqual([
      "Coverage: Afternoon in January 2025 has 2 assigned staff; expected 1",
    ]);
  });

  it("reports shifts staffed by a single rank", () => {
    const fixture = schedule({
      "January 2025": month({ Night: { assigned: ["Dara", "Eli"] } }),
    });
    const report = validateSchedule(fixture, smallRoster(), { rules: ["diversity"] });
    expect(report.violations.map((v) => v.message)).toEqual([
      "Rule 5 (diversity): every assigned member of Night in January 2025 is rank 3",
    ]);
  });

  it("does not ask for mixed ranks in a single-rank team", () => {
    const fixture = schedule({
      "January 2025": month({ Night: { assigned: ["Dara", "Eli"] } }),
    });
    const roster = smallRoster().filter((e) => e.seniorityLevel === 7);
    expect(validateSchedule(fixture, roster, { rules: ["diversity"] }).violations).toEqual([]);
  });

  it("notes people missing from the roster", () => {
    const fixture = schedule({
      "January 2025": month({ Morning: { assigned: ["Asha", "Zed"] } }),
    });
    const report = validateSchedule(fixture, smallRoster());
    expect(report.notes).toEqual(["Not on the roster, rank-based rules skipped: Zed"]);
    expect(report.isValid).toBe(true);
  });

  it("notes someone listed twice in a month", () => {
    const fixture = schedule({
      "January 2025": month({
        Morning: { assigned: ["Asha"] },
        Afternoon: { assigned: ["Chen"], floaters: ["Asha"] },
      }),
    });
    const report = validateSchedule(fixture, smallRoster(), { rules: ["stability"] });
    expect(report.notes).toEqual([
      "Asha appears more than once in January 2025 (assigned on Morning, floater on Afternoon)",
    ]);
  });

  it("returns a single format violation for an unreadable document", () => {
    const report = validateSchedule({ "March 2025": "nope" }, smallRoster());
    expect(report.isValid).toBe(false);
    expect(report.violations).toHaveLength(1);
    expect(report.violations[0]?.rule).toBe("format");
    expect(report.violations[0]?.message).toMatch(/^Format: schedule could not be read \(March 2025: /);
  });

  it("returns a single format violation without a roster", () => {
    const report = validateSchedule(chenRepeatsMorning(), []);
    expect(report.violations.map((v) => v.message)).toEqual([
      "Format: no hierarchy context: The team has no employees",
    ]);
  });

  it("reports the last known violations once the deadline has passed", () => {
    const previous = validateSchedule(chenRepeatsMorning(), smallRoster()).violations;
    const controller = new AbortController();
    controller.abort();

    const report = validateSchedule(chenRepeatsMorning(), smallRoster(), {
      signal: controller.signal,
      lastKnown: previous,
    });
    expect(report.completed).toBe(false);
    expect(report.isValid).toBe(false);
    expect(report.violations).toEqual(previous);
    expect(report.notes).toEqual([
      "Validation deadline expired before the stability check; reporting the last known violations",
    ]);
  });

  it("checks the deadline before each rule", () => {
    let tick = 0;
    const report = validateSchedule(chenRepeatsMorning(), smallRoster(), { deadline: 3, clock: () => ++tick });

    expect(report.completed).toBe(false);
    expect(report.violations).toEqual([]);
    expect(report.notes).toEqual([
      "Validation deadline expired before the floater-fairness check; reporting the last known violations",
    ]);
  });

  it("does not modify the schedule", () => {
    const fixture = chenRepeatsMorning();
    const copy = structuredClone(fixture);
    validateSchedule(fixture, smallRoster());
    expect(fixture).toEqual(copy);
  });
});

describe("toValidationDocument", () => {
  it("flattens a report to messages and one line of notes", () => {
    const fixture = schedule({
      ...chenRepeatsMorning(),
      "March 2025": month({ Morning: { assigned: ["Zed", "Asha"] } }),
    });
    const document = toValidationDocument(validateSchedule(fixture, smallRoster(), { rules: ["stability"] }));

    expect(document).toEqual({
      is_valid: false,
      violations: [
        "Rule 1 (stability): Chen (rank 3) stayed on Morning for 2 consecutive months " +
          "from January 2025 to February 2025; limit is 1",
      ],
      validation_notes: "Not on the roster, rank-based rules skipped: Zed",
    });
  });
});

describe("summarizeViolations", () => {
  it("groups violations by rule", () => {
    const fixture = schedule({
      "January 2025": month({ Morning: { assigned: ["Chen", "Dara"], floaters: ["Asha"] } }),
      "February 2025": month({ Morning: { assigned: ["Chen", "Dara"], floaters: ["Asha"] } }),
    });
    const summaries = summarizeViolations(validateSchedule(fixture, smallRoster()).violations);

    expect(summaries.map((s) => [s.label, s.count])).toEqual([
      ["Rule 1 (stability)", 2],
      ["Rule 2 (floater exemption)", 2],
      ["Rule 3 (floater fairness)", 1],
      ["Rule 5 (diversity)", 2],
    ]);
    expect(summaries[0]?.employees).toEqual(["Chen", "Dara"]);
  });
});

describe("describeRules", () => {
  it("labels each rule the way violation messages do", () => {
    const lines = describeRules().split("\n");
    expect(lines).toHaveLength(5);
    expect(lines[0]).toMatch(/^Rule 1 \(stability\): /);
    expect(lines[4]).toMatch(/^Rule 5 \(diversity\): /);
  });
});

describe("isCoreViolationMessage", () => {
  it("recognizes the repairable rules from message text alone", () => {
    const { violations } = toValidationDocument(validateSchedule(chenRepeatsMorning(), smallRoster()));

    expect(violations.map(isCoreViolationMessage)).toEqual([true]);
    expect(isCoreViolationMessage("Rule 3 (floater fairness): Eli is a floater in consecutive months")).toBe(true);
    expect(isCoreViolationMessage("Coverage: Morning in January 2025 has 1 assigned; expected 2")).toBe(false);
    expect(isCoreViolationMessage("Rule 5 (diversity): Morning in January 2025 is all rank 3")).toBe(false);
  });
});
