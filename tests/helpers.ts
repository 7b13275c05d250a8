import { createLogger } from "../src/logger.js";
import type { MonthAssignments, Schedule } from "../src/schedule/schedule.types.js";
import { SHIFT_CATALOG, type Employee, type ShiftName, type TeamConfiguration } from "../src/types.js";

export const silentLogger = createLogger("silent");

export function employee(name: string, seniorityLevel: number, designation = "Engineer"): Employee {
  return { id: name.toLowerCase(), name, designation, seniorityLevel };
}

/**
 * Three leads (level 1), three seniors (level 2) and six engineers (level 3).
 */
export function twelvePersonRoster(): Employee[] {
  return [
    employee("A1", 1, "Lead"),
    employee("A2", 1, "Lead"),
    employee("A3", 1, "Lead"),
    employee("B1", 2, "Senior"),
    employee("B2", 2, "Senior"),
    employee("B3", 2, "Senior"),
    employee("C1", 3),
    employee("C2", 3),
    employee("C3", 3),
    employee("C4", 3),
    employee("C5", 3),
    employee("C6", 3),
  ];
}

export function makeTeam(roster: Employee[], overrides: Partial<TeamConfiguration> = {}): TeamConfiguration {
  return {
    name: "Network Operations",
    shiftTemplate: "3-shift",
    peoplePerShift: 2,
    roster,
    ...overrides,
  };
}

/**
 * Asha and Farah rank 1, Bruno rank 2, Chen, Dara and Eli rank 3.
 */
export function smallRoster(): Employee[] {
  return [
    employee("Asha", 1, "Lead"),
    employee("Farah", 1, "Lead"),
    employee("Bruno", 4, "Senior"),
    employee("Chen", 7),
    employee("Dara", 7),
    employee("Eli", 7),
  ];
}

type MonthSpec = Partial<Record<ShiftName, { assigned: string[]; floaters?: string[] }>>;

/** Builds one month from names; designations are placeholders. */
export function month(layout: MonthSpec): MonthAssignments {
  const assignments: MonthAssignments = {};
  for (const shift of SHIFT_CATALOG) {
    const names = layout[shift];
    if (!names) continue;
    assignments[shift] = {
      assigned_staff: names.assigned.map((name) => ({ name, designation: "Engineer" })),
      floaters: (names.floaters ?? []).map((name) => ({ name, designation: "Engineer" })),
    };
  }
  return assignments;
}

export function schedule(months: Record<string, MonthAssignments>): Schedule {
  return { ...months };
}

export function namesOf(refs: ReadonlyArray<{ name: string }> | undefined): string[] {
  return (refs ?? []).map((ref) => ref.name);
}

/**
 * Chen (rank 3) stays on Morning for January and February 2025; nothing else
 * is wrong.
 */
export function chenRepeatsMorning(): Schedule {
  return schedule({
    "January 2025": month({
      Morning: { assigned: ["Chen", "Asha"], floaters: ["Eli"] },
      Afternoon: { assigned: ["Dara", "Bruno"] },
    }),
    "February 2025": month({
      Morning: { assigned: ["Chen", "Bruno"] },
      Afternoon: { assigned: ["Asha", "Eli"], floaters: ["Dara"] },
    }),
  });
}

/**
 * Chen (rank 3) holds Morning from January to April 2025 while everyone else
 * rotates within their limits. One change cannot end the run.
 */
export function chenHoldsMorning(): Schedule {
  return schedule({
    "January 2025": month({
      Morning: { assigned: ["Chen", "Asha"] },
      Afternoon: { assigned: ["Dara", "Bruno"] },
      Night: { assigned: ["Eli", "Farah"] },
    }),
    "February 2025": month({
      Morning: { assigned: ["Chen", "Farah"] },
      Afternoon: { assigned: ["Eli", "Asha"] },
      Night: { assigned: ["Dara", "Bruno"] },
    }),
    "March 2025": month({
      Morning: { assigned: ["Chen", "Bruno"] },
      Afternoon: { assigned: ["Dara", "Farah"] },
      Night: { assigned: ["Eli", "Asha"] },
    }),
    "April 2025": month({
      Morning: { assigned: ["Chen", "Asha"] },
      Afternoon: { assigned: ["Eli", "Bruno"] },
      Night: { assigned: ["Dara", "Farah"] },
    }),
  });
}
