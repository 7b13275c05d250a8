import { deadlinePassed } from "../deadline.js";
import { isFloaterEligible } from "../engine/policy.js";
import { buildRosterModel, type RosterModel } from "../engine/roster.js";
import { defaultLogger } from "../logger.js";
import { cloneSchedule, shiftEntries } from "../schedule/document.js";
import type { MonthAssignments, Schedule, StaffRef } from "../schedule/schedule.types.js";
import type { Employee, ShiftName } from "../types.js";
import { inferPeoplePerShift } from "../validation/rules/coverage.js";
import { validateSchedule } from "../validation/validator.js";
import { isCoreViolation, type ValidationReport, type Violation } from "../validation/violation.types.js";
import type {
  RepairChange,
  RepairDocument,
  RepairOptions,
  RepairReport,
  SlotRef,
} from "./repair.types.js";

interface Slot extends SlotRef {
  index: number;
}

type Proposal =
  | { kind: "swap"; month: string; a: Slot; b: Slot }
  | { kind: "move"; month: string; a: Slot; to: ShiftName };

interface Standing {
  violations: readonly Violation[];
  core: number;
  nonCore: number;
}

/** A candidate schedule with the changes that produced it. */
interface Trial {
  schedule: Schedule;
  changes: RepairChange[];
  standing: Standing;
}

function standingOf(report: ValidationReport): Standing {
  const core = report.violations.filter(isCoreViolation).length;
  return { violations: report.violations, core, nonCore: report.violations.length - core };
}

/** Fewer core violations, then fewer of the rest. */
function ranksAbove(a: Standing, b: Standing): boolean {
  return a.core < b.core || (a.core === b.core && a.nonCore < b.nonCore);
}

// =============================================================================
// Slots
// =============================================================================

function staffAt(month: MonthAssignments, slot: SlotRef): StaffRef[] | undefined {
  const record = month[slot.shift];
  if (!record) return undefined;
  return slot.role === "assigned" ? record.assigned_staff : record.floaters;
}

/** Every occupied slot of a month, in catalog order, assigned staff before floaters. */
function occupiedSlots(month: MonthAssignments): Array<{ slot: Slot; ref: StaffRef }> {
  const slots: Array<{ slot: Slot; ref: StaffRef }> = [];
  for (const [shift, record] of shiftEntries(month)) {
    record.assigned_staff.forEach((ref, index) => slots.push({ slot: { role: "assigned", shift, index }, ref }));
    record.floaters.forEach((ref, index) => slots.push({ slot: { role: "floater", shift, index }, ref }));
  }
  return slots;
}

function findSlot(month: MonthAssignments, name: string, role: SlotRef["role"]): Slot | undefined {
  return occupiedSlots(month).find(({ slot, ref }) => ref.name === name && slot.role === role)?.slot;
}

/** Same-shift partners first, then the rest in catalog order. */
function sameShiftFirst<T extends { slot: Slot }>(items: readonly T[], shift: ShiftName): T[] {
  return [...items.filter((i) => i.slot.shift === shift), ...items.filter((i) => i.slot.shift !== shift)];
}

function isEligibleFloater(roster: RosterModel, name: string): boolean {
  const rank = roster.rankOfEmployee(name);
  return rank !== undefined && isFloaterEligible(rank);
}

// =============================================================================
// Proposals
// =============================================================================

/** Swap a floater with an assigned employee who may float instead. */
function floaterSwaps(
  schedule: Schedule,
  roster: RosterModel,
  month: string,
  name: string,
  exclude: (candidate: string) => boolean,
): Proposal[] {
  const assignments = schedule[month];
  if (!assignments) return [];
  const own = findSlot(assignments, name, "floater");
  if (!own) return [];

  const partners = occupiedSlots(assignments).filter(
    ({ slot, ref }) => slot.role === "assigned" && isEligibleFloater(roster, ref.name) && !exclude(ref.name),
  );
  return sameShiftFirst(partners, own.shift).map(({ slot }): Proposal => ({ kind: "swap", month, a: own, b: slot }));
}

/**
 * Ways to take someone off their run in one month: swap onto another shift,
 * swap with a floater, or move to another shift.
 */
function stabilityProposalsAt(schedule: Schedule, roster: RosterModel, name: string, month: string): Proposal[] {
  const assignments = schedule[month];
  if (!assignments) return [];
  const own = findSlot(assignments, name, "assigned");
  if (!own) return [];

  const slots = occupiedSlots(assignments);
  const shiftSwaps: Proposal[] = slots
    .filter(({ slot }) => slot.role === "assigned" && slot.shift !== own.shift)
    .map(({ slot }): Proposal => ({ kind: "swap", month, a: own, b: slot }));
  const floaterTrades: Proposal[] = isEligibleFloater(roster, name)
    ? slots
        .filter(({ slot }) => slot.role === "floater")
        .map(({ slot }): Proposal => ({ kind: "swap", month, a: own, b: slot }))
    : [];
  const moves: Proposal[] = shiftEntries(assignments)
    .filter(([shift]) => shift !== own.shift)
    .map(([shift]): Proposal => ({ kind: "move", month, a: own, to: shift }));

  return [...shiftSwaps, ...floaterTrades, ...moves];
}

/** Break a run at the first month past the limit. */
function stabilityProposals(schedule: Schedule, roster: RosterModel, violation: Violation): Proposal[] {
  const name = violation.employees[0];
  const limit = violation.evidence.limit ?? 1;
  const month = violation.months[limit] ?? violation.months[violation.months.length - 1];
  if (name === undefined || month === undefined) return [];
  return stabilityProposalsAt(schedule, roster, name, month);
}

/**
 * Months that must change for a run to fit its limit: every (limit + 1)-th
 * month of the run.
 */
function runBreakMonths(violation: Violation): string[] {
  const limit = violation.evidence.limit ?? 1;
  return violation.months.filter((_, index) => index % (limit + 1) === limit);
}

function proposalsFor(violation: Violation, schedule: Schedule, roster: RosterModel): Proposal[] {
  const name = violation.employees[0];
  if (name === undefined) return [];

  switch (violation.rule) {
    case "floater-exemption": {
      const month = violation.months[0];
      return month === undefined ? [] : floaterSwaps(schedule, roster, month, name, () => false);
    }
    case "floater-fairness": {
      const [previous, month] = violation.months;
      if (previous === undefined || month === undefined) return [];
      const before = schedule[previous];
      const floatedBefore = (candidate: string) =>
        before !== undefined && findSlot(before, candidate, "floater") !== undefined;
      return floaterSwaps(schedule, roster, month, name, floatedBefore);
    }
    case "stability":
      return stabilityProposals(schedule, roster, violation);
    default:
      return [];
  }
}

/** Applies a proposal in place and describes it, or returns undefined if a slot is gone. */
function applyProposal(schedule: Schedule, proposal: Proposal): RepairChange | undefined {
  const assignments = schedule[proposal.month];
  if (!assignments) return undefined;
  const fromList = staffAt(assignments, proposal.a);
  const mover = fromList?.[proposal.a.index];
  if (!fromList || !mover) return undefined;
  const from: SlotRef = { role: proposal.a.role, shift: proposal.a.shift };

  if (proposal.kind === "move") {
    const to: SlotRef = { role: proposal.a.role, shift: proposal.to };
    const toList = staffAt(assignments, to);
    if (!toList) return undefined;
    fromList.splice(proposal.a.index, 1);
    toList.push(mover);
    return { kind: "move", employee: mover.name, month: proposal.month, from, to };
  }

  const toList = staffAt(assignments, proposal.b);
  const partner = toList?.[proposal.b.index];
  if (!toList || !partner) return undefined;
  const to: SlotRef = { role: proposal.b.role, shift: proposal.b.shift };
  fromList[proposal.a.index] = partner;
  toList[proposal.b.index] = mover;
  return {
    kind: "swap",
    employee: mover.name,
    month: proposal.month,
    from,
    to,
    partner: partner.name,
    partnerFrom: to,
    partnerTo: from,
  };
}

// =============================================================================
// Repair
// =============================================================================

const NOTHING_TO_REPAIR = "No core rule violations to repair";
const NO_IMPROVEMENT = "No reassignment reduced the core rule violations; schedule left unchanged";
const REJECTED = "Proposed changes would add core rule violations; schedule left unchanged";
const ABORTED = "Repair deadline expired; schedule left unchanged";

/**
 * Proposes minimal reassignments for the core rule violations (stability,
 * floater exemption, floater fairness) and keeps those that help.
 *
 * Each candidate swap or move is tried on a copy and kept only if it lowers
 * the number of core violations without adding coverage or diversity ones.
 * A stability run too long for one change is broken at every month past
 * each stretch of its limit, and those changes are judged together.
 * The result is validated again before it is returned; if it would have more
 * core violations than `violations` listed, the input schedule comes back
 * unchanged.
 *
 * Never throws and never modifies `schedule`. Targets come from a fresh
 * validation of the schedule; `violations` decides whether a repair runs at
 * all and what counts as fixed.
 *
 * @example
 * ```typescript
 * const { violations } = validateSchedule(schedule, roster);
 * const result = repairSchedule(schedule, violations, roster);
 * if (result.changes.length > 0) await store.put({ teamId, schedule: result.schedule, generatedOn });
 * ```
 */
export function repairSchedule(
  schedule: Schedule,
  violations: readonly Violation[],
  roster: readonly Employee[],
  options: RepairOptions = {},
): RepairReport {
  const targets = violations.filter(isCoreViolation);
  const unchanged = (message: string, remaining: readonly Violation[], success = true): RepairReport => ({
    schedule,
    changes: [],
    fixed: [],
    remaining,
    success,
    message,
    aborted: false,
  });
  const abort = (): RepairReport => ({ ...unchanged(ABORTED, targets, false), aborted: true });

  if (deadlinePassed(options)) return abort();
  if (targets.length === 0) return unchanged(NOTHING_TO_REPAIR, []);

  const rosterResult = buildRosterModel(roster);
  if (!rosterResult.ok) {
    return unchanged(`Cannot repair without hierarchy context: ${rosterResult.message}`, targets);
  }
  const model = rosterResult.model;
  const logger = (options.logger ?? defaultLogger).child({ component: "repair" });
  const peoplePerShift = options.peoplePerShift ?? inferPeoplePerShift(schedule);
  const evaluate = (candidate: Schedule) =>
    standingOf(validateSchedule(candidate, roster, { peoplePerShift }));

  let working = cloneSchedule(schedule);
  let current = evaluate(working);
  const improves = (next: Standing) => next.core < current.core && next.nonCore <= current.nonCore;

  /** The first proposal that improves on the working schedule by itself. */
  const firstImprovement = (proposals: readonly Proposal[]): Trial | "expired" | undefined => {
    for (const proposal of proposals) {
      if (deadlinePassed(options)) return "expired";
      const trial = cloneSchedule(working);
      const change = applyProposal(trial, proposal);
      if (!change) continue;
      const standing = evaluate(trial);
      if (improves(standing)) return { schedule: trial, changes: [change], standing };
    }
    return undefined;
  };

  /**
   * Breaks a run that one change cannot fix: the best change at each break
   * month, applied in order and judged together.
   */
  const breakRun = (target: Violation): Trial | "expired" | undefined => {
    const name = target.employees[0];
    const months = runBreakMonths(target);
    if (name === undefined || months.length < 2) return undefined;

    let trial: Trial = { schedule: working, changes: [], standing: current };
    for (const month of months) {
      let best: Trial | undefined;
      for (const proposal of stabilityProposalsAt(trial.schedule, model, name, month)) {
        if (deadlinePassed(options)) return "expired";
        const candidate = cloneSchedule(trial.schedule);
        const change = applyProposal(candidate, proposal);
        if (!change) continue;
        const standing = evaluate(candidate);
        if (!best || ranksAbove(standing, best.standing)) {
          best = { schedule: candidate, changes: [...trial.changes, change], standing };
        }
      }
      if (!best) return undefined;
      trial = best;
    }
    return improves(trial.standing) ? trial : undefined;
  };

  const changes: RepairChange[] = [];
  const attempted = new Set<string>();

  for (;;) {
    if (deadlinePassed(options)) return abort();
    const target = current.violations.find((v) => isCoreViolation(v) && !attempted.has(v.id));
    if (!target) break;
    attempted.add(target.id);

    const accepted =
      (target.rule === "stability" ? breakRun(target) : undefined) ??
      firstImprovement(proposalsFor(target, working, model));
    if (accepted === "expired") return abort();
    if (accepted) {
      working = accepted.schedule;
      current = accepted.standing;
      changes.push(...accepted.changes);
      logger.debug({ changes: accepted.changes, coreViolations: current.core }, "repair changes accepted");
    }
  }

  if (deadlinePassed(options)) return abort();
  const outcome = evaluate(working);
  const remaining = outcome.violations.filter(isCoreViolation);

  if (outcome.core > targets.length) {
    logger.warn({ before: targets.length, after: outcome.core }, "repair rejected");
    return unchanged(REJECTED, targets);
  }
  if (changes.length === 0) return unchanged(NO_IMPROVEMENT, remaining);

  const outcomeIds = new Set(outcome.violations.map((v) => v.id));
  const fixed = targets.filter((v) => !outcomeIds.has(v.id));
  return {
    schedule: working,
    changes,
    fixed,
    remaining,
    success: true,
    message: `Applied ${changes.length} change(s); ${fixed.length} violation(s) fixed, ${remaining.length} remaining`,
    aborted: false,
  };
}

/** One line per change, for people reading a repair log. */
export function describeChange(change: RepairChange): string {
  const where = (slot: SlotRef) => `${slot.role} on ${slot.shift}`;
  if (change.kind === "move") {
    return `${change.month}: moved ${change.employee} from ${change.from.shift} to ${change.to.shift} (${change.from.role})`;
  }
  return (
    `${change.month}: swapped ${change.employee} (${where(change.from)}) ` +
    `with ${change.partner ?? "?"} (${where(change.to)})`
  );
}

export function toRepairDocument(report: RepairReport): RepairDocument {
  return {
    schedule: report.schedule,
    changes_made: report.changes.map(describeChange),
    violations_fixed: report.fixed.map((v) => v.message),
    violations_remaining: report.remaining.map((v) => v.message),
    message: report.message,
  };
}
