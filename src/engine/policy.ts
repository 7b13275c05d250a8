import type { ShiftName } from "../types.js";

/** The most senior rank present in a team never floats. */
export const FLOATER_EXEMPT_RANK = 1;

/**
 * Months a rank may stay on the same shift before it must rotate.
 *
 * - Rank 1: 3 months
 * - Rank 2: 2 months
 * - Rank 3 and below: 1 month (rotate every month)
 */
const STABILITY_BY_RANK = [3, 2] as const;
const JUNIOR_STABILITY = 1;

/**
 * Weights used by the generator's scored greedy assignment.
 *
 * Weight hierarchy (highest magnitude first):
 * - STABILITY_PENALTY (-1000): assignment would break the employee's rotation rule
 * - DIVERSITY_BONUS (50): the employee's rank is not yet in the shift
 * - LOAD_PENALTY (10): per person already placed in the shift
 *
 * @example Scoring a placement by hand
 * ```ts
 * const score =
 *   (breaksStability ? SCORE_WEIGHTS.STABILITY_PENALTY : 0) +
 *   (newRankInShift ? SCORE_WEIGHTS.DIVERSITY_BONUS : 0) -
 *   SCORE_WEIGHTS.LOAD_PENALTY * placedSoFar;
 * ```
 */
export const SCORE_WEIGHTS = {
  /** Penalty for a placement that breaks stability or mandatory rotation */
  STABILITY_PENALTY: -1000,
  /** Bonus for adding a rank the shift does not have yet */
  DIVERSITY_BONUS: 50,
  /** Penalty per member already in the shift (spreads load) */
  LOAD_PENALTY: 10,
} as const;

export function stabilityLimitForRank(rank: number): number {
  return STABILITY_BY_RANK[rank - 1] ?? JUNIOR_STABILITY;
}

export function isFloaterEligible(rank: number): boolean {
  return rank !== FLOATER_EXEMPT_RANK;
}

/**
 * The slice of per-employee history the stability rule looks at.
 */
export interface ShiftHistory {
  currentShift: ShiftName | null;
  monthsOnCurrentShift: number;
}

/**
 * Whether placing someone on `shift` this month would push their run on one
 * shift past the limit for their rank.
 *
 * Juniors (limit 1) therefore may never repeat last month's shift; seniors may
 * repeat until their run reaches the limit.
 */
export function wouldBreakStability(history: ShiftHistory, shift: ShiftName, rank: number): boolean {
  if (history.currentShift !== shift) return false;
  return history.monthsOnCurrentShift + 1 > stabilityLimitForRank(rank);
}

/** Fixed headcount every month needs: shifts times people per shift. */
export function requiredFixedCount(shiftCount: number, peoplePerShift: number): number {
  return shiftCount * peoplePerShift;
}

/** People left over after fixed coverage; they become floaters. */
export function floaterCount(rosterSize: number, shiftCount: number, peoplePerShift: number): number {
  return Math.max(0, rosterSize - requiredFixedCount(shiftCount, peoplePerShift));
}
