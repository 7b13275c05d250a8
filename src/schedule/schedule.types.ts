/**
 * Schedule document types.
 *
 * Types are derived from Zod schemas to ensure validation and types stay in sync.
 *
 * @see schedule.schemas.ts for the source Zod schemas
 */

import type { z } from "zod";
import type {
  MonthAssignmentsSchema,
  ScheduleSchema,
  ShiftRecordSchema,
  StaffRefSchema,
} from "./schedule.schemas.js";

/**
 * A person as they appear inside a schedule.
 *
 * - `name` (required): employee name, the identity used across months
 * - `designation` (required): job title at generation time
 */
export type StaffRef = z.infer<typeof StaffRefSchema>;

/**
 * Who works one shift in one month.
 *
 * - `assigned_staff` (required): fixed staff for the month
 * - `floaters` (required): backup staff attached to this shift
 */
export type ShiftRecord = z.infer<typeof ShiftRecordSchema>;

/** One month of a schedule, keyed by shift name. */
export type MonthAssignments = z.infer<typeof MonthAssignmentsSchema>;

/**
 * The persisted schedule: month label to shift records, in calendar order.
 *
 * @example
 * ```json
 * {
 *   "March 2025": {
 *     "Morning": {
 *       "assigned_staff": [{ "name": "Asha", "designation": "Lead Engineer" }],
 *       "floaters": []
 *     }
 *   }
 * }
 * ```
 */
export type Schedule = z.infer<typeof ScheduleSchema>;

/** Role a person holds within a shift for one month. */
export type StaffRole = "assigned" | "floater";
