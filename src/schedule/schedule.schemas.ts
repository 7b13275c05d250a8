/**
 * Zod schemas for the persisted schedule document.
 *
 * The document is the contract between the engine and whatever stores it.
 * TypeScript types are derived from these schemas using z.infer so the two
 * never drift apart.
 *
 * @see schedule.types.ts for the derived TypeScript types
 */

import { z } from "zod";
import { ShiftNameSchema } from "../types.js";

// --------------------------------------------------------------------------
// Staff references
// --------------------------------------------------------------------------

export const StaffRefSchema = z.object({
  name: z.string().min(1),
  designation: z.string(),
});

// --------------------------------------------------------------------------
// Shift and month records
// --------------------------------------------------------------------------

export const ShiftRecordSchema = z.object({
  assigned_staff: z.array(StaffRefSchema),
  floaters: z.array(StaffRefSchema),
});

export const MonthAssignmentsSchema = z.record(ShiftNameSchema, ShiftRecordSchema);

// --------------------------------------------------------------------------
// Schedule document
// --------------------------------------------------------------------------

/** Month label as produced by the generator, e.g. `"March 2025"`. */
export const MonthLabelSchema = z.string().regex(/^[A-Z][a-z]+ \d{4}$/, {
  message: 'Month labels must look like "March 2025"',
});

export const ScheduleSchema = z.record(MonthLabelSchema, MonthAssignmentsSchema);
