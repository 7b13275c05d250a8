/**
 * Zod schemas for the rule oracle transport.
 *
 * The oracle is an advisory reviewer: it reads the schedule and a plain-language
 * rules text and answers with its own verdict. Its answer never overrides the
 * programmatic validator.
 *
 * @see oracle.types.ts for the derived TypeScript types
 */

import { z } from "zod";
import { ScheduleSchema } from "../schedule/schedule.schemas.js";

export const OracleRequestSchema = z.object({
  schedule: ScheduleSchema,
  rules: z.string().min(1),
});

export const OracleResponseSchema = z.object({
  is_valid: z.boolean(),
  violations: z.array(z.string()).default([]),
  validation_notes: z.string().optional(),
});
