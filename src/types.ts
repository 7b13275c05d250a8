/**
 * Core domain types for team rotas.
 *
 * @packageDocumentation
 */

import * as z from "zod";

// ============================================================================
// Shifts
// ============================================================================

/**
 * Every shift a team can run, in canonical (display and output) order.
 */
export const SHIFT_CATALOG = ["Early Morning", "Morning", "Afternoon", "Evening", "Night"] as const;

/**
 * Name of a shift drawn from {@link SHIFT_CATALOG}.
 */
export type ShiftName = (typeof SHIFT_CATALOG)[number];

export const ShiftNameSchema = z.enum(SHIFT_CATALOG);

/**
 * Shift templates and the shifts each one runs.
 *
 * @example
 * ```typescript
 * SHIFT_TEMPLATES["3-shift"]; // ["Morning", "Afternoon", "Night"]
 * ```
 */
export const SHIFT_TEMPLATES = {
  "3-shift": ["Morning", "Afternoon", "Night"],
  "4-shift": ["Morning", "Afternoon", "Evening", "Night"],
  "5-shift": ["Early Morning", "Morning", "Afternoon", "Evening", "Night"],
} as const satisfies Record<string, readonly ShiftName[]>;

export type ShiftTemplate = keyof typeof SHIFT_TEMPLATES;

export const ShiftTemplateSchema = z.enum(["3-shift", "4-shift", "5-shift"]);

/**
 * Resolves a template name to its shifts in catalog order.
 * Returns an empty list for names that are not templates.
 */
export function shiftsForTemplate(template: string): ShiftName[] {
  const parsed = ShiftTemplateSchema.safeParse(template);
  if (!parsed.success) return [];
  const active = new Set<ShiftName>(SHIFT_TEMPLATES[parsed.data]);
  return SHIFT_CATALOG.filter((shift) => active.has(shift));
}

// ============================================================================
// Team
// ============================================================================

export const EmployeeSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  designation: z.string(),
  seniorityLevel: z.number().int().min(0),
});

/**
 * A team member as provided by the roster store.
 *
 * - `id` (required): stable identifier from the roster store
 * - `name` (required): display name, also the identity used inside schedules
 * - `designation` (required): job title
 * - `seniorityLevel` (required): company-wide level, lower is more senior
 */
export type Employee = z.infer<typeof EmployeeSchema>;

export const TeamConfigurationSchema = z.object({
  name: z.string(),
  shiftTemplate: ShiftTemplateSchema,
  peoplePerShift: z.number().int().min(1),
  roster: z.array(EmployeeSchema),
});

/**
 * Everything the generator needs to know about one team.
 *
 * @example
 * ```typescript
 * const team: TeamConfiguration = {
 *   name: "Network Operations",
 *   shiftTemplate: "3-shift",
 *   peoplePerShift: 2,
 *   roster: [
 *     { id: "e1", name: "Asha", designation: "Lead Engineer", seniorityLevel: 1 },
 *     { id: "e2", name: "Bruno", designation: "Engineer", seniorityLevel: 3 },
 *   ],
 * };
 * ```
 */
export type TeamConfiguration = z.infer<typeof TeamConfigurationSchema>;

// ============================================================================
// Calendar
// ============================================================================

/**
 * A calendar month. `month` is 1-based (January = 1).
 */
export interface CalendarMonth {
  year: number;
  month: number;
}
