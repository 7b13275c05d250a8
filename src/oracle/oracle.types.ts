/**
 * Rule oracle transport types.
 *
 * Types are derived from Zod schemas to ensure validation and types stay in sync.
 *
 * @see oracle.schemas.ts for the source Zod schemas
 */

import type { z } from "zod";
import type { Schedule } from "../schedule/schedule.types.js";
import type { OracleRequestSchema, OracleResponseSchema } from "./oracle.schemas.js";

/**
 * Payload posted to the oracle.
 *
 * - `schedule` (required): the schedule document under review
 * - `rules` (required): the rules, one per line
 */
export type OracleRequest = z.infer<typeof OracleRequestSchema>;

/**
 * The oracle's verdict.
 *
 * - `is_valid` (required): whether the oracle found the schedule compliant
 * - `violations` (optional, defaults to `[]`): one message per problem found
 * - `validation_notes` (optional): free-form remarks
 */
export type OracleReport = z.infer<typeof OracleResponseSchema>;

/** A `fetch` function or an object with a `fetch` method. */
export type FetcherLike =
  | typeof fetch
  | {
      fetch: typeof fetch;
    };

/**
 * A second, advisory reviewer of a schedule.
 *
 * @category Oracle
 */
export interface RuleOracle {
  check(schedule: Schedule, rules: string, options?: { signal?: AbortSignal }): Promise<OracleReport>;
}
