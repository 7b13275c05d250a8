import type { RosterModel } from "../../engine/roster.js";
import type { Schedule } from "../../schedule/schedule.types.js";
import type { ViolationReporter } from "../reporter.js";
import type { Timeline } from "../timeline.js";
import type { RuleName } from "../violation.types.js";

/**
 * Everything a rule check may read. Checks never modify it.
 */
export interface RuleCheckContext {
  readonly schedule: Schedule;
  readonly timeline: Timeline;
  readonly roster: RosterModel;
  /** Coverage target when the caller knows it; otherwise the coverage rule infers one. */
  readonly peoplePerShift?: number;
}

/**
 * A single rule the validator replays a schedule against.
 *
 * `description` is plain language; the registry joins the descriptions into
 * the rules text handed to the advisory oracle.
 */
export interface ValidationRule {
  readonly name: RuleName;
  readonly description: string;
  check(context: RuleCheckContext, reporter: ViolationReporter): void;
}
