import { ScheduleSchema } from "../schedule/schedule.schemas.js";
import type { Schedule } from "../schedule/schedule.types.js";

/** A team's persisted schedule. */
export interface ScheduleRecord {
  teamId: string;
  schedule: Schedule;
  generatedOn: Date;
}

/**
 * Persistence for schedules: at most one per team, replaced as a whole.
 *
 * @category Storage
 */
export interface ScheduleStore {
  get(teamId: string): Promise<ScheduleRecord | undefined>;
  /** Creates or replaces the team's schedule. */
  put(record: ScheduleRecord): Promise<void>;
  /** Returns whether a schedule was removed. */
  delete(teamId: string): Promise<boolean>;
}

/**
 * Process-local {@link ScheduleStore}. Records are copied in and out through
 * JSON, so callers never share a schedule object with the store.
 */
export class InMemoryScheduleStore implements ScheduleStore {
  #records = new Map<string, { schedule: string; generatedOn: Date }>();

  async get(teamId: string): Promise<ScheduleRecord | undefined> {
    const stored = this.#records.get(teamId);
    if (!stored) return undefined;
    const schedule = ScheduleSchema.parse(JSON.parse(stored.schedule));
    return { teamId, schedule, generatedOn: new Date(stored.generatedOn) };
  }

  async put(record: ScheduleRecord): Promise<void> {
    this.#records.set(record.teamId, {
      schedule: JSON.stringify(record.schedule),
      generatedOn: new Date(record.generatedOn),
    });
  }

  async delete(teamId: string): Promise<boolean> {
    return this.#records.delete(teamId);
  }
}
