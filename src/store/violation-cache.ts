import type { Violation } from "../validation/violation.types.js";

export interface CachedViolations {
  violations: readonly Violation[];
  recordedAt: Date;
}

/**
 * Last known violations per team. Used when a deadline cuts a validation or
 * repair short.
 *
 * @category Storage
 */
export interface ViolationCache {
  get(teamId: string): CachedViolations | undefined;
  set(teamId: string, violations: readonly Violation[], recordedAt?: Date): void;
  clear(teamId: string): void;
}

export class InMemoryViolationCache implements ViolationCache {
  #entries = new Map<string, CachedViolations>();

  get(teamId: string): CachedViolations | undefined {
    return this.#entries.get(teamId);
  }

  set(teamId: string, violations: readonly Violation[], recordedAt: Date = new Date()): void {
    this.#entries.set(teamId, { violations: [...violations], recordedAt });
  }

  clear(teamId: string): void {
    this.#entries.delete(teamId);
  }
}
