/**
 * Stopping conditions for the synchronous validate and repair passes.
 *
 * A timer-backed `AbortSignal` cannot fire while those passes hold the event
 * loop, so they also compare an absolute deadline against a clock at each
 * checkpoint.
 */
export interface DeadlineOptions {
  /** Stops the run once aborted. */
  signal?: AbortSignal;
  /** Epoch milliseconds at which the run stops. */
  deadline?: number;
  /**
   * Clock compared against `deadline`.
   *
   * @default Date.now
   */
  clock?: () => number;
}

export function deadlinePassed(options: DeadlineOptions): boolean {
  if (options.signal?.aborted) return true;
  if (options.deadline === undefined) return false;
  return (options.clock ?? Date.now)() >= options.deadline;
}
