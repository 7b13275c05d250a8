/**
 * Serializes writers per team. Work for one team runs one at a time in call
 * order; different teams never wait on each other.
 */
export class TeamWriteLock {
  #tails = new Map<string, Promise<void>>();

  async runExclusive<T>(teamId: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.#tails.get(teamId) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.#tails.set(teamId, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.#tails.get(teamId) === tail) this.#tails.delete(teamId);
    }
  }

  /** Whether any work for the team is running or queued. */
  isLocked(teamId: string): boolean {
    return this.#tails.has(teamId);
  }
}
