/**
 * Per-session run queue.
 *
 * Runs for the same session id chain behind each other; runs for different
 * ids proceed in parallel. A failed run does not block the next one.
 */
export class SessionRunQueue {
  private tails = new Map<string, Promise<void>>();

  run<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(sessionId) ?? Promise.resolve();
    const result = previous.then(() => task());

    const tail: Promise<void> = result
      .then(settled, settled)
      .finally(() => {
        if (this.tails.get(sessionId) === tail) this.tails.delete(sessionId);
      });
    this.tails.set(sessionId, tail);

    return result;
  }

  /** Sessions with a run in progress or queued */
  get activeSessions(): number {
    return this.tails.size;
  }
}

const settled = (): void => undefined;
