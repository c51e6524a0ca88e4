/**
 * Per-session turn serialization.
 *
 * Turns for the same session run one after another in arrival order;
 * turns for different sessions are not ordered against each other.
 * A failed turn does not block the ones queued behind it.
 */
export class SessionTurnQueue {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Runs `task` once every earlier task for `key` has settled.
   */
  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    const settle = (): void => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
    const tail: Promise<void> = result.then(settle, settle);
    this.tails.set(key, tail);

    return result;
  }

  /** Number of sessions with queued or running turns */
  get pending(): number {
    return this.tails.size;
  }
}
