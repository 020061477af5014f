import type { SessionLock } from '../contracts';

const settle = () => undefined;

/**
 * Per-key mutual exclusion built from promise chains.
 *
 * Tasks sharing a key run one at a time in arrival order; tasks on different
 * keys never wait for each other. A key is forgotten once its chain drains,
 * so the map only holds keys with work in flight.
 */
export class KeyedMutex implements SessionLock {
  private readonly tails = new Map<string, Promise<void>>();

  runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(task);

    // The chain only orders tasks. Failures reach the caller through `run`.
    const tail: Promise<void> = run.then(settle, settle).then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    this.tails.set(key, tail);

    return run;
  }

  /** Number of keys with queued or running tasks. */
  get activeKeys(): number {
    return this.tails.size;
  }
}
