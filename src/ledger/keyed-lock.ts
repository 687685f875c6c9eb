/**
 * Per-key single-flight lock.
 *
 * Calls for the same key run one after another in arrival order; distinct
 * keys never wait on each other. The callback learns whether it had to
 * wait, which tells the orchestrator that another call may have paid first.
 */

export interface LockContext {
  contended: boolean;
}

export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  async run<T>(key: string, fn: (ctx: LockContext) => Promise<T>): Promise<T> {
    const previous = this.tails.get(key);

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous ? previous.then(() => current) : current;
    this.tails.set(key, tail);

    try {
      if (previous) await previous;
      return await fn({ contended: previous !== undefined });
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
