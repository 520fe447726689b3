/**
 * Per-key mutual exclusion for single-writer-per-entity processing.
 *
 * Work for one key runs strictly one at a time in arrival order; work for
 * different keys never waits on each other.
 */

export class LockTimeoutError extends Error {
  constructor(
    public readonly key: string,
    public readonly timeoutMs: number
  ) {
    super(`Timed out after ${timeoutMs}ms waiting for lock on ${key}`);
    this.name = "LockTimeoutError";
  }
}

export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  /**
   * Run `work` once every earlier holder of `key` has finished.
   * With `timeoutMs`, gives up waiting (not running) after that long.
   */
  async runExclusive<T>(
    key: string,
    work: () => Promise<T>,
    timeoutMs?: number
  ): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    const tail = previous.then(() => held);
    this.tails.set(key, tail);

    try {
      await this.acquire(previous, key, timeoutMs);
      return await work();
    } finally {
      release();
      // a caller that timed out still sits behind the earlier holders, so
      // the key is only free once the whole chain has settled
      void tail.then(() => {
        if (this.tails.get(key) === tail) {
          this.tails.delete(key);
        }
      });
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /**
   * Number of keys currently held or waited on
   */
  size(): number {
    return this.tails.size;
  }

  private async acquire(
    previous: Promise<void>,
    key: string,
    timeoutMs?: number
  ): Promise<void> {
    if (timeoutMs === undefined) {
      await previous;
      return;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new LockTimeoutError(key, timeoutMs)),
        timeoutMs
      );
    });

    try {
      await Promise.race([previous, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
