interface Waiter<T> {
  resolve: (entry: { item: T } | null) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

/**
 * Unbounded FIFO shared by the workers of one stage.
 *
 * Tracks unfinished work the way a join-able queue does: every `push()`
 * adds one unit, every `done()` removes one, and `join()` resolves when the
 * count returns to zero. Items dropped by `clear()` count as done.
 */
export class WorkQueue<T> {
  /** Wrapped so that an `undefined` item is still an entry. */
  private readonly items: { item: T }[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private joiners: (() => void)[] = [];
  private unfinished = 0;

  get size(): number {
    return this.items.length;
  }

  get pending(): number {
    return this.unfinished;
  }

  push(item: T): void {
    this.unfinished++;
    const waiter = this.waiters.shift();
    if (waiter) {
      this.detach(waiter);
      waiter.resolve({ item });
      return;
    }
    this.items.push({ item });
  }

  /**
   * Wait for the next item. Resolves to `null` when `signal` aborts first.
   * The caller must call `done()` once it has finished with a returned item.
   */
  take(signal?: AbortSignal): Promise<{ item: T } | null> {
    if (signal?.aborted) return Promise.resolve(null);
    const entry = this.items.shift();
    if (entry) return Promise.resolve(entry);

    return new Promise((resolve) => {
      const waiter: Waiter<T> = { resolve, signal };
      if (signal) {
        waiter.onAbort = () => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) this.waiters.splice(index, 1);
          resolve(null);
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }
      this.waiters.push(waiter);
    });
  }

  /** Mark one previously taken item as finished. */
  done(): void {
    if (this.unfinished === 0) {
      throw new Error('done() called more times than there were items');
    }
    this.unfinished--;
    if (this.unfinished === 0) this.releaseJoiners();
  }

  /** Resolve once every pushed item has been marked done. */
  join(): Promise<void> {
    if (this.unfinished === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.joiners.push(resolve);
    });
  }

  /** Drop every queued item and count it as done. Returns how many were dropped. */
  clear(): number {
    const dropped = this.items.length;
    this.items.length = 0;
    this.unfinished -= dropped;
    if (this.unfinished === 0) this.releaseJoiners();
    return dropped;
  }

  private detach(waiter: Waiter<T>): void {
    if (waiter.signal && waiter.onAbort) {
      waiter.signal.removeEventListener('abort', waiter.onAbort);
    }
  }

  private releaseJoiners(): void {
    const joiners = this.joiners;
    this.joiners = [];
    for (const resolve of joiners) resolve();
  }
}
