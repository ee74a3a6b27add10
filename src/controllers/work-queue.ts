/**
 * Work queue with client-go semantics: an item is never handed to
 * two workers at once, and an item added while it is being processed is
 * handed out again once `done` is called for it.
 */
export class WorkQueue<T> {
  private queue: T[] = [];
  private dirty = new Set<string>();
  private processing = new Set<string>();
  // Latest value of items re-added while in flight
  private pending = new Map<string, T>();
  private waiters: Array<() => void> = [];
  private timers = new Set<NodeJS.Timeout>();
  private shuttingDown = false;

  constructor(private readonly keyOf: (item: T) => string) {}

  add(item: T): void {
    if (this.shuttingDown) return;
    const key = this.keyOf(item);
    if (this.dirty.has(key)) {
      if (this.processing.has(key)) this.pending.set(key, item);
      return;
    }
    this.dirty.add(key);
    if (this.processing.has(key)) {
      this.pending.set(key, item);
      return;
    }
    this.queue.push(item);
    this.wake();
  }

  addAfter(item: T, delayMs: number): void {
    if (this.shuttingDown) return;
    if (delayMs <= 0) {
      this.add(item);
      return;
    }
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      this.add(item);
    }, delayMs);
    this.timers.add(timer);
  }

  /** Resolves with the next item, or null once the queue is shut down and drained. */
  async get(): Promise<T | null> {
    for (;;) {
      const item = this.queue.shift();
      if (item !== undefined) {
        const key = this.keyOf(item);
        this.processing.add(key);
        this.dirty.delete(key);
        return item;
      }
      if (this.shuttingDown) return null;
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
  }

  done(item: T): void {
    const key = this.keyOf(item);
    this.processing.delete(key);
    const next = this.pending.get(key);
    if (next !== undefined) {
      this.pending.delete(key);
      this.queue.push(next);
      this.wake();
    }
  }

  shutDown(): void {
    this.shuttingDown = true;
    for (const timer of this.timers) clearTimeout(timer);
    this.timers.clear();
    this.queue = [];
    this.pending.clear();
    const waiters = this.waiters;
    this.waiters = [];
    for (const resolve of waiters) resolve();
  }

  len(): number {
    return this.queue.length;
  }

  pendingTimers(): number {
    return this.timers.size;
  }

  isProcessing(item: T): boolean {
    return this.processing.has(this.keyOf(item));
  }

  private wake(): void {
    this.waiters.shift()?.();
  }
}
