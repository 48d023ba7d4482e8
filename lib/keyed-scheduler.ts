type Timer = ReturnType<typeof setTimeout>;

/**
 * One pending timer per key. Scheduling a key that already has a pending
 * task cancels that task and replaces it.
 */
export class KeyedScheduler<K = string> {
  private readonly timers = new Map<K, Timer>();

  schedule(key: K, delayMs: number, task: () => void): void {
    this.cancel(key);
    const timer = setTimeout(() => {
      this.timers.delete(key);
      task();
    }, delayMs);
    this.timers.set(key, timer);
  }

  cancel(key: K): boolean {
    const timer = this.timers.get(key);
    if (timer === undefined) return false;
    clearTimeout(timer);
    this.timers.delete(key);
    return true;
  }

  cancelAll(): void {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }

  has(key: K): boolean {
    return this.timers.has(key);
  }

  get size(): number {
    return this.timers.size;
  }
}
