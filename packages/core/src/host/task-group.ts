/**
 * Counts in-flight tasks that must finish before their owner is done
 * tearing down.
 */

export interface InflightTasks {
  add(): void;
  done(): void;
}

export class TaskGroup implements InflightTasks {
  private count = 0;
  private waiters: Array<() => void> = [];

  get size(): number {
    return this.count;
  }

  add(): void {
    this.count++;
  }

  /** Throws when called more times than add(). */
  done(): void {
    if (this.count === 0) {
      throw new Error("TaskGroup.done() called with no registered tasks");
    }
    this.count--;
    if (this.count === 0) {
      const waiters = this.waiters;
      this.waiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  /** Resolves once every registered task has called done(). */
  wait(): Promise<void> {
    if (this.count === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }
}
