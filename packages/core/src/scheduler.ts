import type { Scheduler } from "./types";

/**
 * Queue a macrotask, so the current render commit and layout finish first.
 */
export const nextTask: Scheduler = (task) => {
  setTimeout(task, 0);
};

/**
 * Scheduler that holds tasks until `flush()` is called.
 * Useful when a host drives its own frame loop, and in tests.
 */
export class ManualScheduler {
  private queue: Array<() => void> = [];

  readonly schedule: Scheduler = (task) => {
    this.queue.push(task);
  };

  /** Number of tasks waiting to run */
  get pending(): number {
    return this.queue.length;
  }

  /**
   * Run queued tasks in scheduling order. Tasks queued while flushing
   * run in the same flush.
   */
  flush(): void {
    while (this.queue.length > 0) {
      const task = this.queue.shift();
      task?.();
    }
  }
}
