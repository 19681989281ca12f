import { afterEach, describe, expect, it, vi } from "vitest";
import { ManualScheduler, nextTask } from "./scheduler";

describe("nextTask", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("should run the task on a later macrotask", () => {
    vi.useFakeTimers();
    const task = vi.fn();

    nextTask(task);
    expect(task).not.toHaveBeenCalled();

    vi.runAllTimers();
    expect(task).toHaveBeenCalledTimes(1);
  });
});

describe("ManualScheduler", () => {
  it("should hold tasks until flushed", () => {
    const scheduler = new ManualScheduler();
    const task = vi.fn();

    scheduler.schedule(task);
    scheduler.schedule(task);

    expect(task).not.toHaveBeenCalled();
    expect(scheduler.pending).toBe(2);

    scheduler.flush();

    expect(task).toHaveBeenCalledTimes(2);
    expect(scheduler.pending).toBe(0);
  });

  it("should run tasks in scheduling order, including ones queued while flushing", () => {
    const scheduler = new ManualScheduler();
    const order: string[] = [];

    scheduler.schedule(() => {
      order.push("first");
      scheduler.schedule(() => order.push("third"));
    });
    scheduler.schedule(() => order.push("second"));
    scheduler.flush();

    expect(order).toEqual(["first", "second", "third"]);
  });
});
