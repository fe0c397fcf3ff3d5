import { afterEach, describe, it, expect, vi } from "vitest";
import { AsyncQueue } from "../src/db/async-queue.js";

describe("AsyncQueue", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("hands items out in insertion order", async () => {
    const queue = new AsyncQueue(["a", "b"]);
    queue.put("c");
    expect(await queue.take()).toBe("a");
    expect(await queue.take()).toBe("b");
    expect(await queue.take()).toBe("c");
    expect(queue.size).toBe(0);
  });

  it("wakes the oldest waiter on put", async () => {
    const queue = new AsyncQueue<number>();
    const first = queue.take();
    const second = queue.take();
    queue.put(1);
    queue.put(2);
    expect(await first).toBe(1);
    expect(await second).toBe(2);
    expect(queue.size).toBe(0);
  });

  it("gives up after the timeout", async () => {
    vi.useFakeTimers();
    const queue = new AsyncQueue<string>();
    const pending = queue.take(1_000);
    vi.advanceTimersByTime(1_000);
    await expect(pending).resolves.toBeUndefined();

    queue.put("late");
    expect(queue.size).toBe(1);
  });

  it("drains queued items", () => {
    const queue = new AsyncQueue([1, 2, 3]);
    expect(queue.drain()).toEqual([1, 2, 3]);
    expect(queue.size).toBe(0);
  });
});
