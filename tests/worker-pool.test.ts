import { describe, it, expect } from "vitest";
import { runWithConcurrency } from "../src/pipeline/worker-pool.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = (): void => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("runWithConcurrency", () => {
  it("keeps results in input order", async () => {
    const delays = [30, 5, 15, 0];
    const results = await runWithConcurrency(delays, 2, async (delay, index) => {
      await new Promise((resolve) => setTimeout(resolve, delay));
      return `${String(index)}:${String(delay)}`;
    });
    expect(results).toEqual(["0:30", "1:5", "2:15", "3:0"]);
  });

  it("never runs more than the requested number of tasks", async () => {
    let running = 0;
    let peak = 0;
    await runWithConcurrency([1, 2, 3, 4, 5, 6, 7], 3, async () => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      running--;
    });
    expect(peak).toBe(3);
  });

  it("handles an empty list", async () => {
    expect(await runWithConcurrency([], 4, () => Promise.resolve(1))).toEqual([]);
  });

  it("stops handing out items after a failure and waits for running tasks", async () => {
    const started: number[] = [];
    const slow = deferred();
    let slowFinished = false;

    const run = runWithConcurrency([0, 1, 2, 3, 4], 2, async (item) => {
      started.push(item);
      if (item === 0) {
        await slow.promise;
        slowFinished = true;
        return item;
      }
      throw new Error(`item ${String(item)} broke`);
    });

    await new Promise((resolve) => setTimeout(resolve, 10));
    slow.resolve();

    await expect(run).rejects.toThrow("item 1 broke");
    expect(slowFinished).toBe(true);
    expect(started).toEqual([0, 1]);
  });

  it("rejects a concurrency below one", async () => {
    await expect(runWithConcurrency([1], 0, () => Promise.resolve(1))).rejects.toThrow(
      "Concurrency must be a positive integer, got 0"
    );
  });
});
